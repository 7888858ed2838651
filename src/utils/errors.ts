/**
 * sweepbench - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  suggestion?: string;
  [key: string]: unknown;
}

export class BenchError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    };
  }
}

// Validation Errors (400)
export class ValidationError extends BenchError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

// Conflict Errors (409)
export class ConflictError extends BenchError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'CONFLICT_ERROR', 409, context);
  }
}

/**
 * Raised when a caller breaks the half-duplex discipline of a command link,
 * e.g. sending while a previous request still awaits its response.
 */
export class ProtocolStateError extends BenchError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'PROTOCOL_STATE_ERROR', 409, context, false);
  }
}

// Hardware Errors (502, 503, 504)
export class PortUnavailableError extends BenchError {
  constructor(portPath: string, reason: string, context: Partial<ErrorContext>) {
    super(
      `Port ${portPath} is unavailable: ${reason}`,
      'PORT_UNAVAILABLE',
      503,
      { ...context, portPath }
    );
  }
}

export class ParseFailureError extends BenchError {
  constructor(what: string, raw: string, context: Partial<ErrorContext>) {
    super(
      `Could not parse ${what} from response: ${JSON.stringify(raw)}`,
      'PARSE_FAILURE',
      502,
      { ...context, raw }
    );
  }
}

export class CommunicationTimeoutError extends BenchError {
  constructor(operation: string, timeoutMs: number, context: Partial<ErrorContext>) {
    super(
      `No response within ${timeoutMs}ms: ${operation}`,
      'COMMUNICATION_TIMEOUT',
      504,
      { ...context, operation, timeoutMs }
    );
  }
}

// Internal Server Errors (500)
export class InternalError extends BenchError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 500, context, false);
  }
}

// Error type guard
export function isBenchError(error: unknown): error is BenchError {
  return error instanceof BenchError;
}

// Error handler helper
export function handleError(error: unknown): BenchError {
  if (isBenchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}
