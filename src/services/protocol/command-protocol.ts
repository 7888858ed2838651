/**
 * Command Protocol
 *
 * Half-duplex request/response discipline over a line-oriented transport:
 * clear stale input, write one request line, poll for one reply line within
 * a deadline, optionally re-send. Transport faults surface as "no response";
 * only misuse of the link (a second request while one is outstanding) throws.
 *
 * A request sent without waiting for its reply still gets one from the
 * firmware. That reply is read and dropped before the next request goes out,
 * so it can never be taken for the next request's answer.
 */

import { z } from 'zod';
import { log, toError, Logger } from '../../utils/logger.js';
import { ProtocolStateError, ValidationError } from '../../utils/errors.js';
import { delay, remaining } from '../../utils/timing.js';
import type { TransportChannel } from '../transport/types.js';

// ============================================================================
// Options
// ============================================================================

export const CommandProtocolOptionsSchema = z.object({
  /** Default deadline for one response, per attempt */
  timeoutMs: z.number().int().positive().default(2000),
  /** Extra attempts after a missing response */
  retries: z.number().int().nonnegative().default(0),
  /** Length of one poll slice while waiting for input */
  pollIntervalMs: z.number().int().positive().default(10),
  /** How long to wait for an unread reply before the next request */
  drainTimeoutMs: z.number().int().nonnegative().default(100),
  /** Log every request and reply at info instead of debug */
  verbose: z.boolean().default(false),
});

export type CommandProtocolOptions = z.infer<typeof CommandProtocolOptionsSchema>;

export interface SendOptions {
  /** Whether the caller will read the answer with waitResponse; defaults to true */
  expectResponse?: boolean;
  /**
   * With expectResponse false: the device still answers, and the answer is
   * drained before the next request is written
   */
  discardReply?: boolean;
}

export interface ExchangeOptions {
  timeoutMs?: number;
  retries?: number;
}

export interface ExchangeResult {
  /** Whether the request reached the transport at least once */
  written: boolean;
  response: string | null;
  attempts: number;
}

/**
 * idle      nothing outstanding (unread replies may still be draining)
 * writing   a request is being written
 * awaiting  a request was written and its response is not yet consumed
 * waiting   a caller is polling for the response
 * exchange  sendAndWait owns the link for the whole request/response cycle
 */
export type ProtocolState = 'idle' | 'writing' | 'awaiting' | 'waiting' | 'exchange';

// ============================================================================
// Command Protocol
// ============================================================================

export class CommandProtocol {
  readonly options: CommandProtocolOptions;
  private state: ProtocolState = 'idle';
  /** Replies the device owes to fire-and-forget requests */
  private unreadReplies = 0;
  private readonly logger: Logger;

  constructor(
    private readonly transport: TransportChannel,
    options: Partial<CommandProtocolOptions> = {}
  ) {
    this.options = CommandProtocolOptionsSchema.parse(options);
    this.logger = log.child({ service: 'command-protocol', port: transport.path });
  }

  getState(): ProtocolState {
    return this.state;
  }

  getUnreadReplies(): number {
    return this.unreadReplies;
  }

  /**
   * Forget outstanding replies; the board resets when its port reopens.
   */
  reset(): void {
    this.state = 'idle';
    this.unreadReplies = 0;
  }

  /**
   * Write one request line. Returns false when the transport refused it.
   */
  async send(requestLine: string, options: SendOptions = {}): Promise<boolean> {
    const expectResponse = options.expectResponse ?? true;
    this.assertIdle('send', requestLine);

    this.state = 'writing';
    const written = await this.transmit(requestLine);
    this.state = written && expectResponse ? 'awaiting' : 'idle';
    if (written && !expectResponse && options.discardReply) {
      this.unreadReplies++;
    }
    return written;
  }

  /**
   * Poll for the response to the last send(), or null at the deadline.
   */
  async waitResponse(timeoutMs: number = this.options.timeoutMs): Promise<string | null> {
    if (this.state !== 'awaiting') {
      throw new ProtocolStateError(`Cannot wait for a response while ${this.state}`, {
        operation: 'waitResponse',
        port: this.transport.path,
      });
    }

    this.state = 'waiting';
    try {
      return await this.poll(timeoutMs);
    } finally {
      this.state = 'idle';
    }
  }

  /**
   * Send a request and wait for its response, re-sending on silence.
   */
  async sendAndWait(requestLine: string, options: ExchangeOptions = {}): Promise<string | null> {
    const result = await this.exchange(requestLine, options);
    return result.response;
  }

  /**
   * Same as sendAndWait, but also reports whether anything was written.
   */
  async exchange(requestLine: string, options: ExchangeOptions = {}): Promise<ExchangeResult> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const retries = options.retries ?? this.options.retries;
    this.assertIdle('exchange', requestLine);

    this.state = 'exchange';
    let written = false;
    let attempts = 0;
    try {
      while (attempts <= retries) {
        attempts++;
        if (await this.transmit(requestLine)) {
          written = true;
          const response = await this.poll(timeoutMs);
          if (response !== null) {
            return { written, response, attempts };
          }
        }

        if (attempts <= retries) {
          this.logger.debug('No response, re-sending', { request: requestLine, attempt: attempts });
        }
      }

      this.logger.warn('No response', { request: requestLine, attempts, timeoutMs });
      return { written, response: null, attempts };
    } finally {
      this.state = 'idle';
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private assertIdle(operation: string, requestLine: string): void {
    if (this.state !== 'idle') {
      throw new ProtocolStateError(
        `Request "${requestLine}" refused: link is ${this.state}`,
        { operation, port: this.transport.path, state: this.state }
      );
    }
    if (/[\r\n]/.test(requestLine)) {
      throw new ValidationError('Request must be a single line', {
        operation,
        input: requestLine,
      });
    }
  }

  private async transmit(requestLine: string): Promise<boolean> {
    try {
      await this.drainUnreadReplies();
      await this.transport.discardPendingInput();
      await this.transport.write(`${requestLine}\n`);
      this.trace('TX', requestLine);
      return true;
    } catch (error) {
      this.logger.error('Write failed', toError(error), { request: requestLine });
      return false;
    }
  }

  private async drainUnreadReplies(): Promise<void> {
    while (this.unreadReplies > 0) {
      const line = await this.poll(this.options.drainTimeoutMs);
      if (line === null) {
        this.logger.debug('Unread replies never arrived', { outstanding: this.unreadReplies });
        this.unreadReplies = 0;
        return;
      }
      this.unreadReplies--;
    }
  }

  private async poll(timeoutMs: number): Promise<string | null> {
    const deadline = Date.now() + timeoutMs;

    while (remaining(deadline) > 0) {
      const slice = Math.min(this.options.pollIntervalMs, remaining(deadline));
      try {
        const line = await this.transport.readLine(slice);
        const trimmed = line?.trim();
        if (trimmed) {
          this.trace('RX', trimmed);
          return trimmed;
        }
      } catch (error) {
        // Disconnects and garbled bytes count as silence
        this.logger.debug('Read failed while polling', { error: toError(error).message });
        await delay(slice);
      }
    }

    return null;
  }

  private trace(direction: 'TX' | 'RX', line: string): void {
    if (this.options.verbose) {
      this.logger.info(`${direction} ${line}`);
    } else {
      this.logger.debug(`${direction} ${line}`);
    }
  }
}
