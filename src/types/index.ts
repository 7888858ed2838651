/**
 * sweepbench - Core Type Definitions
 */

export * from './bench-types.js';

// ============================================================================
// API Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  metadata?: {
    requestId?: string;
    timestamp: string;
    duration?: number;
  };
}
