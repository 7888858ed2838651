/**
 * Shared Application State
 *
 * Holds the bench session shared by the entry point and the API routes.
 * This module breaks circular dependencies between index.ts and routes.
 */

import type { BenchSession } from './services/bench/bench-session.js';

let _benchSession: BenchSession | null = null;

/**
 * Get the open bench session, if any
 */
export function getBenchSession(): BenchSession | null {
  return _benchSession;
}

/**
 * Set the bench session instance
 */
export function setBenchSession(session: BenchSession): void {
  _benchSession = session;
}

/**
 * Clear the bench session instance
 */
export function clearBenchSession(): void {
  _benchSession = null;
}
