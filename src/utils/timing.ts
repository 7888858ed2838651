/**
 * Cooperative delays used by the polling loops and settle waits.
 */

export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Milliseconds left until `deadline` (epoch ms), never negative.
 */
export function remaining(deadline: number): number {
  return Math.max(0, deadline - Date.now());
}
