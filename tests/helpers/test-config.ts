import { config } from '../../src/config.js';
import type { Config } from '../../src/config.js';

/** Configuration with every hardware wait shortened for in-process fakes */
export const testConfig: Config = {
  ...config,
  serial: { ...config.serial, openDelayMs: 0, releaseDelayMs: 0 },
  protocol: { timeoutMs: 30, retries: 0, pollIntervalMs: 5, drainTimeoutMs: 20 },
  opm: { ...config.opm, timeoutMs: 50, retryBackoffMs: 0, unitSwitchDelayMs: 0, interReadDelayMs: 0 },
  sweep: { settleMs: 0 },
};
