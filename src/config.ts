/**
 * sweepbench - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  // Server Configuration
  port: z.number().default(8080),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logDir: z.string().default('/var/log/sweepbench'),

  // Build Metadata
  buildId: z.string().optional(),
  version: z.string().default('1.0.0'),
  serviceId: z.string().default('sweepbench'),

  // MCU serial link (DAC + ADC share this port)
  serial: z.object({
    path: z.string().default('/dev/ttyACM0'),
    baudRate: z.number().int().positive().default(115200),
    openDelayMs: z.number().int().nonnegative().default(2000), // MCU resets on open
    releaseDelayMs: z.number().int().nonnegative().default(1000),
  }),

  // Line protocol
  protocol: z.object({
    timeoutMs: z.number().int().positive().default(2000),
    retries: z.number().int().nonnegative().default(0),
    pollIntervalMs: z.number().int().positive().default(10),
    drainTimeoutMs: z.number().int().nonnegative().default(100),
  }),

  // Optical power meter
  opm: z.object({
    resource: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10000),
    retries: z.number().int().nonnegative().default(2),
    retryBackoffMs: z.number().int().nonnegative().default(100),
    unitSwitchDelayMs: z.number().int().nonnegative().default(50),
    interReadDelayMs: z.number().int().nonnegative().default(50),
  }),

  dac: z.object({
    vref: z.number().positive().default(3.3),
  }),

  adc: z.object({
    shuntResistances: z.array(z.number().positive()).length(4).default([1.0, 1.0, 1.0, 1.0]),
  }),

  sweep: z.object({
    settleMs: z.number().int().nonnegative().default(100),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseList(value: string | undefined): number[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((entry) => parseFloat(entry.trim()));
}

function loadConfig(): Config {
  const rawConfig = {
    port: parseInt(process.env.PORT || '8080', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    logDir: process.env.LOG_DIR || '/var/log/sweepbench',

    buildId: process.env.SWEEPBENCH_BUILD_ID,
    version: process.env.SWEEPBENCH_VERSION || '1.0.0',
    serviceId: process.env.SWEEPBENCH_SERVICE_ID || 'sweepbench',

    serial: {
      path: process.env.SERIAL_PORT || '/dev/ttyACM0',
      baudRate: parseInt(process.env.SERIAL_BAUD_RATE || '115200', 10),
      openDelayMs: parseInt(process.env.SERIAL_OPEN_DELAY_MS || '2000', 10),
      releaseDelayMs: parseInt(process.env.SERIAL_RELEASE_DELAY_MS || '1000', 10),
    },

    protocol: {
      timeoutMs: parseInt(process.env.PROTOCOL_TIMEOUT_MS || '2000', 10),
      retries: parseInt(process.env.PROTOCOL_RETRIES || '0', 10),
      pollIntervalMs: parseInt(process.env.PROTOCOL_POLL_INTERVAL_MS || '10', 10),
      drainTimeoutMs: parseInt(process.env.PROTOCOL_DRAIN_TIMEOUT_MS || '100', 10),
    },

    opm: {
      resource: process.env.OPM_RESOURCE,
      timeoutMs: parseInt(process.env.OPM_TIMEOUT_MS || '10000', 10),
      retries: parseInt(process.env.OPM_RETRIES || '2', 10),
      retryBackoffMs: parseInt(process.env.OPM_RETRY_BACKOFF_MS || '100', 10),
      unitSwitchDelayMs: parseInt(process.env.OPM_UNIT_SWITCH_DELAY_MS || '50', 10),
      interReadDelayMs: parseInt(process.env.OPM_INTER_READ_DELAY_MS || '50', 10),
    },

    dac: {
      vref: parseFloat(process.env.DAC_VREF || '3.3'),
    },

    adc: {
      shuntResistances: parseList(process.env.ADC_SHUNT_RESISTANCES) || [1.0, 1.0, 1.0, 1.0],
    },

    sweep: {
      settleMs: parseInt(process.env.SWEEP_SETTLE_MS || '100', 10),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();
