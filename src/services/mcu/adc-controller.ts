/**
 * ADC Controller
 *
 * Channel reads from the MCU's 4-channel ADC. Every read degrades to null on
 * silence or a malformed reply; currents are derived through a per-channel
 * shunt resistance table.
 */

import { z } from 'zod';
import { log, Logger, LogMetadata } from '../../utils/logger.js';
import { parseInteger, parseNumber } from '../../utils/parsing.js';
import { ADC_CHANNEL_COUNT } from '../../types/bench-types.js';
import type { SendOptions } from '../protocol/command-protocol.js';
import type { InstrumentLink, McuLink } from './mcu-link.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_SHUNT_RESISTANCES: readonly number[] = Object.freeze([1.0, 1.0, 1.0, 1.0]);

export const AdcControllerOptionsSchema = z.object({
  /** Shunt resistance per channel in ohms */
  shuntResistances: z
    .array(z.number().positive().finite())
    .length(ADC_CHANNEL_COUNT)
    .default([...DEFAULT_SHUNT_RESISTANCES]),
  /** Reply deadline when a call does not pass one */
  timeoutMs: z.number().int().positive().default(2000),
  /** Re-sends of a query whose reply went missing */
  retries: z.number().int().nonnegative().default(0),
});

export type AdcControllerOptions = z.input<typeof AdcControllerOptionsSchema>;

export interface ReadOptions {
  timeoutMs?: number;
}

export interface VoltageReading {
  voltage: number;
  /** Raw converter code, when the firmware appends one */
  raw: number | null;
}

export interface BusTestResult {
  ok: boolean;
  /** Config word on success, error text on failure, null on silence */
  detail: string | null;
}

// ============================================================================
// Reply Parsing
// ============================================================================

/**
 * `<voltage>` or `<voltage>,<raw_code>`
 */
export function parseVoltageReply(line: string): VoltageReading | null {
  const fields = line.split(',');
  if (fields.length > 2) return null;

  const voltage = parseNumber(fields[0]);
  if (voltage === null) return null;

  if (fields.length === 1) return { voltage, raw: null };

  const raw = parseInteger(fields[1]);
  return raw === null ? null : { voltage, raw };
}

export function isValidAdcChannel(channel: number): boolean {
  return Number.isInteger(channel) && channel >= 0 && channel < ADC_CHANNEL_COUNT;
}

// ============================================================================
// ADC Controller
// ============================================================================

export class AdcController implements InstrumentLink {
  readonly channelCount = ADC_CHANNEL_COUNT;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private shunts: number[];
  private readonly logger: Logger;

  constructor(private readonly link: McuLink, options: AdcControllerOptions = {}) {
    const parsed = AdcControllerOptionsSchema.parse(options);
    this.shunts = [...parsed.shuntResistances];
    this.timeoutMs = parsed.timeoutMs;
    this.retries = parsed.retries;
    this.logger = log.child({ service: 'adc-controller', port: link.path });
  }

  connect(): Promise<void> {
    return this.link.connect();
  }

  close(): Promise<void> {
    return this.link.close();
  }

  isConnected(): boolean {
    return this.link.isConnected();
  }

  sendCommand(requestLine: string, options?: SendOptions): Promise<boolean> {
    return this.link.sendCommand(requestLine, options);
  }

  waitResponse(timeoutMs?: number): Promise<string | null> {
    return this.link.waitResponse(timeoutMs);
  }

  checkCommunication(timeoutMs?: number): Promise<boolean> {
    return this.link.checkCommunication(timeoutMs);
  }

  // ==========================================================================
  // Shunt Resistances
  // ==========================================================================

  getShuntResistances(): number[] {
    return [...this.shunts];
  }

  getShuntResistance(channel: number): number | null {
    return isValidAdcChannel(channel) ? this.shunts[channel] : null;
  }

  /**
   * Returns false, leaving the table untouched, for a bad channel or value.
   */
  setShuntResistance(channel: number, ohms: number): boolean {
    if (!isValidAdcChannel(channel) || !(ohms > 0) || !Number.isFinite(ohms)) {
      this.logger.warn('Shunt resistance rejected', { channel, ohms });
      return false;
    }
    this.shunts[channel] = ohms;
    return true;
  }

  setShuntResistances(ohms: readonly number[]): boolean {
    const valid = ohms.length === ADC_CHANNEL_COUNT && ohms.every((r) => r > 0 && Number.isFinite(r));
    if (!valid) {
      this.logger.warn('Shunt resistance table rejected', { ohms: [...ohms] });
      return false;
    }
    this.shunts = [...ohms];
    return true;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Voltage on one channel (`read_adc,<channel>`), null on silence or garbage.
   */
  async readVoltage(channel: number, options: ReadOptions = {}): Promise<number | null> {
    const reading = await this.readVoltageDetailed(channel, options);
    return reading === null ? null : reading.voltage;
  }

  async readVoltageDetailed(channel: number, options: ReadOptions = {}): Promise<VoltageReading | null> {
    if (!isValidAdcChannel(channel)) {
      this.logger.warn('Read rejected', { channel, reason: 'channel out of range' });
      return null;
    }

    const line = await this.query(`read_adc,${channel}`, options, { channel });
    if (line === null) return null;

    const reading = parseVoltageReply(line);
    if (reading === null) {
      this.logger.warn('Unparseable ADC reply', { channel, response: line });
    } else {
      this.trace('ADC read', { channel, ...reading });
    }
    return reading;
  }

  /**
   * Shunt current on one channel: readVoltage / shunt[channel].
   */
  async readCurrent(channel: number, options: ReadOptions = {}): Promise<number | null> {
    const voltage = await this.readVoltage(channel, options);
    if (voltage === null) return null;
    return voltage / this.shunts[channel];
  }

  async readAllVoltages(options: ReadOptions = {}): Promise<Array<number | null>> {
    const readings: Array<number | null> = [];
    for (let channel = 0; channel < ADC_CHANNEL_COUNT; channel++) {
      readings.push(await this.readVoltage(channel, options));
    }
    return readings;
  }

  async readAllCurrents(options: ReadOptions = {}): Promise<Array<number | null>> {
    const readings: Array<number | null> = [];
    for (let channel = 0; channel < ADC_CHANNEL_COUNT; channel++) {
      readings.push(await this.readCurrent(channel, options));
    }
    return readings;
  }

  /**
   * Raw converter code (`read_adc_raw,<channel>`).
   */
  async readRaw(channel: number, options: ReadOptions = {}): Promise<number | null> {
    if (!isValidAdcChannel(channel)) {
      this.logger.warn('Raw read rejected', { channel, reason: 'channel out of range' });
      return null;
    }

    const line = await this.query(`read_adc_raw,${channel}`, options, { channel });
    if (line === null) return null;
    const raw = parseInteger(line);
    if (raw === null) {
      this.logger.warn('Unparseable raw ADC reply', { channel, response: line });
    }
    return raw;
  }

  /**
   * Ask the firmware to self-test the ADC bus (`test_adc`); `OK:<config>` passes.
   */
  async testBus(options: ReadOptions = {}): Promise<BusTestResult> {
    const line = await this.query('test_adc', options, {});
    if (line === null) return { ok: false, detail: null };

    if (line.toUpperCase().startsWith('OK:')) {
      return { ok: true, detail: line.slice(3) };
    }
    this.logger.warn('ADC bus test failed', { response: line });
    return { ok: false, detail: line };
  }

  private async query(requestLine: string, options: ReadOptions, metadata: LogMetadata): Promise<string | null> {
    const result = await this.link.request(requestLine, {
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      retries: this.retries,
    });
    if (result.response === null) {
      this.logger.warn('No reply from ADC', { ...metadata, request: requestLine });
    }
    return result.response;
  }

  private trace(message: string, metadata: LogMetadata): void {
    if (this.link.verbose) this.logger.info(message, metadata);
    else this.logger.debug(message, metadata);
  }
}
