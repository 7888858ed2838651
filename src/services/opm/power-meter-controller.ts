/**
 * Optical Power Meter Controller
 *
 * Query-based driver for multi-channel optical power meters. Channels are
 * numbered from 0 here and from 1 on the wire. Reads retry briefly on
 * timeouts or garbage and degrade to null (NaN inside channel arrays).
 *
 * The meter's unit setting is shared device state: anything that switches
 * it temporarily puts it back, even when the read in between fails.
 */

import { z } from 'zod';
import { log, toError, Logger, LogMetadata } from '../../utils/logger.js';
import { PortUnavailableError, ParseFailureError } from '../../utils/errors.js';
import { delay } from '../../utils/timing.js';
import { decodeFloat32LE } from '../transport/binary-block.js';
import { parseNumber } from '../../utils/parsing.js';
import type { InstrumentTransport } from '../transport/types.js';
import type { OpmChannelCount, PowerRange, UnitMode } from '../../types/bench-types.js';

// ============================================================================
// Options
// ============================================================================

export const PowerMeterOptionsSchema = z.object({
  /** Deadline for one query */
  timeoutMs: z.number().int().positive().default(10000),
  /** Extra attempts of a power read after a timeout or parse failure */
  retries: z.number().int().nonnegative().default(2),
  /** Pause between power read attempts */
  retryBackoffMs: z.number().int().nonnegative().default(100),
  /** Pause after switching units before reading */
  unitSwitchDelayMs: z.number().int().nonnegative().default(50),
  /** Pause between channels in getAllPowers */
  interReadDelayMs: z.number().int().nonnegative().default(50),
});

export type PowerMeterOptions = z.input<typeof PowerMeterOptionsSchema>;

export interface AllPowersOptions {
  /** Try the single binary `read:pow:all?` query first */
  batched?: boolean;
}

// ============================================================================
// Identity
// ============================================================================

const CHANNEL_COUNT_RULES: ReadonlyArray<{ pattern: RegExp; channels: OpmChannelCount }> = [
  { pattern: /N774[45]/, channels: 8 },
  { pattern: /MY61C00155/, channels: 4 },
];

export const DEFAULT_OPM_CHANNEL_COUNT: OpmChannelCount = 2;

/**
 * Channel count for an `*IDN?` reply; unknown models get the default.
 */
export function channelCountFromIdentity(identity: string): OpmChannelCount {
  const rule = CHANNEL_COUNT_RULES.find(({ pattern }) => pattern.test(identity));
  return rule ? rule.channels : DEFAULT_OPM_CHANNEL_COUNT;
}

// ============================================================================
// Power Meter Controller
// ============================================================================

export class PowerMeterController {
  private readonly options: z.infer<typeof PowerMeterOptionsSchema>;
  private readonly logger: Logger;
  private channels: OpmChannelCount | null = null;
  private identity: string | null = null;

  constructor(private readonly transport: InstrumentTransport, options: PowerMeterOptions = {}) {
    this.options = PowerMeterOptionsSchema.parse(options);
    this.logger = log.child({ service: 'power-meter', resource: transport.resource });
  }

  /** 0 until connect() has identified the instrument */
  get channelCount(): number {
    return this.channels ?? 0;
  }

  get id(): string | null {
    return this.identity;
  }

  isConnected(): boolean {
    return this.channels !== null && this.transport.isOpen();
  }

  /**
   * Open the link and size the channel table from `*IDN?`. A meter that does
   * not identify itself is closed again.
   */
  async connect(): Promise<void> {
    try {
      await this.transport.open();
    } catch (error) {
      throw new PortUnavailableError(this.transport.resource, toError(error).message, {
        operation: 'connect',
      });
    }

    let identity: string;
    try {
      identity = (await this.transport.query('*IDN?', this.options.timeoutMs)).trim();
    } catch (error) {
      this.logger.error('Identity query failed', toError(error));
      await this.transport.close();
      throw error;
    }

    this.identity = identity;
    this.channels = channelCountFromIdentity(identity);
    this.logger.info('Power meter identified', { identity, channels: this.channels });
  }

  async close(): Promise<void> {
    this.channels = null;
    await this.transport.close();
  }

  isValidChannel(channel: number): boolean {
    return Number.isInteger(channel) && channel >= 0 && channel < this.channelCount;
  }

  // ==========================================================================
  // Power
  // ==========================================================================

  /**
   * Power on one channel in whatever unit the channel reports.
   */
  async getPower(channel: number, retries: number = this.options.retries): Promise<number | null> {
    if (!this.checkChannel(channel, 'getPower')) return null;
    const command = `read${wire(channel)}:pow?`;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const reply = await this.transport.query(command, this.options.timeoutMs);
        const value = parseNumber(reply);
        if (value === null) {
          throw new ParseFailureError('optical power', reply, { operation: 'getPower', channel });
        }
        return value;
      } catch (error) {
        this.logger.debug('Power read failed', {
          channel,
          attempt: attempt + 1,
          error: toError(error).message,
        });
        if (attempt < retries) {
          await delay(this.options.retryBackoffMs);
        }
      }
    }

    this.logger.warn('Power read gave up', { channel, attempts: retries + 1 });
    return null;
  }

  /**
   * Power in milliwatts. A channel reporting dBm is switched to Watt for the
   * read and switched back afterwards.
   */
  async getPowerMilliwatt(channel: number): Promise<number | null> {
    if (!this.checkChannel(channel, 'getPowerMilliwatt')) return null;

    const originalUnit = await this.getUnit(channel);
    const switched = originalUnit === 'dBm';

    try {
      if (switched) {
        await this.setUnit(channel, 'Watt');
        await delay(this.options.unitSwitchDelayMs);
      }
      const watts = await this.getPower(channel);
      return watts === null ? null : watts * 1000;
    } finally {
      if (switched) {
        await this.setUnit(channel, 'dBm');
      }
    }
  }

  /**
   * Power on every channel, NaN where a read failed. Sequential single-channel
   * reads by default; `batched` tries the binary all-channel query first.
   */
  async getAllPowers(options: AllPowersOptions = {}): Promise<number[]> {
    if (options.batched) {
      const batched = await this.readAllBatched();
      if (batched !== null) return batched;
    }

    const powers: number[] = [];
    for (let channel = 0; channel < this.channelCount; channel++) {
      if (channel > 0) await delay(this.options.interReadDelayMs);
      const power = await this.getPower(channel);
      powers.push(power ?? NaN);
    }
    return powers;
  }

  private async readAllBatched(): Promise<number[] | null> {
    try {
      const payload = await this.transport.queryBinary('read:pow:all?', this.options.timeoutMs);
      const values = decodeFloat32LE(payload);
      if (values.length < this.channelCount) {
        throw new ParseFailureError('all-channel power block', `${values.length} values`, {
          operation: 'getAllPowers',
        });
      }
      return values.slice(0, this.channelCount);
    } catch (error) {
      this.logger.warn('Batched power read failed, falling back to per-channel reads', {
        error: toError(error).message,
      });
      return null;
    }
  }

  // ==========================================================================
  // Unit
  // ==========================================================================

  async setUnit(channel: number, unit: UnitMode): Promise<boolean> {
    if (!this.checkChannel(channel, 'setUnit')) return false;
    return this.write(`sens${wire(channel)}:pow:unit ${unit === 'dBm' ? 0 : 1}`, { channel, unit });
  }

  /**
   * Current unit of a channel. An unreadable reply is assumed to mean dBm.
   */
  async getUnit(channel: number): Promise<UnitMode | null> {
    if (!this.checkChannel(channel, 'getUnit')) return null;

    const reply = await this.ask(`sens${wire(channel)}:pow:unit?`, { channel });
    const code = reply === null ? NaN : parseInt(reply, 10);
    if (Number.isNaN(code)) {
      this.logger.warn('Unit query unreadable, assuming dBm', { channel, response: reply });
      return 'dBm';
    }
    return code === 0 ? 'dBm' : 'Watt';
  }

  // ==========================================================================
  // Wavelength
  // ==========================================================================

  async setWavelength(channel: number, nanometers: number): Promise<boolean> {
    if (!this.checkChannel(channel, 'setWavelength')) return false;
    if (!(nanometers > 0) || !Number.isFinite(nanometers)) {
      this.logger.warn('Wavelength rejected', { channel, nanometers });
      return false;
    }
    return this.write(`sens${wire(channel)}:pow:wav ${nanometers}nm`, { channel, nanometers });
  }

  /**
   * Wavelength in nanometers (the meter reports meters).
   */
  async getWavelength(channel: number): Promise<number | null> {
    if (!this.checkChannel(channel, 'getWavelength')) return null;

    const reply = await this.ask(`sens${wire(channel)}:pow:wav?`, { channel });
    const meters = reply === null ? null : parseNumber(reply);
    return meters === null ? null : meters * 1e9;
  }

  // ==========================================================================
  // Range
  // ==========================================================================

  async setAutoRange(channel: number, enabled: boolean): Promise<boolean> {
    if (!this.checkChannel(channel, 'setAutoRange')) return false;
    return this.write(`sens${wire(channel)}:pow:rang:auto ${enabled ? 1 : 0}`, { channel, enabled });
  }

  async isAutoRange(channel: number): Promise<boolean> {
    if (!this.checkChannel(channel, 'isAutoRange')) return false;

    const reply = await this.ask(`sens${wire(channel)}:pow:rang:auto?`, { channel });
    const code = reply === null ? NaN : parseInt(reply, 10);
    return !Number.isNaN(code) && code !== 0;
  }

  /**
   * Fixed range in dBm, or 'auto'. A fixed range turns auto-ranging off first.
   */
  async setRange(channel: number, range: number | 'auto'): Promise<boolean> {
    if (!this.checkChannel(channel, 'setRange')) return false;
    if (range === 'auto') return this.setAutoRange(channel, true);

    if (!Number.isFinite(range)) {
      this.logger.warn('Range rejected', { channel, range });
      return false;
    }
    const autoOff = await this.setAutoRange(channel, false);
    const applied = await this.write(`sens${wire(channel)}:pow:rang ${range}dbm`, { channel, range });
    return autoOff && applied;
  }

  async getRange(channel: number): Promise<PowerRange | null> {
    if (!this.checkChannel(channel, 'getRange')) return null;
    if (await this.isAutoRange(channel)) return { mode: 'auto' };

    const reply = await this.ask(`sens${wire(channel)}:pow:rang?`, { channel });
    const dBm = reply === null ? null : parseNumber(reply);
    return dBm === null ? null : { mode: 'manual', dBm };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private checkChannel(channel: number, operation: string): boolean {
    if (this.isValidChannel(channel)) return true;
    this.logger.warn('Channel out of range', { channel, operation, channels: this.channelCount });
    return false;
  }

  private async write(command: string, metadata: LogMetadata): Promise<boolean> {
    try {
      await this.transport.write(command);
      this.logger.debug('Command sent', { ...metadata, command });
      return true;
    } catch (error) {
      this.logger.error('Command failed', toError(error), { ...metadata, command });
      return false;
    }
  }

  private async ask(command: string, metadata: LogMetadata): Promise<string | null> {
    try {
      return (await this.transport.query(command, this.options.timeoutMs)).trim();
    } catch (error) {
      this.logger.warn('Query failed', { ...metadata, command, error: toError(error).message });
      return null;
    }
  }
}

function wire(channel: number): number {
  return channel + 1;
}
