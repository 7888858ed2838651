/**
 * DAC Controller
 *
 * Validated setpoint writes to the MCU's 4-channel 12-bit DAC. Out-of-range
 * requests are answered with `accepted: false` and never reach the port.
 */

import { z } from 'zod';
import { log, Logger, LogMetadata } from '../../utils/logger.js';
import { DAC_CHANNEL_COUNT, DAC_MAX_CODE } from '../../types/bench-types.js';
import type { SendOptions } from '../protocol/command-protocol.js';
import type { InstrumentLink, McuLink } from './mcu-link.js';

// ============================================================================
// Types
// ============================================================================

export const DacControllerOptionsSchema = z.object({
  /** Reference voltage used by setVoltage when none is passed */
  vref: z.number().positive().default(3.3),
  /** Ack deadline when a call does not pass one */
  timeoutMs: z.number().int().positive().default(2000),
  /** Re-sends of a setpoint whose ack went missing */
  retries: z.number().int().nonnegative().default(0),
});

export type DacControllerOptions = z.input<typeof DacControllerOptionsSchema>;

export interface SetpointOptions {
  /** Wait for the firmware's acknowledgement line; defaults to true */
  waitAck?: boolean;
  timeoutMs?: number;
}

export interface SetpointResult {
  /** The command passed validation and was written to the port */
  accepted: boolean;
  /** Acknowledgement line, null when none was requested or none arrived */
  ack: string | null;
  /** Firmware verdict: '1' applied, '0' refused; null when unknown */
  deviceApplied: boolean | null;
  /** Why the request was not accepted */
  reason?: string;
}

// ============================================================================
// Conversions
// ============================================================================

/**
 * `round(voltage / vref * 4095)`, clamped into the code range.
 */
export function codeFromVoltage(voltage: number, vref: number): number {
  const code = Math.round((voltage / vref) * DAC_MAX_CODE);
  return Math.min(DAC_MAX_CODE, Math.max(0, code));
}

export function voltageFromCode(code: number, vref: number): number {
  return (code / DAC_MAX_CODE) * vref;
}

export function isValidDacChannel(channel: number): boolean {
  return Number.isInteger(channel) && channel >= 0 && channel < DAC_CHANNEL_COUNT;
}

export function isValidDacCode(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code <= DAC_MAX_CODE;
}

function parseAck(ack: string | null): boolean | null {
  if (ack === '1') return true;
  if (ack === '0') return false;
  return null;
}

// ============================================================================
// DAC Controller
// ============================================================================

export class DacController implements InstrumentLink {
  readonly channelCount = DAC_CHANNEL_COUNT;
  private readonly options: z.infer<typeof DacControllerOptionsSchema>;
  private readonly logger: Logger;

  constructor(private readonly link: McuLink, options: DacControllerOptions = {}) {
    this.options = DacControllerOptionsSchema.parse(options);
    this.logger = log.child({ service: 'dac-controller', port: link.path });
  }

  get vref(): number {
    return this.options.vref;
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

  /**
   * Set one channel to a raw DAC code (`<channel>,<code>`).
   */
  async setCode(channel: number, code: number, options: SetpointOptions = {}): Promise<SetpointResult> {
    if (!isValidDacChannel(channel)) {
      return this.reject(`Channel must be 0-${DAC_CHANNEL_COUNT - 1}, got ${channel}`, { channel, code });
    }
    if (!isValidDacCode(code)) {
      return this.reject(`DAC code must be an integer 0-${DAC_MAX_CODE}, got ${code}`, { channel, code });
    }

    return this.write(`${channel},${code}`, options, { channel, code });
  }

  /**
   * Set one channel to a voltage, converted with `vref`.
   */
  async setVoltage(
    channel: number,
    voltage: number,
    vref: number = this.options.vref,
    options: SetpointOptions = {}
  ): Promise<SetpointResult> {
    if (!(vref > 0)) {
      return this.reject(`Reference voltage must be positive, got ${vref}`, { channel, voltage, vref });
    }
    if (!(voltage >= 0 && voltage <= vref)) {
      return this.reject(`Voltage must be within 0-${vref}V, got ${voltage}`, { channel, voltage, vref });
    }

    return this.setCode(channel, codeFromVoltage(voltage, vref), options);
  }

  /**
   * Set every channel to the same code in one command (`set_all,<code>`).
   */
  async setAll(code: number, options: SetpointOptions = {}): Promise<SetpointResult> {
    if (!isValidDacCode(code)) {
      return this.reject(`DAC code must be an integer 0-${DAC_MAX_CODE}, got ${code}`, { code });
    }

    return this.write(`set_all,${code}`, options, { code });
  }

  private async write(
    requestLine: string,
    options: SetpointOptions,
    metadata: LogMetadata
  ): Promise<SetpointResult> {
    const waitAck = options.waitAck ?? true;

    if (!waitAck) {
      // The firmware acks every setpoint; the protocol drops the ack unread
      const written = await this.link.sendCommand(requestLine, { expectResponse: false, discardReply: true });
      this.trace('Setpoint sent', { ...metadata, written });
      return written
        ? { accepted: true, ack: null, deviceApplied: null }
        : { accepted: false, ack: null, deviceApplied: null, reason: 'Write to port failed' };
    }

    const result = await this.link.request(requestLine, {
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      retries: this.options.retries,
    });

    if (!result.written) {
      return { accepted: false, ack: null, deviceApplied: null, reason: 'Write to port failed' };
    }

    if (result.response === null) {
      this.logger.warn('Setpoint sent but not acknowledged', metadata);
    } else {
      this.trace('Setpoint acknowledged', { ...metadata, ack: result.response });
    }

    return {
      accepted: true,
      ack: result.response,
      deviceApplied: parseAck(result.response),
    };
  }

  private reject(reason: string, metadata: LogMetadata): SetpointResult {
    this.logger.warn('Setpoint rejected', { ...metadata, reason });
    return { accepted: false, ack: null, deviceApplied: null, reason };
  }

  private trace(message: string, metadata: LogMetadata): void {
    if (this.link.verbose) this.logger.info(message, metadata);
    else this.logger.debug(message, metadata);
  }
}
