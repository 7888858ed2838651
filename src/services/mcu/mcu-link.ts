/**
 * MCU Link
 *
 * Owns the MCU's serial port: the port lease, the transport and the command
 * protocol on top of it. DAC and ADC controllers that share a physical port
 * share one link; two links on the same port cannot be connected at once.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { log, toError, Logger } from '../../utils/logger.js';
import { PortUnavailableError } from '../../utils/errors.js';
import { delay } from '../../utils/timing.js';
import {
  CommandProtocol,
  CommandProtocolOptionsSchema,
  ExchangeOptions,
  ExchangeResult,
  SendOptions,
} from '../protocol/command-protocol.js';
import { PortRegistry, portRegistry } from '../transport/port-registry.js';
import type { TransportChannel } from '../transport/types.js';

// ============================================================================
// Capability Interface
// ============================================================================

/**
 * What every line-protocol instrument offers, regardless of what it drives.
 */
export interface InstrumentLink {
  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;
  sendCommand(requestLine: string, options?: SendOptions): Promise<boolean>;
  waitResponse(timeoutMs?: number): Promise<string | null>;
  checkCommunication(timeoutMs?: number): Promise<boolean>;
}

// ============================================================================
// Options
// ============================================================================

export const McuLinkOptionsSchema = z.object({
  /** Lease owner name shown in PortUnavailable errors */
  name: z.string().default('mcu'),
  /** Wait after opening; the board resets when the port opens */
  openDelayMs: z.number().int().nonnegative().default(2000),
  /** Wait after the best-effort release before the single re-open attempt */
  releaseDelayMs: z.number().int().nonnegative().default(1000),
  protocol: CommandProtocolOptionsSchema.default({}),
});

export type McuLinkOptions = z.input<typeof McuLinkOptionsSchema>;

// ============================================================================
// MCU Link
// ============================================================================

export class McuLink implements InstrumentLink {
  readonly owner: string;
  readonly protocol: CommandProtocol;
  private readonly openDelayMs: number;
  private readonly releaseDelayMs: number;
  private readonly logger: Logger;
  private connected = false;

  constructor(
    private readonly transport: TransportChannel,
    options: McuLinkOptions = {},
    private readonly registry: PortRegistry = portRegistry
  ) {
    const parsed = McuLinkOptionsSchema.parse(options);
    this.owner = `${parsed.name}:${uuidv4().slice(0, 8)}`;
    this.openDelayMs = parsed.openDelayMs;
    this.releaseDelayMs = parsed.releaseDelayMs;
    this.protocol = new CommandProtocol(transport, parsed.protocol);
    this.logger = log.child({ service: 'mcu-link', port: transport.path, owner: this.owner });
  }

  get path(): string {
    return this.transport.path;
  }

  get verbose(): boolean {
    return this.protocol.options.verbose;
  }

  isConnected(): boolean {
    return this.connected && this.transport.isOpen();
  }

  /**
   * Take the port lease and open the transport. On an open failure, makes one
   * best-effort release and retries once before giving up.
   */
  async connect(): Promise<void> {
    if (this.isConnected()) return;

    this.registry.acquire(this.transport.path, this.owner);

    try {
      await this.openWithSingleRetry();
    } catch (error) {
      this.registry.release(this.transport.path, this.owner);
      throw error;
    }

    this.connected = true;
    this.protocol.reset();
    await delay(this.openDelayMs);
    this.logger.info('MCU link connected');
  }

  async close(): Promise<void> {
    this.connected = false;
    this.protocol.reset();
    try {
      if (this.transport.isOpen()) {
        await this.transport.close();
      }
    } finally {
      this.registry.release(this.transport.path, this.owner);
      this.logger.info('MCU link closed');
    }
  }

  sendCommand(requestLine: string, options?: SendOptions): Promise<boolean> {
    return this.protocol.send(requestLine, options);
  }

  waitResponse(timeoutMs?: number): Promise<string | null> {
    return this.protocol.waitResponse(timeoutMs);
  }

  request(requestLine: string, options?: ExchangeOptions): Promise<ExchangeResult> {
    return this.protocol.exchange(requestLine, options);
  }

  /**
   * Liveness check: `COMM_OK` must be answered by a line containing
   * `COMM_OK` or equal to `OK`.
   */
  async checkCommunication(timeoutMs?: number): Promise<boolean> {
    const response = await this.protocol.sendAndWait('COMM_OK', { timeoutMs, retries: 0 });
    if (response === null) {
      this.logger.warn('No response to liveness check');
      return false;
    }

    const upper = response.toUpperCase();
    const ok = upper.includes('COMM_OK') || upper === 'OK';
    if (!ok) {
      this.logger.warn('Unexpected liveness response', { response });
    }
    return ok;
  }

  private async openWithSingleRetry(): Promise<void> {
    try {
      await this.transport.open();
      return;
    } catch (error) {
      this.logger.warn('Open failed, attempting release', { error: toError(error).message });
    }

    try {
      await this.transport.close();
    } catch (error) {
      this.logger.debug('Release attempt failed', { error: toError(error).message });
    }
    await delay(this.releaseDelayMs);

    try {
      await this.transport.open();
    } catch (error) {
      throw new PortUnavailableError(this.transport.path, toError(error).message, {
        operation: 'connect',
        owner: this.owner,
        suggestion: 'Close any serial monitor or debugger attached to the port',
      });
    }
  }
}
