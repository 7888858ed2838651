/**
 * Bench Session
 *
 * Wires the instruments of one measurement bench from configuration: a
 * single MCU link shared by the DAC and ADC, an optional optical power meter,
 * and the sweep engine over them. Hardware work is serialized: while one
 * operation holds the bench, any other is refused with a ConflictError.
 */

import { log, toError, Logger } from '../../utils/logger.js';
import { ConflictError } from '../../utils/errors.js';
import { config as defaultConfig, Config } from '../../config.js';
import { McuLink, DacController, AdcController } from '../mcu/index.js';
import { PowerMeterController } from '../opm/power-meter-controller.js';
import { SweepEngine, SweepKind, SweepStartedEvent } from '../sweep/sweep-engine.js';
import { SerialTransport } from '../transport/serial-transport.js';
import { ScpiSocketTransport } from '../transport/scpi-socket-transport.js';
import { PortRegistry, portRegistry } from '../transport/port-registry.js';
import type { InstrumentTransport, TransportChannel } from '../transport/types.js';

// ============================================================================
// Types
// ============================================================================

export interface BenchTransports {
  mcu: TransportChannel;
  opm?: InstrumentTransport | null;
  registry?: PortRegistry;
}

export type BenchActivityKind = SweepKind | 'point';

export interface BenchActivity {
  kind: BenchActivityKind;
  /** Sweep id, once the engine has started the sweep */
  sweepId: string | null;
  startedAt: string;
}

export interface BenchStatus {
  mcu: {
    path: string;
    connected: boolean;
  };
  opm: {
    configured: boolean;
    connected: boolean;
    identity: string | null;
    channels: number;
  };
  shuntResistances: number[];
  activity: BenchActivity | null;
}

// ============================================================================
// Bench Session
// ============================================================================

export class BenchSession {
  readonly link: McuLink;
  readonly dac: DacController;
  readonly adc: AdcController;
  readonly opm: PowerMeterController | null;
  readonly engine: SweepEngine;
  private activity: BenchActivity | null = null;
  private abortController: AbortController | null = null;
  private readonly logger: Logger;

  constructor(transports: BenchTransports, config: Config = defaultConfig) {
    this.logger = log.child({ service: 'bench-session', port: transports.mcu.path });

    this.link = new McuLink(
      transports.mcu,
      {
        name: 'bench',
        openDelayMs: config.serial.openDelayMs,
        releaseDelayMs: config.serial.releaseDelayMs,
        protocol: config.protocol,
      },
      transports.registry ?? portRegistry
    );
    this.dac = new DacController(this.link, {
      vref: config.dac.vref,
      timeoutMs: config.protocol.timeoutMs,
      retries: config.protocol.retries,
    });
    this.adc = new AdcController(this.link, {
      shuntResistances: config.adc.shuntResistances,
      timeoutMs: config.protocol.timeoutMs,
      retries: config.protocol.retries,
    });
    this.opm = transports.opm
      ? new PowerMeterController(transports.opm, {
          timeoutMs: config.opm.timeoutMs,
          retries: config.opm.retries,
          retryBackoffMs: config.opm.retryBackoffMs,
          unitSwitchDelayMs: config.opm.unitSwitchDelayMs,
          interReadDelayMs: config.opm.interReadDelayMs,
        })
      : null;

    this.engine = new SweepEngine(
      { dac: this.dac, adc: this.adc, opm: this.opm },
      { settleMs: config.sweep.settleMs }
    );
    this.engine.on('sweep:started', (event: SweepStartedEvent) => {
      if (this.activity && this.activity.sweepId === null) {
        this.activity.sweepId = event.id;
      }
    });
  }

  /**
   * Connect the MCU link, then the power meter. A meter that cannot be
   * reached fails the whole session; the MCU lease is released again.
   */
  async open(): Promise<void> {
    await this.link.connect();

    const alive = await this.link.checkCommunication();
    if (!alive) {
      this.logger.warn('MCU did not answer the liveness check; continuing');
    }

    if (this.opm) {
      try {
        await this.opm.connect();
      } catch (error) {
        this.logger.error('Power meter connection failed', toError(error));
        await this.link.close();
        throw error;
      }
    }

    this.logger.info('Bench session open', {
      opm: this.opm?.id ?? null,
      opmChannels: this.opm?.channelCount ?? 0,
    });
  }

  async close(): Promise<void> {
    this.cancelSweep();
    try {
      await this.opm?.close();
    } catch (error) {
      this.logger.warn('Power meter close failed', { error: toError(error).message });
    }
    await this.link.close();
    this.logger.info('Bench session closed');
  }

  isBusy(): boolean {
    return this.activity !== null;
  }

  /**
   * Run one hardware operation with the bench to itself. The signal handed
   * to `operation` fires when cancelSweep() is called.
   */
  async exclusive<T>(kind: BenchActivityKind, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.activity) {
      throw new ConflictError(`Bench is busy with a ${this.activity.kind} operation`, {
        operation: kind,
        activity: this.activity,
      });
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.activity = { kind, sweepId: null, startedAt: new Date().toISOString() };
    try {
      return await operation(controller.signal);
    } finally {
      this.activity = null;
      this.abortController = null;
    }
  }

  /**
   * Ask the running sweep to stop after its current step. False when idle.
   */
  cancelSweep(): boolean {
    if (!this.abortController) return false;
    this.abortController.abort();
    this.logger.info('Sweep cancellation requested', { sweepId: this.activity?.sweepId ?? undefined });
    return true;
  }

  status(): BenchStatus {
    return {
      mcu: {
        path: this.link.path,
        connected: this.link.isConnected(),
      },
      opm: {
        configured: this.opm !== null,
        connected: this.opm?.isConnected() ?? false,
        identity: this.opm?.id ?? null,
        channels: this.opm?.channelCount ?? 0,
      },
      shuntResistances: this.adc.getShuntResistances(),
      activity: this.activity ? { ...this.activity } : null,
    };
  }
}

/**
 * Session over the configured serial port and, when a resource is set, the
 * power meter's SCPI socket.
 */
export function createBenchSession(config: Config = defaultConfig): BenchSession {
  const mcu = new SerialTransport({ path: config.serial.path, baudRate: config.serial.baudRate });
  const opm = config.opm.resource ? new ScpiSocketTransport(config.opm.resource) : null;
  return new BenchSession({ mcu, opm }, config);
}
