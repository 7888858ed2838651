/**
 * Sweep Engine
 *
 * Drives the DAC through setpoint schedules and samples the ADC and optical
 * power meter after each settle delay. Three schedule shapes are supported:
 *
 * - single channel: one schedule, acknowledged writes
 * - synchronized: all four channels share a step count and move together
 * - independent: per-channel step counts; short schedules hold their final value
 *
 * Sweeps never throw for bad input or flaky instruments. Invalid schedules come
 * back as `rejected` before any I/O; failed reads degrade to sentinels inside
 * the sample. Cancellation is honoured between steps only.
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { log, toError, Logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { delay } from '../../utils/timing.js';
import { DAC_CHANNEL_COUNT } from '../../types/bench-types.js';
import type {
  MeasurementSample,
  SweepResult,
  SweepSchedule,
  SweepStatus,
  SweepStep,
} from '../../types/bench-types.js';
import type { DacController } from '../mcu/dac-controller.js';
import { isValidAdcChannel } from '../mcu/adc-controller.js';
import type { AdcController } from '../mcu/adc-controller.js';
import type { PowerMeterController } from '../opm/power-meter-controller.js';
import {
  interpolate,
  maxSteps,
  synchronizedSchedules,
  validateSchedule,
  validateSchedules,
} from './schedule.js';

// ============================================================================
// Types
// ============================================================================

export const SweepEngineOptionsSchema = z.object({
  /** Wait between the last setpoint write of a step and its reads */
  settleMs: z.number().int().nonnegative().default(100),
});

export type SweepEngineOptions = z.input<typeof SweepEngineOptionsSchema>;

export interface SweepDevices {
  dac: DacController;
  adc: AdcController;
  /** Optical readings are NaN without a meter */
  opm?: PowerMeterController | null;
}

export type SweepKind = 'channel' | 'all' | 'independent' | 'iv';

export interface SweepRunOptions {
  /** Checked before every step */
  signal?: AbortSignal;
  settleMs?: number;
  /** Wait for each setpoint's ack; defaults differ per sweep kind */
  waitAck?: boolean;
}

export interface MeasurePointRequest {
  dacChannel: number;
  code: number;
  adcChannel: number;
  opmChannel?: number;
  settleMs?: number;
}

export interface IvSweepRequest {
  schedule: SweepSchedule;
  adcChannel: number;
  opmChannel?: number;
}

export interface SweepStartedEvent {
  id: string;
  kind: SweepKind;
  plannedSteps: number;
}

export interface SweepStepEvent<T> {
  id: string;
  kind: SweepKind;
  step: number;
  record: T;
}

export interface SweepCompletedEvent<T> {
  kind: SweepKind;
  result: SweepResult<T>;
}

// ============================================================================
// Sweep Engine
// ============================================================================

export class SweepEngine extends EventEmitter {
  private readonly options: z.infer<typeof SweepEngineOptionsSchema>;
  private readonly logger: Logger;

  constructor(private readonly devices: SweepDevices, options: SweepEngineOptions = {}) {
    super();
    this.options = SweepEngineOptionsSchema.parse(options);
    this.logger = log.child({ service: 'sweep-engine' });
  }

  /**
   * Step one DAC channel through its schedule, acknowledging every write.
   */
  async sweepChannel(schedule: SweepSchedule, options: SweepRunOptions = {}): Promise<SweepResult<SweepStep>> {
    const waitAck = options.waitAck ?? true;
    const settleMs = options.settleMs ?? this.options.settleMs;

    return this.run('channel', schedule.steps, validateSchedule(schedule), options, async (step) => {
      const code = interpolate(schedule, step);
      const result = await this.devices.dac.setCode(schedule.channel, code, { waitAck });
      await delay(settleMs);
      return freezeStep(step, [[schedule.channel, code, result.ack]]);
    });
  }

  /**
   * Move all four DAC channels together. Every channel is written before the
   * step's settle delay starts.
   */
  async sweepAllChannels(
    starts: readonly number[],
    ends: readonly number[],
    steps: number,
    options: SweepRunOptions = {}
  ): Promise<SweepResult<SweepStep>> {
    const issues: string[] = [];
    let schedules: SweepSchedule[] = [];
    if (starts.length !== DAC_CHANNEL_COUNT || ends.length !== DAC_CHANNEL_COUNT) {
      issues.push(
        `starts and ends need ${DAC_CHANNEL_COUNT} entries each, got ${starts.length} and ${ends.length}`
      );
    } else {
      schedules = synchronizedSchedules(starts, ends, steps);
      issues.push(...validateSchedules(schedules));
    }

    return this.runSchedules('all', schedules, steps, issues, { ...options, waitAck: options.waitAck ?? false });
  }

  /**
   * Drive several channels with their own step counts. The sweep lasts as
   * long as the longest schedule; a finished schedule holds its end value.
   */
  async sweepIndependent(
    schedules: readonly SweepSchedule[],
    options: SweepRunOptions = {}
  ): Promise<SweepResult<SweepStep>> {
    const issues = validateSchedules(schedules);
    const plannedSteps = issues.length === 0 ? maxSteps(schedules) : 0;

    return this.runSchedules('independent', schedules, plannedSteps, issues, {
      ...options,
      waitAck: options.waitAck ?? false,
    });
  }

  /**
   * Set one code, settle, and take one composite sample.
   */
  async measurePoint(request: MeasurePointRequest): Promise<MeasurementSample> {
    const issues = this.validateMeasurement(request.adcChannel, request.opmChannel);
    issues.push(...validateSchedule({ channel: request.dacChannel, start: request.code, end: request.code, steps: 1 }));
    if (issues.length > 0) {
      throw new ValidationError(issues.join('; '), { operation: 'measurePoint', input: request });
    }

    return this.sample(request, this.devices.adc.getShuntResistances(), request.settleMs ?? this.options.settleMs);
  }

  /**
   * Single-channel schedule with a composite sample at every step. The shunt
   * table is captured once, when the sweep starts.
   */
  async sweepIvCurve(request: IvSweepRequest, options: SweepRunOptions = {}): Promise<SweepResult<MeasurementSample>> {
    const { schedule, adcChannel, opmChannel } = request;
    const issues = [...validateSchedule(schedule), ...this.validateMeasurement(adcChannel, opmChannel)];
    const shunts = this.devices.adc.getShuntResistances();
    const settleMs = options.settleMs ?? this.options.settleMs;

    return this.run('iv', schedule.steps, issues, options, (step) =>
      this.sample(
        { dacChannel: schedule.channel, code: interpolate(schedule, step), adcChannel, opmChannel },
        shunts,
        settleMs
      )
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private runSchedules(
    kind: SweepKind,
    schedules: readonly SweepSchedule[],
    plannedSteps: number,
    issues: string[],
    options: SweepRunOptions
  ): Promise<SweepResult<SweepStep>> {
    const settleMs = options.settleMs ?? this.options.settleMs;
    const waitAck = options.waitAck ?? false;

    return this.run(kind, plannedSteps, issues, options, async (step) => {
      const applied: Array<[number, number, string | null]> = [];
      for (const schedule of schedules) {
        const code = interpolate(schedule, step);
        const result = await this.devices.dac.setCode(schedule.channel, code, { waitAck });
        applied.push([schedule.channel, code, result.ack]);
      }
      await delay(settleMs);
      return freezeStep(step, applied);
    });
  }

  private async run<T>(
    kind: SweepKind,
    plannedSteps: number,
    issues: string[],
    options: SweepRunOptions,
    executeStep: (step: number) => Promise<T>
  ): Promise<SweepResult<T>> {
    const id = uuidv4();
    const startedAt = new Date().toISOString();
    const logger = this.logger.child({ sweepId: id, operation: kind });
    const records: T[] = [];
    if (issues.length > 0) plannedSteps = 0;

    const finish = (status: SweepStatus): SweepResult<T> => {
      const result: SweepResult<T> = {
        id,
        status,
        plannedSteps,
        records,
        issues,
        startedAt,
        finishedAt: new Date().toISOString(),
      };
      const completed: SweepCompletedEvent<T> = { kind, result };
      this.emit('sweep:completed', completed);
      return result;
    };

    if (issues.length > 0) {
      logger.warn('Sweep rejected', { issues });
      return finish('rejected');
    }

    const started: SweepStartedEvent = { id, kind, plannedSteps };
    this.emit('sweep:started', started);
    logger.info('Sweep started', { plannedSteps });
    const startTime = Date.now();

    try {
      for (let step = 0; step < plannedSteps; step++) {
        if (options.signal?.aborted) {
          logger.info('Sweep cancelled', { completedSteps: records.length, plannedSteps });
          return finish('cancelled');
        }

        const record = await executeStep(step);
        records.push(record);
        const stepEvent: SweepStepEvent<T> = { id, kind, step, record };
        this.emit('sweep:step', stepEvent);
      }
    } catch (error) {
      logger.error('Sweep aborted by error', toError(error), { completedSteps: records.length });
      throw error;
    }

    logger.info('Sweep completed', { steps: records.length, duration: Date.now() - startTime });
    return finish('completed');
  }

  private validateMeasurement(adcChannel: number, opmChannel: number | undefined): string[] {
    const issues: string[] = [];
    if (!isValidAdcChannel(adcChannel)) {
      issues.push(`adcChannel must be 0-${this.devices.adc.channelCount - 1}, got ${adcChannel}`);
    }
    const opm = this.devices.opm;
    if (opmChannel !== undefined && opm && opm.isConnected() && !opm.isValidChannel(opmChannel)) {
      issues.push(`opmChannel must be 0-${opm.channelCount - 1}, got ${opmChannel}`);
    }
    return issues;
  }

  private async sample(
    request: MeasurePointRequest,
    shunts: readonly number[],
    settleMs: number
  ): Promise<MeasurementSample> {
    const { dacChannel, code, adcChannel, opmChannel } = request;

    const written = await this.devices.dac.setCode(dacChannel, code, { waitAck: true });
    if (!written.accepted) {
      this.logger.warn('Setpoint not applied, sampling anyway', { channel: dacChannel, code, reason: written.reason });
    }
    await delay(settleMs);

    const voltage = (await this.devices.adc.readVoltage(adcChannel)) ?? 0;
    const current = voltage / shunts[adcChannel];

    let powerOpticalMw = NaN;
    let powerOpticalDbm = NaN;
    const opm = this.devices.opm;
    if (opm && opmChannel !== undefined && opm.isConnected()) {
      powerOpticalMw = (await opm.getPowerMilliwatt(opmChannel)) ?? NaN;
      powerOpticalDbm = (await opm.getPower(opmChannel)) ?? NaN;
    }

    return Object.freeze({
      setpoint: code,
      voltage,
      current,
      powerElectrical: voltage * current,
      powerOpticalMw,
      powerOpticalDbm,
    });
  }
}

function freezeStep(step: number, applied: ReadonlyArray<[number, number, string | null]>): SweepStep {
  const setpoints: Record<number, number> = {};
  const acks: Record<number, string | null> = {};
  for (const [channel, code, ack] of applied) {
    setpoints[channel] = code;
    acks[channel] = ack;
  }
  return Object.freeze({ step, setpoints: Object.freeze(setpoints), acks: Object.freeze(acks) });
}
