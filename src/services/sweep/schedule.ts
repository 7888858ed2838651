/**
 * Sweep Schedules
 *
 * Pure setpoint arithmetic shared by every sweep flavour. A schedule emits
 * `steps` integer DAC codes from `start` to `end`; past its own length it
 * holds `end`.
 */

import { DAC_CHANNEL_COUNT, DAC_MAX_CODE } from '../../types/bench-types.js';
import type { SweepSchedule } from '../../types/bench-types.js';

// ============================================================================
// Interpolation
// ============================================================================

/**
 * Progress through a schedule at global step `step`, clamped to [0, 1].
 */
export function progress(step: number, steps: number): number {
  if (steps <= 1) return 1;
  return Math.min(1, Math.max(0, step / (steps - 1)));
}

/**
 * Setpoint of a schedule at global step `step`: `trunc(start + p * (end - start))`.
 * A one-step schedule yields `end` immediately.
 */
export function interpolate(schedule: SweepSchedule, step: number): number {
  if (schedule.steps === 1) return schedule.end;
  const p = progress(step, schedule.steps);
  return Math.trunc(schedule.start + p * (schedule.end - schedule.start));
}

/**
 * Every setpoint the schedule emits, in order.
 */
export function scheduleValues(schedule: SweepSchedule): number[] {
  return Array.from({ length: schedule.steps }, (_, step) => interpolate(schedule, step));
}

/**
 * One schedule per DAC channel sharing a step count, as driven by a
 * synchronized all-channel sweep.
 */
export function synchronizedSchedules(
  starts: readonly number[],
  ends: readonly number[],
  steps: number
): SweepSchedule[] {
  return Array.from({ length: DAC_CHANNEL_COUNT }, (_, channel) => ({
    channel,
    start: starts[channel],
    end: ends[channel],
    steps,
  }));
}

// ============================================================================
// Validation
// ============================================================================

function isCode(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= DAC_MAX_CODE;
}

/**
 * Problems with one schedule; empty when it can run.
 */
export function validateSchedule(schedule: SweepSchedule, label = `channel ${schedule.channel}`): string[] {
  const issues: string[] = [];

  if (!Number.isInteger(schedule.channel) || schedule.channel < 0 || schedule.channel >= DAC_CHANNEL_COUNT) {
    issues.push(`${label}: channel must be 0-${DAC_CHANNEL_COUNT - 1}, got ${schedule.channel}`);
  }
  if (!isCode(schedule.start)) {
    issues.push(`${label}: start must be an integer 0-${DAC_MAX_CODE}, got ${schedule.start}`);
  }
  if (!isCode(schedule.end)) {
    issues.push(`${label}: end must be an integer 0-${DAC_MAX_CODE}, got ${schedule.end}`);
  }
  if (!Number.isInteger(schedule.steps) || schedule.steps < 1) {
    issues.push(`${label}: steps must be an integer >= 1, got ${schedule.steps}`);
  }

  return issues;
}

/**
 * Problems across a set of schedules driven together. Two schedules may not
 * drive the same channel.
 */
export function validateSchedules(schedules: readonly SweepSchedule[]): string[] {
  if (schedules.length === 0) {
    return ['at least one schedule is required'];
  }

  const issues = schedules.flatMap((schedule, index) =>
    validateSchedule(schedule, `schedule ${index} (channel ${schedule.channel})`)
  );

  const seen = new Set<number>();
  for (const { channel } of schedules) {
    if (seen.has(channel)) {
      issues.push(`channel ${channel} appears in more than one schedule`);
    }
    seen.add(channel);
  }

  return issues;
}

/**
 * Global step count of an independent sweep: the longest schedule.
 */
export function maxSteps(schedules: readonly SweepSchedule[]): number {
  return schedules.reduce((max, schedule) => Math.max(max, schedule.steps), 0);
}
