import { describe, it, expect } from 'vitest';
import {
  interpolate,
  maxSteps,
  progress,
  scheduleValues,
  synchronizedSchedules,
  validateSchedule,
  validateSchedules,
} from '../../src/services/sweep/schedule.js';

describe('interpolate', () => {
  it('truncates linear setpoints', () => {
    expect(scheduleValues({ channel: 0, start: 0, end: 4095, steps: 5 })).toEqual([0, 1023, 2047, 3071, 4095]);
  });

  it('runs downward too', () => {
    expect(scheduleValues({ channel: 1, start: 100, end: 0, steps: 3 })).toEqual([100, 50, 0]);
  });

  it('yields the end value for a one-step schedule', () => {
    expect(scheduleValues({ channel: 0, start: 10, end: 20, steps: 1 })).toEqual([20]);
    expect(interpolate({ channel: 0, start: 10, end: 20, steps: 1 }, 0)).toBe(20);
  });

  it('holds the end value past the schedule length', () => {
    const schedule = { channel: 1, start: 1000, end: 2000, steps: 2 };
    expect([0, 1, 2, 3, 4].map((step) => interpolate(schedule, step))).toEqual([1000, 2000, 2000, 2000, 2000]);
  });

  it('clamps progress to [0, 1]', () => {
    expect(progress(-1, 5)).toBe(0);
    expect(progress(2, 5)).toBe(0.5);
    expect(progress(9, 5)).toBe(1);
  });
});

describe('validateSchedule', () => {
  it('accepts a sane schedule', () => {
    expect(validateSchedule({ channel: 3, start: 0, end: 4095, steps: 1 })).toEqual([]);
  });

  it('reports every problem', () => {
    const issues = validateSchedule({ channel: 4, start: -1, end: 4096, steps: 0 });
    expect(issues).toHaveLength(4);
    expect(issues[0]).toBe('channel 4: channel must be 0-3, got 4');
  });

  it('rejects non-integer values', () => {
    expect(validateSchedule({ channel: 0, start: 0.5, end: 10, steps: 2.5 })).toHaveLength(2);
  });
});

describe('validateSchedules', () => {
  it('requires at least one schedule', () => {
    expect(validateSchedules([])).toEqual(['at least one schedule is required']);
  });

  it('rejects two schedules on one channel', () => {
    const issues = validateSchedules([
      { channel: 0, start: 0, end: 10, steps: 2 },
      { channel: 0, start: 0, end: 20, steps: 3 },
    ]);
    expect(issues).toEqual(['channel 0 appears in more than one schedule']);
  });

  it('labels issues by schedule position', () => {
    const issues = validateSchedules([
      { channel: 0, start: 0, end: 10, steps: 2 },
      { channel: 1, start: 0, end: 10, steps: 0 },
    ]);
    expect(issues).toEqual(['schedule 1 (channel 1): steps must be an integer >= 1, got 0']);
  });
});

describe('schedule helpers', () => {
  it('builds one schedule per DAC channel', () => {
    expect(synchronizedSchedules([0, 1, 2, 3], [10, 11, 12, 13], 4)).toEqual([
      { channel: 0, start: 0, end: 10, steps: 4 },
      { channel: 1, start: 1, end: 11, steps: 4 },
      { channel: 2, start: 2, end: 12, steps: 4 },
      { channel: 3, start: 3, end: 13, steps: 4 },
    ]);
  });

  it('takes the longest schedule as the global step count', () => {
    expect(maxSteps([
      { channel: 0, start: 0, end: 100, steps: 5 },
      { channel: 1, start: 1000, end: 2000, steps: 2 },
    ])).toBe(5);
  });
});
