/**
 * Curve Analysis
 *
 * Pure electrical figures of merit over a finished IV sweep.
 */

import type {
  CurveAnalysis,
  CurvePoint,
  IvPoint,
  MeasurementSample,
  SampleColumns,
} from '../../types/bench-types.js';

/**
 * V / I, +Infinity for zero current.
 */
export function resistance(voltage: number, current: number): number {
  return current === 0 ? Infinity : voltage / current;
}

export function power(voltage: number, current: number): number {
  return voltage * current;
}

/**
 * Index of the first element whose score beats every earlier one.
 */
function firstBest<T>(items: readonly T[], score: (item: T) => number, better: (a: number, b: number) => boolean): number {
  let bestIndex = -1;
  let bestScore = NaN;
  items.forEach((item, index) => {
    const value = score(item);
    if (Number.isNaN(value)) return;
    if (bestIndex === -1 || better(value, bestScore)) {
      bestIndex = index;
      bestScore = value;
    }
  });
  return bestIndex;
}

/**
 * Resistances, powers, maximum power point and the open/short-circuit
 * estimates of a curve. Ties resolve to the earliest point; NaN entries
 * never win.
 */
export function analyzeCurve(points: readonly IvPoint[]): CurveAnalysis {
  const resistances = points.map((p) => resistance(p.voltage, p.current));
  const powers = points.map((p) => power(p.voltage, p.current));

  const maxIndex = firstBest(powers, (p) => p, (a, b) => a > b);
  const vocIndex = firstBest(points, (p) => Math.abs(p.current), (a, b) => a < b);
  const iscIndex = firstBest(points, (p) => Math.abs(p.voltage), (a, b) => a < b);

  const maxPowerPoint: CurvePoint | null =
    maxIndex === -1
      ? null
      : {
          index: maxIndex,
          voltage: points[maxIndex].voltage,
          current: points[maxIndex].current,
          power: powers[maxIndex],
        };

  return {
    resistances,
    powers,
    maxPowerPoint,
    openCircuitVoltage: vocIndex === -1 ? null : points[vocIndex].voltage,
    shortCircuitCurrent: iscIndex === -1 ? null : points[iscIndex].current,
  };
}

/**
 * Column view of a sample sequence, one ordered array per field.
 */
export function toColumns(samples: readonly MeasurementSample[]): SampleColumns {
  return {
    setpoint: samples.map((s) => s.setpoint),
    voltage: samples.map((s) => s.voltage),
    current: samples.map((s) => s.current),
    powerElectrical: samples.map((s) => s.powerElectrical),
    powerOpticalMw: samples.map((s) => s.powerOpticalMw),
    powerOpticalDbm: samples.map((s) => s.powerOpticalDbm),
  };
}
