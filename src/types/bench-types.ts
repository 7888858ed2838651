/**
 * Bench Type Definitions
 *
 * Channels, setpoints, sweep schedules, measurement samples and the
 * instrument-side state shared by the controllers and the sweep engine.
 */

// ============================================================================
// CHANNELS & SETPOINTS
// ============================================================================

/** Number of DAC outputs on the MCU board (MCP4728) */
export const DAC_CHANNEL_COUNT = 4;

/** Number of ADC inputs on the MCU board (ADS1115) */
export const ADC_CHANNEL_COUNT = 4;

/** Largest 12-bit DAC code */
export const DAC_MAX_CODE = 4095;

/**
 * Optical power meter channel counts we know how to drive
 */
export type OpmChannelCount = 2 | 4 | 8;

/**
 * Reporting unit of an optical power meter channel
 */
export type UnitMode = 'dBm' | 'Watt';

/**
 * Range setting of an optical power meter channel
 */
export type PowerRange =
  | { mode: 'auto' }
  | { mode: 'manual'; dBm: number };

// ============================================================================
// SWEEP SCHEDULES
// ============================================================================

/**
 * Linear setpoint schedule for one DAC channel
 */
export interface SweepSchedule {
  channel: number;
  /** First DAC code */
  start: number;
  /** Last DAC code */
  end: number;
  /** Number of emitted setpoints, at least 1 */
  steps: number;
}

/**
 * Final state of a sweep
 */
export type SweepStatus = 'completed' | 'cancelled' | 'rejected';

/**
 * One applied step of an actuator-only sweep
 */
export interface SweepStep {
  /** Zero-based global step index */
  step: number;
  /** Channel → DAC code applied at this step */
  setpoints: Readonly<Record<number, number>>;
  /** Acknowledgement lines received, when acks were requested */
  acks: Readonly<Record<number, string | null>>;
}

/**
 * Composite sample recorded once per IV sweep step
 */
export interface MeasurementSample {
  /** DAC code applied for this sample */
  setpoint: number;
  /** Measured voltage across the shunt (V) */
  voltage: number;
  /** Derived current (A) */
  current: number;
  /** voltage × current (W) */
  powerElectrical: number;
  /** Optical power (mW), NaN when unavailable */
  powerOpticalMw: number;
  /** Optical power (dBm or the meter's current unit), NaN when unavailable */
  powerOpticalDbm: number;
}

/**
 * Outcome of a sweep. Partial results of a cancelled sweep are well-formed.
 */
export interface SweepResult<T> {
  id: string;
  status: SweepStatus;
  /** Number of global steps the schedule called for */
  plannedSteps: number;
  records: readonly T[];
  /** Validation messages for a rejected sweep */
  issues: string[];
  startedAt: string;
  finishedAt: string;
}

// ============================================================================
// CURVE ANALYSIS
// ============================================================================

/**
 * The electrical projection of a sample
 */
export interface IvPoint {
  voltage: number;
  current: number;
}

export interface CurvePoint extends IvPoint {
  index: number;
  power: number;
}

export interface CurveAnalysis {
  resistances: number[];
  powers: number[];
  /** Maximum power point, null for an empty curve */
  maxPowerPoint: CurvePoint | null;
  /** Voltage at the sample with the smallest |current| */
  openCircuitVoltage: number | null;
  /** Current at the sample with the smallest |voltage| */
  shortCircuitCurrent: number | null;
}

/**
 * Column-keyed view of a sample sequence, as consumed by persistence and plotting
 */
export type SampleColumns = {
  [K in keyof MeasurementSample]: number[];
};
