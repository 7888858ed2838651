/**
 * MCU Services Index
 */

export { McuLink, McuLinkOptionsSchema } from './mcu-link.js';
export type { InstrumentLink, McuLinkOptions } from './mcu-link.js';

export {
  DacController,
  DacControllerOptionsSchema,
  codeFromVoltage,
  voltageFromCode,
  isValidDacChannel,
  isValidDacCode,
} from './dac-controller.js';
export type { DacControllerOptions, SetpointOptions, SetpointResult } from './dac-controller.js';

export {
  AdcController,
  AdcControllerOptionsSchema,
  DEFAULT_SHUNT_RESISTANCES,
  parseVoltageReply,
  isValidAdcChannel,
} from './adc-controller.js';
export type {
  AdcControllerOptions,
  ReadOptions,
  VoltageReading,
  BusTestResult,
} from './adc-controller.js';
