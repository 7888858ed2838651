import { describe, it, expect, beforeEach } from 'vitest';
import {
  AdcController,
  DEFAULT_SHUNT_RESISTANCES,
  parseVoltageReply,
} from '../../src/services/mcu/adc-controller.js';
import { McuLink } from '../../src/services/mcu/mcu-link.js';
import { PortRegistry } from '../../src/services/transport/port-registry.js';
import { parseNumber } from '../../src/utils/parsing.js';
import { ScriptedChannel, mcuResponder } from '../helpers/fake-transports.js';

const FAST = { openDelayMs: 0, releaseDelayMs: 0, protocol: { timeoutMs: 30, pollIntervalMs: 5, drainTimeoutMs: 20 } };

describe('ADC reply parsing', () => {
  it('accepts a bare voltage or voltage,raw', () => {
    expect(parseVoltageReply('1.2345')).toEqual({ voltage: 1.2345, raw: null });
    expect(parseVoltageReply('0.5000,4000')).toEqual({ voltage: 0.5, raw: 4000 });
    expect(parseVoltageReply('-0.0020')).toEqual({ voltage: -0.002, raw: null });
  });

  it('rejects garbage', () => {
    expect(parseVoltageReply('ERROR')).toBeNull();
    expect(parseVoltageReply('1.2abc')).toBeNull();
    expect(parseVoltageReply('1.0,2.5')).toBeNull();
    expect(parseVoltageReply('1,2,3')).toBeNull();
    expect(parseVoltageReply('')).toBeNull();
  });

  it('parses numbers strictly', () => {
    expect(parseNumber(' 3e-3 ')).toBe(0.003);
    expect(parseNumber('.5')).toBe(0.5);
    expect(parseNumber('NaN')).toBeNull();
    expect(parseNumber('12V')).toBeNull();
  });
});

describe('AdcController', () => {
  let channel: ScriptedChannel;
  let adc: AdcController;
  let state: { dac: number[]; adc: number[] };

  beforeEach(async () => {
    state = { dac: [0, 0, 0, 0], adc: [0.5, 1.0, 0.25, 2.0] };
    channel = new ScriptedChannel(mcuResponder(state));
    adc = new AdcController(new McuLink(channel, FAST, new PortRegistry()), { timeoutMs: 30 });
    await adc.connect();
  });

  it('reads a channel voltage', async () => {
    await expect(adc.readVoltage(1)).resolves.toBe(1);
    expect(channel.writes).toEqual(['read_adc,1']);
  });

  it('returns null on silence or garbage', async () => {
    channel.setResponder(() => null);
    await expect(adc.readVoltage(0)).resolves.toBeNull();

    channel.setResponder(() => 'I2C fault');
    await expect(adc.readVoltage(0)).resolves.toBeNull();
  });

  it('rejects out-of-range channels without I/O', async () => {
    await expect(adc.readVoltage(4)).resolves.toBeNull();
    await expect(adc.readRaw(-1)).resolves.toBeNull();
    expect(channel.writes).toEqual([]);
  });

  it('derives current from the shunt table', async () => {
    adc.setShuntResistance(0, 10);
    await expect(adc.readCurrent(0)).resolves.toBe(0.05);
    await expect(adc.readCurrent(1)).resolves.toBe(1);
  });

  it('propagates a missing voltage as a missing current', async () => {
    channel.setResponder(() => null);
    await expect(adc.readCurrent(2)).resolves.toBeNull();
  });

  it('keeps failed channels in position', async () => {
    channel.setResponder((line) => (line === 'read_adc,2' ? null : mcuResponder(state)(line)));

    await expect(adc.readAllVoltages()).resolves.toEqual([0.5, 1, null, 2]);
    await expect(adc.readAllCurrents()).resolves.toEqual([0.5, 1, null, 2]);
  });

  it('reads raw converter codes', async () => {
    await expect(adc.readRaw(2)).resolves.toBe(2000);
    expect(channel.writes).toEqual(['read_adc_raw,2']);
  });

  it('reports the bus self-test', async () => {
    await expect(adc.testBus()).resolves.toEqual({ ok: true, detail: '0x8583' });

    channel.setResponder(() => 'ERROR:I2C_NACK');
    await expect(adc.testBus()).resolves.toEqual({ ok: false, detail: 'ERROR:I2C_NACK' });
  });

  describe('shunt resistances', () => {
    it('starts from a per-instance copy of the defaults', () => {
      adc.setShuntResistance(3, 47);
      const other = new AdcController(new McuLink(new ScriptedChannel(), FAST, new PortRegistry()));

      expect(other.getShuntResistances()).toEqual([1, 1, 1, 1]);
      expect(DEFAULT_SHUNT_RESISTANCES).toEqual([1, 1, 1, 1]);
    });

    it('hands out copies', () => {
      const table = adc.getShuntResistances();
      table[0] = 99;
      expect(adc.getShuntResistance(0)).toBe(1);
    });

    it('rejects bad values and leaves the table alone', () => {
      expect(adc.setShuntResistance(0, 0)).toBe(false);
      expect(adc.setShuntResistance(0, -5)).toBe(false);
      expect(adc.setShuntResistance(4, 10)).toBe(false);
      expect(adc.setShuntResistances([1, 2, 3])).toBe(false);
      expect(adc.setShuntResistances([1, 2, 0, 4])).toBe(false);
      expect(adc.getShuntResistances()).toEqual([1, 1, 1, 1]);

      expect(adc.setShuntResistances([10, 20, 30, 40])).toBe(true);
      expect(adc.getShuntResistances()).toEqual([10, 20, 30, 40]);
    });
  });
});
