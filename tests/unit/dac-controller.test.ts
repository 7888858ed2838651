import { describe, it, expect, beforeEach } from 'vitest';
import {
  DacController,
  codeFromVoltage,
  voltageFromCode,
} from '../../src/services/mcu/dac-controller.js';
import { McuLink } from '../../src/services/mcu/mcu-link.js';
import { PortRegistry } from '../../src/services/transport/port-registry.js';
import { ScriptedChannel, mcuResponder } from '../helpers/fake-transports.js';

const FAST = { openDelayMs: 0, releaseDelayMs: 0, protocol: { timeoutMs: 30, pollIntervalMs: 5, drainTimeoutMs: 20 } };

describe('DAC conversions', () => {
  it('rounds voltages to the nearest code', () => {
    expect(codeFromVoltage(0, 3.3)).toBe(0);
    expect(codeFromVoltage(3.3, 3.3)).toBe(4095);
    expect(codeFromVoltage(1.65, 3.3)).toBe(2048);
  });

  it('clamps codes into range', () => {
    expect(codeFromVoltage(5, 3.3)).toBe(4095);
    expect(codeFromVoltage(-1, 3.3)).toBe(0);
  });

  it('round-trips within one code step', () => {
    const vref = 3.3;
    for (const voltage of [0, 0.01, 0.5, 1.234, 2.9, 3.3]) {
      const back = voltageFromCode(codeFromVoltage(voltage, vref), vref);
      expect(Math.abs(back - voltage)).toBeLessThanOrEqual(vref / 4095);
    }
  });
});

describe('DacController', () => {
  let channel: ScriptedChannel;
  let dac: DacController;
  let state: { dac: number[]; adc: number[] };

  beforeEach(async () => {
    state = { dac: [0, 0, 0, 0], adc: [0, 0, 0, 0] };
    channel = new ScriptedChannel(mcuResponder(state));
    dac = new DacController(new McuLink(channel, FAST, new PortRegistry()), { timeoutMs: 30 });
    await dac.connect();
  });

  it('writes "<channel>,<code>" and reports the ack', async () => {
    const result = await dac.setCode(2, 1000);

    expect(result).toEqual({ accepted: true, ack: '1', deviceApplied: true });
    expect(channel.writes).toEqual(['2,1000']);
    expect(state.dac[2]).toBe(1000);
  });

  it('reports a device refusal', async () => {
    channel.setResponder(() => '0');
    await expect(dac.setCode(0, 10)).resolves.toEqual({ accepted: true, ack: '0', deviceApplied: false });
  });

  it('still accepts a setpoint whose ack never comes', async () => {
    channel.setResponder(() => null);
    await expect(dac.setCode(1, 4095)).resolves.toEqual({ accepted: true, ack: null, deviceApplied: null });
  });

  it('does not wait when acks are off', async () => {
    const result = await dac.setCode(3, 7, { waitAck: false });

    expect(result).toEqual({ accepted: true, ack: null, deviceApplied: null });
    expect(channel.writes).toEqual(['3,7']);
  });

  it('drops the ack of an unacknowledged setpoint before the next command', async () => {
    channel.replyDelayMs = 3;

    await dac.setCode(0, 100, { waitAck: false });
    await dac.setAll(200, { waitAck: false });

    await expect(dac.checkCommunication()).resolves.toBe(true);
    expect(channel.writes).toEqual(['0,100', 'set_all,200', 'COMM_OK']);
  });

  it.each([
    [-1, 0],
    [4, 0],
    [1.5, 0],
    [0, -1],
    [0, 4096],
    [0, 12.5],
  ])('rejects channel %s code %s without I/O', async (ch, code) => {
    const result = await dac.setCode(ch, code);

    expect(result.accepted).toBe(false);
    expect(result.reason).toBeDefined();
    expect(channel.writes).toEqual([]);
  });

  it('converts voltages against vref', async () => {
    await dac.setVoltage(0, 1.65);
    await dac.setVoltage(1, 2.5, 5.0);

    expect(channel.writes).toEqual(['0,2048', '1,2048']);
  });

  it('rejects voltages outside [0, vref] and non-positive vref', async () => {
    await expect(dac.setVoltage(0, 3.4)).resolves.toMatchObject({ accepted: false });
    await expect(dac.setVoltage(0, -0.1)).resolves.toMatchObject({ accepted: false });
    await expect(dac.setVoltage(0, 0, 0)).resolves.toMatchObject({ accepted: false });
    expect(channel.writes).toEqual([]);
  });

  it('sets all channels with one command', async () => {
    await expect(dac.setAll(512)).resolves.toMatchObject({ accepted: true, ack: '1' });
    expect(channel.writes).toEqual(['set_all,512']);
    expect(state.dac).toEqual([512, 512, 512, 512]);

    await expect(dac.setAll(5000)).resolves.toMatchObject({ accepted: false });
    expect(channel.writes).toHaveLength(1);
  });

  it('reports a failed write as not accepted', async () => {
    channel.failWrites = true;
    await expect(dac.setCode(0, 1)).resolves.toMatchObject({ accepted: false, ack: null });
  });
});
