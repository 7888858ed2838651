import { describe, it, expect, vi } from 'vitest';
import { CommandProtocol } from '../../src/services/protocol/command-protocol.js';
import { ProtocolStateError, ValidationError } from '../../src/utils/errors.js';
import { ScriptedChannel } from '../helpers/fake-transports.js';

function setup(responder: ConstructorParameters<typeof ScriptedChannel>[0]) {
  const channel = new ScriptedChannel(responder);
  const protocol = new CommandProtocol(channel, { timeoutMs: 50, pollIntervalMs: 5 });
  return { channel, protocol };
}

describe('CommandProtocol', () => {
  it('writes one newline-terminated line and returns the reply', async () => {
    const { channel, protocol } = setup((line) => (line === 'ping' ? 'pong' : null));
    const writeSpy = vi.spyOn(channel, 'write');

    await expect(protocol.sendAndWait('ping')).resolves.toBe('pong');
    expect(writeSpy).toHaveBeenCalledWith('ping\n');
    expect(protocol.getState()).toBe('idle');
  });

  it('discards stale input before writing', async () => {
    const { channel, protocol } = setup(() => 'fresh');
    channel.push('stale');

    await expect(protocol.sendAndWait('read_adc,0')).resolves.toBe('fresh');
    expect(channel.discards).toBe(1);
  });

  it('skips blank lines and trims the reply', async () => {
    const { protocol } = setup(() => ['', '   ', '  0.5000 \r']);
    await expect(protocol.sendAndWait('read_adc,1')).resolves.toBe('0.5000');
  });

  it('returns null when nothing arrives before the deadline', async () => {
    const { protocol } = setup(() => null);
    const started = Date.now();

    await expect(protocol.sendAndWait('read_adc,0', { timeoutMs: 30 })).resolves.toBeNull();
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
    expect(protocol.getState()).toBe('idle');
  });

  it('re-sends the identical request after silence', async () => {
    let calls = 0;
    const { channel, protocol } = setup(() => (++calls === 1 ? null : 'late'));

    const result = await protocol.exchange('read_adc,2', { timeoutMs: 20, retries: 2 });

    expect(result).toEqual({ written: true, response: 'late', attempts: 2 });
    expect(channel.writes).toEqual(['read_adc,2', 'read_adc,2']);
  });

  it('stops after retries + 1 attempts', async () => {
    const { channel, protocol } = setup(() => null);

    await expect(protocol.sendAndWait('COMM_OK', { timeoutMs: 10, retries: 2 })).resolves.toBeNull();
    expect(channel.writes).toHaveLength(3);
  });

  it('refuses a second send while a response is outstanding', async () => {
    const { channel, protocol } = setup(() => 'ack');

    await expect(protocol.send('0,100')).resolves.toBe(true);
    expect(protocol.getState()).toBe('awaiting');
    await expect(protocol.send('1,100')).rejects.toBeInstanceOf(ProtocolStateError);
    expect(channel.writes).toEqual(['0,100']);

    await expect(protocol.waitResponse()).resolves.toBe('ack');
    expect(protocol.getState()).toBe('idle');
  });

  it('refuses a concurrent exchange on the same link', async () => {
    const { channel, protocol } = setup(() => 'x');
    channel.replyDelayMs = 10;

    const first = protocol.sendAndWait('a');
    await expect(protocol.sendAndWait('b')).rejects.toBeInstanceOf(ProtocolStateError);
    await expect(protocol.waitResponse()).rejects.toBeInstanceOf(ProtocolStateError);
    expect(protocol.getState()).toBe('exchange');
    await expect(first).resolves.toBe('x');
    expect(channel.writes).toEqual(['a']);
  });

  it('refuses to wait when no request is outstanding', async () => {
    const { protocol } = setup(() => 'x');

    await expect(protocol.waitResponse()).rejects.toBeInstanceOf(ProtocolStateError);
    await expect(protocol.sendAndWait('a')).resolves.toBe('x');
    await expect(protocol.waitResponse()).rejects.toBeInstanceOf(ProtocolStateError);
  });

  it('stays idle after a fire-and-forget send', async () => {
    const { protocol } = setup(() => null);

    await protocol.send('set_all,0', { expectResponse: false });
    expect(protocol.getState()).toBe('idle');
    expect(protocol.getUnreadReplies()).toBe(0);
    await expect(protocol.send('set_all,1', { expectResponse: false })).resolves.toBe(true);
  });

  describe('unread replies', () => {
    function delayedLink() {
      const channel = new ScriptedChannel((line) => (line.startsWith('read_adc') ? '0.2500' : '1'));
      channel.replyDelayMs = 3;
      const protocol = new CommandProtocol(channel, { timeoutMs: 50, pollIntervalMs: 2, drainTimeoutMs: 30 });
      return { channel, protocol };
    }

    it('drops a late ack before the next request is answered', async () => {
      const { channel, protocol } = delayedLink();

      await protocol.send('0,100', { expectResponse: false, discardReply: true });
      expect(protocol.getUnreadReplies()).toBe(1);

      await expect(protocol.sendAndWait('read_adc,0')).resolves.toBe('0.2500');
      expect(protocol.getUnreadReplies()).toBe(0);
      expect(channel.writes).toEqual(['0,100', 'read_adc,0']);
    });

    it('drains one ack per fire-and-forget request', async () => {
      const { protocol } = delayedLink();

      await protocol.send('0,1', { expectResponse: false, discardReply: true });
      await protocol.send('1,1', { expectResponse: false, discardReply: true });
      await protocol.send('2,1', { expectResponse: false, discardReply: true });

      await expect(protocol.sendAndWait('read_adc,1')).resolves.toBe('0.2500');
      await expect(protocol.sendAndWait('read_adc,2')).resolves.toBe('0.2500');
    });

    it('gives up on an ack that never comes', async () => {
      const channel = new ScriptedChannel((line) => (line === 'COMM_OK' ? 'COMM_OK' : null));
      const protocol = new CommandProtocol(channel, { timeoutMs: 50, pollIntervalMs: 2, drainTimeoutMs: 10 });

      await protocol.send('0,1', { expectResponse: false, discardReply: true });
      await expect(protocol.sendAndWait('COMM_OK')).resolves.toBe('COMM_OK');
      expect(protocol.getUnreadReplies()).toBe(0);
    });

    it('forgets unread replies on reset', async () => {
      const { protocol } = delayedLink();

      await protocol.send('0,1', { expectResponse: false, discardReply: true });
      protocol.reset();

      expect(protocol.getUnreadReplies()).toBe(0);
      expect(protocol.getState()).toBe('idle');
    });
  });

  it('rejects requests containing line breaks', async () => {
    const { channel, protocol } = setup(() => 'x');

    await expect(protocol.sendAndWait('a\nb')).rejects.toBeInstanceOf(ValidationError);
    expect(channel.writes).toEqual([]);
  });

  it('reports a failed write as no response', async () => {
    const { channel, protocol } = setup(() => 'x');
    channel.failWrites = true;

    await expect(protocol.exchange('COMM_OK')).resolves.toEqual({ written: false, response: null, attempts: 1 });
    await expect(protocol.send('COMM_OK')).resolves.toBe(false);
    expect(protocol.getState()).toBe('idle');
  });

  it('treats read errors during the poll as silence', async () => {
    const { channel, protocol } = setup(() => 'x');
    vi.spyOn(channel, 'readLine').mockRejectedValue(new Error('framing error'));

    await expect(protocol.sendAndWait('COMM_OK', { timeoutMs: 20 })).resolves.toBeNull();
  });
});
