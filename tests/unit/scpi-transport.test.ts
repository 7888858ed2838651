import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import net from 'net';
import { extractBlock, decodeFloat32LE } from '../../src/services/transport/binary-block.js';
import { ScpiSocketTransport, parseResource } from '../../src/services/transport/scpi-socket-transport.js';
import {
  CommunicationTimeoutError,
  ParseFailureError,
  ProtocolStateError,
  ValidationError,
} from '../../src/utils/errors.js';

function floatBlock(values: number[]): Buffer {
  const payload = Buffer.alloc(values.length * 4);
  values.forEach((v, i) => payload.writeFloatLE(v, i * 4));
  const length = String(payload.length);
  return Buffer.concat([Buffer.from(`#${length.length}${length}`, 'ascii'), payload]);
}

describe('parseResource', () => {
  it('understands VISA socket resources and host:port', () => {
    expect(parseResource('TCPIP0::10.0.0.5::inst0::INSTR')).toEqual({ host: '10.0.0.5', port: 5025 });
    expect(parseResource('TCPIP::opm.lab::INSTR')).toEqual({ host: 'opm.lab', port: 5025 });
    expect(parseResource('TCPIP0::opm.lab::5024::SOCKET')).toEqual({ host: 'opm.lab', port: 5024 });
    expect(parseResource('127.0.0.1:7000')).toEqual({ host: '127.0.0.1', port: 7000 });
  });

  it('rejects other resource kinds', () => {
    expect(() => parseResource('GPIB0::22::INSTR')).toThrow(ValidationError);
    expect(() => parseResource('USB0::0x0957::0x3718::MY00000001::INSTR')).toThrow(ValidationError);
  });
});

describe('binary blocks', () => {
  it('waits for a complete block', () => {
    const block = floatBlock([1.5, -2]);
    expect(extractBlock(block.subarray(0, 1))).toBeNull();
    expect(extractBlock(block.subarray(0, 5))).toBeNull();

    const frame = extractBlock(Buffer.concat([block, Buffer.from('\n')]));
    expect(frame?.consumed).toBe(11);
    expect(decodeFloat32LE(frame?.payload ?? Buffer.alloc(0))).toEqual([1.5, -2]);
  });

  it('rejects malformed headers and payloads', () => {
    expect(() => extractBlock(Buffer.from('1.0\n'))).toThrow(ParseFailureError);
    expect(() => extractBlock(Buffer.from('#0'))).toThrow(ParseFailureError);
    expect(() => extractBlock(Buffer.from('#2x4abcd'))).toThrow(ParseFailureError);
    expect(() => decodeFloat32LE(Buffer.alloc(6))).toThrow(ParseFailureError);
  });
});

describe('ScpiSocketTransport', () => {
  let server: net.Server;
  let transport: ScpiSocketTransport;

  beforeEach(async () => {
    server = net.createServer((socket) => {
      let pending = '';
      socket.on('data', (chunk) => {
        pending += chunk.toString('ascii');
        let newline = pending.indexOf('\n');
        while (newline >= 0) {
          const command = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          if (command === '*IDN?') socket.write('Acme,PM-2,0001,0.1\r\n');
          if (command === 'read:pow:all?') socket.write(Buffer.concat([floatBlock([0.25, 0.5]), Buffer.from('\n')]));
          if (command === 'sens1:pow:wav?') setTimeout(() => socket.write('1.55E-06\n'), 45);
          newline = pending.indexOf('\n');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    transport = new ScpiSocketTransport(`127.0.0.1:${port}`, 1000, 100);
    await transport.open();
  });

  afterEach(async () => {
    await transport.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('returns one reply line without its terminator', async () => {
    await expect(transport.query('*IDN?', 500)).resolves.toBe('Acme,PM-2,0001,0.1');
  });

  it('returns the payload of a binary block reply', async () => {
    const payload = await transport.queryBinary('read:pow:all?', 500);
    expect(decodeFloat32LE(payload)).toEqual([0.25, 0.5]);
  });

  it('times out a query that gets no reply and recovers', async () => {
    await expect(transport.query('sens1:pow:unit?', 30)).rejects.toBeInstanceOf(CommunicationTimeoutError);
    await expect(transport.query('*IDN?', 500)).resolves.toBe('Acme,PM-2,0001,0.1');
  });

  it('never hands a late reply to the next query', async () => {
    await expect(transport.query('sens1:pow:wav?', 20)).rejects.toBeInstanceOf(CommunicationTimeoutError);
    await expect(transport.query('*IDN?', 500)).resolves.toBe('Acme,PM-2,0001,0.1');
  });

  it('allows one query in flight', async () => {
    const first = transport.query('*IDN?', 500);
    await expect(transport.query('*IDN?', 500)).rejects.toBeInstanceOf(ProtocolStateError);
    await expect(first).resolves.toBe('Acme,PM-2,0001,0.1');
  });
});
