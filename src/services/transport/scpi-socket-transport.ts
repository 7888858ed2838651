/**
 * SCPI Socket Transport
 *
 * InstrumentTransport over the raw SCPI socket most LAN instruments expose
 * (port 5025). Accepts VISA-style resource strings:
 *
 *   TCPIP[board]::<host>[::<device>]::INSTR → <host>:5025
 *   TCPIP[board]::<host>::<port>::SOCKET → <host>:<port>
 *   <host>:<port>
 */

import net from 'net';
import { log, toError } from '../../utils/logger.js';
import {
  CommunicationTimeoutError,
  ProtocolStateError,
  ValidationError,
} from '../../utils/errors.js';
import { delay, remaining } from '../../utils/timing.js';
import { extractBlock } from './binary-block.js';
import type { InstrumentTransport } from './types.js';

export const DEFAULT_SCPI_PORT = 5025;

export interface SocketAddress {
  host: string;
  port: number;
}

export function parseResource(resource: string): SocketAddress {
  const instr = /^TCPIP\d*::([^:]+)(?:::[^:]+)?::INSTR$/i.exec(resource);
  if (instr) {
    return { host: instr[1], port: DEFAULT_SCPI_PORT };
  }

  const socket = /^TCPIP\d*::([^:]+)::(\d+)::SOCKET$/i.exec(resource);
  if (socket) {
    return { host: socket[1], port: parseInt(socket[2], 10) };
  }

  const plain = /^([^:]+):(\d+)$/.exec(resource);
  if (plain) {
    return { host: plain[1], port: parseInt(plain[2], 10) };
  }

  throw new ValidationError(`Unsupported instrument resource: ${resource}`, {
    operation: 'parseResource',
    input: resource,
  });
}

interface PendingReply {
  kind: 'line' | 'block';
  resolve: (value: string | Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class ScpiSocketTransport implements InstrumentTransport {
  readonly resource: string;
  private readonly address: SocketAddress;
  private readonly connectTimeoutMs: number;
  private socket: net.Socket | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingReply | null = null;
  /** Replies still owed to queries that timed out, oldest first */
  private abandoned: Array<PendingReply['kind']> = [];
  private draining = false;
  private readonly logger = log.child({ service: 'scpi-transport' });

  /**
   * @param drainMs how long a new query waits for the late replies of
   *   timed-out queries before writing
   */
  constructor(resource: string, connectTimeoutMs = 5000, private readonly drainMs = 200) {
    this.resource = resource;
    this.address = parseResource(resource);
    this.connectTimeoutMs = connectTimeoutMs;
  }

  isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async open(): Promise<void> {
    if (this.isOpen()) return;

    const socket = new net.Socket();
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new CommunicationTimeoutError('connect', this.connectTimeoutMs, {
          resource: this.resource,
        }));
      }, this.connectTimeoutMs);

      socket.once('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });
      socket.connect(this.address.port, this.address.host, () => {
        clearTimeout(timer);
        resolve();
      });
    });

    socket.setNoDelay(true);
    socket.removeAllListeners('error');
    socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    socket.on('error', (err) => {
      this.logger.error('Instrument socket error', err, { resource: this.resource });
      this.failPending(err);
    });
    socket.on('close', () => {
      this.logger.info('Instrument socket closed', { resource: this.resource });
      this.failPending(new Error(`Connection to ${this.resource} closed`));
    });

    this.socket = socket;
    this.logger.info('Instrument connected', {
      host: this.address.host,
      tcpPort: this.address.port,
      resource: this.resource,
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.buffer = Buffer.alloc(0);
    this.abandoned = [];
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.end(() => {
        socket.destroy();
        resolve();
      });
    });
  }

  async write(command: string): Promise<void> {
    const socket = this.requireSocket();
    await new Promise<void>((resolve, reject) => {
      socket.write(`${command}\n`, 'ascii', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async query(command: string, timeoutMs: number): Promise<string> {
    const reply = await this.exchange(command, 'line', timeoutMs);
    return typeof reply === 'string' ? reply : reply.toString('ascii');
  }

  async queryBinary(command: string, timeoutMs: number): Promise<Buffer> {
    const reply = await this.exchange(command, 'block', timeoutMs);
    return typeof reply === 'string' ? Buffer.from(reply, 'ascii') : reply;
  }

  private async exchange(
    command: string,
    kind: PendingReply['kind'],
    timeoutMs: number
  ): Promise<string | Buffer> {
    if (this.pending || this.draining) {
      throw new ProtocolStateError(`Query already in flight on ${this.resource}`, {
        operation: 'query',
        command,
      });
    }

    this.draining = true;
    try {
      await this.drainAbandoned();
    } finally {
      this.draining = false;
    }
    this.buffer = Buffer.alloc(0);

    const reply = new Promise<string | Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        this.abandoned.push(kind);
        reject(new CommunicationTimeoutError(command, timeoutMs, { resource: this.resource }));
      }, timeoutMs);
      this.pending = { kind, resolve, reject, timer };
    });

    try {
      await this.write(command);
    } catch (error) {
      this.failPending(toError(error));
    }

    return reply;
  }

  /**
   * Wait for replies owed to timed-out queries; forget them at the deadline.
   */
  private async drainAbandoned(): Promise<void> {
    const deadline = Date.now() + this.drainMs;
    while (this.abandoned.length > 0 && remaining(deadline) > 0) {
      await delay(Math.min(5, remaining(deadline)));
    }
    if (this.abandoned.length > 0) {
      this.logger.debug('Late replies never arrived', { resource: this.resource, outstanding: this.abandoned.length });
      this.abandoned = [];
    }
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    try {
      while (this.abandoned.length > 0) {
        if (this.takeReply(this.abandoned[0]) === null) return;
        this.abandoned.shift();
        this.logger.debug('Dropped late reply', { resource: this.resource });
      }

      const pending = this.pending;
      if (!pending) return;
      const reply = this.takeReply(pending.kind);
      if (reply !== null) this.settle(pending, reply);
    } catch (error) {
      this.buffer = Buffer.alloc(0);
      this.abandoned = [];
      this.failPending(toError(error));
    }
  }

  /**
   * Remove one complete reply of the given kind from the buffer, or null
   * while it is still incomplete.
   */
  private takeReply(kind: PendingReply['kind']): string | Buffer | null {
    if (kind === 'line') {
      const newline = this.buffer.indexOf(0x0a);
      if (newline < 0) return null;
      const line = this.buffer.subarray(0, newline).toString('ascii').replace(/\r$/, '');
      this.buffer = this.buffer.subarray(newline + 1);
      return line;
    }

    const frame = extractBlock(this.buffer);
    if (!frame) return null;
    this.buffer = this.buffer.subarray(frame.consumed);
    if (this.buffer[0] === 0x0a) this.buffer = this.buffer.subarray(1);
    return frame.payload;
  }

  private settle(pending: PendingReply, value: string | Buffer): void {
    clearTimeout(pending.timer);
    this.pending = null;
    pending.resolve(value);
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(error);
  }

  private requireSocket(): net.Socket {
    if (!this.socket || this.socket.destroyed) {
      throw new Error(`Instrument ${this.resource} is not connected`);
    }
    return this.socket;
  }
}
