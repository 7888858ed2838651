/**
 * Serial Transport
 *
 * TransportChannel over a `serialport` UART. Incoming bytes are split into
 * lines on '\n' (a trailing '\r' is dropped) and queued until read.
 */

import { SerialPort } from 'serialport';
import { log } from '../../utils/logger.js';
import type { TransportChannel } from './types.js';

export interface SerialTransportConfig {
  path: string;
  baudRate: number;
}

type LineWaiter = (line: string | null) => void;

export class SerialTransport implements TransportChannel {
  readonly path: string;
  private readonly baudRate: number;
  private port: SerialPort | null = null;
  private partial = '';
  private lines: string[] = [];
  private waiter: LineWaiter | null = null;
  private readonly logger = log.child({ service: 'serial-transport' });

  constructor(config: SerialTransportConfig) {
    this.path = config.path;
    this.baudRate = config.baudRate;
  }

  isOpen(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  async open(): Promise<void> {
    if (this.isOpen()) return;

    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    port.on('data', (chunk: Buffer) => this.handleData(chunk));
    port.on('error', (err: Error) => {
      this.logger.error('Serial port error', err, { port: this.path });
    });
    port.on('close', () => {
      this.logger.info('Serial port closed', { port: this.path });
      this.settleWaiter(null);
    });

    this.port = port;
    this.logger.info('Serial port opened', { port: this.path, baudRate: this.baudRate });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.partial = '';
    this.lines = [];
    this.settleWaiter(null);

    if (!port) return;
    if (!port.isOpen) {
      port.removeAllListeners();
      return;
    }

    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        port.removeAllListeners();
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async write(data: string): Promise<void> {
    const port = this.requirePort();
    await new Promise<void>((resolve, reject) => {
      port.write(data, 'ascii', (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  async readLine(timeoutMs: number): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) return queued;

    this.requirePort();
    if (this.waiter) {
      throw new Error(`Concurrent read on ${this.path}`);
    }

    return new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (line) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(line);
      };
    });
  }

  async discardPendingInput(): Promise<void> {
    const port = this.requirePort();
    this.partial = '';
    this.lines = [];
    await new Promise<void>((resolve, reject) => {
      port.flush((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private handleData(chunk: Buffer): void {
    this.partial += chunk.toString('ascii');

    let newline = this.partial.indexOf('\n');
    while (newline >= 0) {
      const line = this.partial.slice(0, newline).replace(/\r$/, '');
      this.partial = this.partial.slice(newline + 1);
      this.lines.push(line);
      newline = this.partial.indexOf('\n');
    }

    if (this.waiter && this.lines.length > 0) {
      const next = this.lines.shift();
      this.settleWaiter(next ?? null);
    }
  }

  private settleWaiter(line: string | null): void {
    const waiter = this.waiter;
    if (waiter) waiter(line);
  }

  private requirePort(): SerialPort {
    if (!this.port || !this.port.isOpen) {
      throw new Error(`Serial port ${this.path} is not open`);
    }
    return this.port;
  }
}
