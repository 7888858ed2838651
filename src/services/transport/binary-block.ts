/**
 * IEEE 488.2 definite-length arbitrary block helpers
 *
 * Layout: '#', one digit n, n digits giving the payload length, payload.
 */

import { ParseFailureError } from '../../utils/errors.js';

export interface BlockFrame {
  payload: Buffer;
  /** Bytes of `buffer` taken by the header and payload */
  consumed: number;
}

const HASH = 0x23;

/**
 * Extract one block from the head of `buffer`, or null while it is incomplete.
 */
export function extractBlock(buffer: Buffer): BlockFrame | null {
  if (buffer.length < 2) return null;
  if (buffer[0] !== HASH) {
    throw new ParseFailureError('binary block header', buffer.subarray(0, 16).toString('latin1'), {
      operation: 'extractBlock',
    });
  }

  const digits = buffer[1] - 0x30;
  if (digits < 1 || digits > 9) {
    throw new ParseFailureError('binary block length digit', buffer.subarray(0, 2).toString('latin1'), {
      operation: 'extractBlock',
    });
  }

  const headerLength = 2 + digits;
  if (buffer.length < headerLength) return null;

  const lengthText = buffer.subarray(2, headerLength).toString('ascii');
  if (!/^\d+$/.test(lengthText)) {
    throw new ParseFailureError('binary block length', lengthText, { operation: 'extractBlock' });
  }

  const payloadLength = parseInt(lengthText, 10);
  const end = headerLength + payloadLength;
  if (buffer.length < end) return null;

  return {
    payload: Buffer.from(buffer.subarray(headerLength, end)),
    consumed: end,
  };
}

/**
 * Decode a payload of little-endian float32 values.
 */
export function decodeFloat32LE(payload: Buffer): number[] {
  if (payload.length % 4 !== 0) {
    throw new ParseFailureError('float32 array', `${payload.length} bytes`, {
      operation: 'decodeFloat32LE',
    });
  }

  const values: number[] = [];
  for (let offset = 0; offset < payload.length; offset += 4) {
    values.push(payload.readFloatLE(offset));
  }
  return values;
}
