/**
 * VCDIFF variable-length integers
 *
 * Big-endian base-128: each byte carries 7 bits, most significant group
 * first, and the high bit is set on every byte except the last.
 * This is NOT LEB128 (which stores the least significant group first).
 *
 *   0x7f       -> 127
 *   0x81 0x00  -> 128
 *   0x87 0x68  -> 1000
 */

import { MAX_UINT32 } from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';
import type { ByteCursor } from './ByteCursor.ts';

export interface VarintResult {
  value: number;
  bytesRead: number;
}

/**
 * Decode a varint from `buf[offset..end)`
 *
 * @returns The value and its encoded length, or null when the region ends
 *   before the terminating byte
 */
export function decodeVarint(buf: Buffer, offset: number, end: number = buf.length, limit: number = MAX_UINT32): VarintResult | null {
  let value = 0;
  let i = offset;
  while (i < end) {
    const byte = buf[i++];
    value = value * 128 + (byte & 0x7f);
    if (value > limit) {
      throw new VcdiffError('IntegerOverflow', `Variable-length integer at offset ${offset} exceeds ${limit}`);
    }
    if ((byte & 0x80) === 0) {
      return { value, bytesRead: i - offset };
    }
  }
  return null;
}

/**
 * Read a varint from a cursor, failing when the cursor runs out first
 */
export function readVarint(cursor: ByteCursor, limit: number = MAX_UINT32): number {
  const result = decodeVarint(cursor.buffer, cursor.position, cursor.end, limit);
  if (result === null) {
    throw new VcdiffError('TruncatedInput', `Truncated variable-length integer in ${cursor.label} at offset ${cursor.position}`);
  }
  cursor.skip(result.bytesRead);
  return result.value;
}
