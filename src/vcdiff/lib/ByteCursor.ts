/**
 * Forward-only reader over a bounded region of a Buffer
 *
 * Each section of a window (data, instructions, addresses) gets its own
 * cursor so a read can never cross into a neighbouring section.
 */

import { VcdiffError } from '../VcdiffError.ts';

export class ByteCursor {
  readonly buffer: Buffer;
  readonly start: number;
  readonly end: number;
  private pos: number;
  private name: string;

  constructor(buffer: Buffer, start = 0, end = buffer.length, name = 'input') {
    if (start < 0 || end > buffer.length || start > end) {
      throw new VcdiffError('TruncatedInput', `Section ${name} [${start}, ${end}) is outside of ${buffer.length} bytes`);
    }
    this.buffer = buffer;
    this.start = start;
    this.end = end;
    this.pos = start;
    this.name = name;
  }

  /** Absolute offset of the next byte */
  get position(): number {
    return this.pos;
  }

  /** Bytes consumed since the start of the region */
  get consumed(): number {
    return this.pos - this.start;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  get label(): string {
    return this.name;
  }

  isAtEnd(): boolean {
    return this.pos >= this.end;
  }

  readByte(): number {
    if (this.pos >= this.end) {
      throw this.truncated(1);
    }
    return this.buffer[this.pos++];
  }

  /**
   * Read `length` bytes as a view (no copy)
   */
  readBytes(length: number): Buffer {
    if (length > this.end - this.pos) {
      throw this.truncated(length);
    }
    const bytes = this.buffer.slice(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  readUInt32BE(): number {
    if (this.end - this.pos < 4) {
      throw this.truncated(4);
    }
    const value = this.buffer.readUInt32BE(this.pos);
    this.pos += 4;
    return value;
  }

  skip(length: number): void {
    if (length > this.end - this.pos) {
      throw this.truncated(length);
    }
    this.pos += length;
  }

  truncated(wanted: number): VcdiffError {
    return new VcdiffError('TruncatedInput', `Unexpected end of ${this.name}: wanted ${wanted} byte(s) at offset ${this.pos}, ${this.end - this.pos} left`);
  }
}
