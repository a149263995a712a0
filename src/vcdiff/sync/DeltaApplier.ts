/**
 * Delta Applier
 *
 * Executes one window's instructions in a single forward pass. Each opcode
 * from the instructions section expands through the code table into one or
 * two instructions:
 *
 *   ADD  - copy `size` literal bytes from the data section
 *   RUN  - repeat one byte from the data section `size` times
 *   COPY - copy `size` bytes from the source segment and/or the target
 *          produced so far, at an address decoded by the address cache
 *   NOOP - nothing
 *
 * Addresses live in one space: [0, source.length) is the source segment and
 * source.length + n is byte n of this window's target.
 */

import { allocBufferUnsafe } from 'extract-base-iterator';
import { adler32 } from '../lib/adler32.ts';
import type { ByteCursor } from '../lib/ByteCursor.ts';
import type { CodeTable } from '../lib/CodeTable.ts';
import { readVarint } from '../lib/varint.ts';
import { type Instruction, InstructionType, type WindowHeader } from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';
import type { AddressCache } from './AddressCache.ts';

/**
 * Everything a window needs to be applied
 */
export interface WindowInput {
  header: WindowHeader;
  /** Source segment bytes (empty when the window has none) */
  source: Buffer;
  data: ByteCursor;
  instructions: ByteCursor;
  addresses: ByteCursor;
}

export type ApplierState = 'running' | 'done' | 'faulted';

export class DeltaApplier {
  private window: WindowInput;
  private codeTable: CodeTable;
  private cache: AddressCache;
  private target: Buffer;
  private produced: number;
  private currentState: ApplierState;

  constructor(window: WindowInput, codeTable: CodeTable, cache: AddressCache) {
    this.window = window;
    this.codeTable = codeTable;
    this.cache = cache;
    this.cache.reset();
    this.target = allocBufferUnsafe(window.header.targetLength);
    this.produced = 0;
    this.currentState = 'running';
  }

  get state(): ApplierState {
    return this.currentState;
  }

  /** Target bytes produced so far */
  get position(): number {
    return this.produced;
  }

  /**
   * Execute one opcode, or finish the window when the instructions section is exhausted
   * @returns true while more opcodes remain
   */
  step(): boolean {
    if (this.currentState !== 'running') {
      throw new Error(`Cannot step a delta applier that is ${this.currentState}`);
    }

    try {
      if (this.window.instructions.isAtEnd()) {
        this.finish();
        return false;
      }

      const opcode = this.window.instructions.readByte();
      const [first, second] = this.codeTable.get(opcode);
      this.execute(first);
      this.execute(second);
      return true;
    } catch (err) {
      this.currentState = 'faulted';
      throw err;
    }
  }

  /**
   * Run the window to completion
   * @returns The target window bytes
   */
  run(): Buffer {
    while (this.step()) {
      // keep stepping
    }
    return this.target;
  }

  private execute(instruction: Instruction): void {
    if (instruction.type === InstructionType.NOOP) return;

    const size = instruction.size === 0 ? readVarint(this.window.instructions) : instruction.size;
    const targetLength = this.window.header.targetLength;
    if (size > targetLength - this.produced) {
      throw new VcdiffError('LengthMismatch', `Instruction of ${size} byte(s) at target offset ${this.produced} overruns the target window length ${targetLength}`);
    }

    switch (instruction.type) {
      case InstructionType.ADD: {
        const bytes = this.window.data.readBytes(size);
        bytes.copy(this.target, this.produced);
        this.produced += size;
        break;
      }
      case InstructionType.RUN: {
        const byte = this.window.data.readByte();
        this.target.fill(byte, this.produced, this.produced + size);
        this.produced += size;
        break;
      }
      case InstructionType.COPY: {
        const here = this.window.source.length + this.produced;
        const address = this.cache.decodeAddress(here, instruction.mode, this.window.addresses);
        this.copy(address, size);
        break;
      }
    }
  }

  private copy(address: number, size: number): void {
    const source = this.window.source;
    const target = this.target;
    const end = this.produced + size;
    let dest = this.produced;
    let from = address;

    if (from < source.length) {
      const count = Math.min(size, source.length - from);
      source.copy(target, dest, from, from + count);
      dest += count;
      from += count;
    }

    if (dest < end) {
      let t = from - source.length;
      const count = end - dest;
      if (t + count <= dest) {
        target.copy(target, dest, t, t + count);
      } else {
        // Overlaps its own output: each byte may have been written by this copy
        while (dest < end) {
          target[dest++] = target[t++];
        }
      }
    }

    this.produced = end;
  }

  private finish(): void {
    const header = this.window.header;
    if (this.produced !== header.targetLength) {
      throw new VcdiffError('LengthMismatch', `Window produced ${this.produced} byte(s) but declared a target length of ${header.targetLength}`);
    }
    if (header.checksum !== null) {
      const actual = adler32(this.target);
      if (actual !== header.checksum) {
        throw new VcdiffError('ChecksumMismatch', `Window checksum mismatch: expected 0x${header.checksum.toString(16)}, got 0x${actual.toString(16)}`);
      }
    }
    this.currentState = 'done';
  }
}
