/**
 * VCDIFF Code Table
 *
 * Maps each opcode byte to a pair of instructions. Single-instruction
 * opcodes carry a NOOP in the second slot.
 *
 * Default table layout (RFC 3284 section 5.6):
 * 0            = RUN, size 0
 * 1-18         = ADD, size 0, 1-17
 * 19-162       = COPY, size 0, 4-18, modes 0-8
 * 163-234      = ADD size 1-4 + COPY size 4-6, modes 0-5
 * 235-246      = ADD size 1-4 + COPY size 4, modes 6-8
 * 247-255      = COPY size 4 + ADD size 1, modes 0-8
 */

import { allocBuffer } from 'extract-base-iterator';
import { CODE_TABLE_SIZE, DEFAULT_NEAR_SIZE, DEFAULT_SAME_SIZE, type Instruction, InstructionType } from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';

export type CodeTableEntry = readonly [Instruction, Instruction];

const NOOP: Instruction = { type: InstructionType.NOOP, size: 0, mode: 0 };

function isInstructionType(value: number): value is InstructionType {
  return value === InstructionType.NOOP || value === InstructionType.ADD || value === InstructionType.RUN || value === InstructionType.COPY;
}

function buildDefaultEntries(): CodeTableEntry[] {
  const entries: CodeTableEntry[] = [];
  const single = (type: InstructionType, size: number, mode = 0) => entries.push([{ type, size, mode }, NOOP]);
  const pair = (first: Instruction, second: Instruction) => entries.push([first, second]);

  single(InstructionType.RUN, 0);

  for (let size = 0; size <= 17; size++) {
    single(InstructionType.ADD, size);
  }

  for (let mode = 0; mode <= 8; mode++) {
    single(InstructionType.COPY, 0, mode);
    for (let size = 4; size <= 18; size++) {
      single(InstructionType.COPY, size, mode);
    }
  }

  for (let mode = 0; mode <= 5; mode++) {
    for (let addSize = 1; addSize <= 4; addSize++) {
      for (let copySize = 4; copySize <= 6; copySize++) {
        pair({ type: InstructionType.ADD, size: addSize, mode: 0 }, { type: InstructionType.COPY, size: copySize, mode });
      }
    }
  }

  for (let mode = 6; mode <= 8; mode++) {
    for (let addSize = 1; addSize <= 4; addSize++) {
      pair({ type: InstructionType.ADD, size: addSize, mode: 0 }, { type: InstructionType.COPY, size: 4, mode });
    }
  }

  for (let mode = 0; mode <= 8; mode++) {
    pair({ type: InstructionType.COPY, size: 4, mode }, { type: InstructionType.ADD, size: 1, mode: 0 });
  }

  return entries;
}

export class CodeTable {
  /** The RFC 3284 default code table */
  static readonly DEFAULT: CodeTable = new CodeTable(buildDefaultEntries(), DEFAULT_NEAR_SIZE, DEFAULT_SAME_SIZE);

  readonly nearSize: number;
  readonly sameSize: number;
  private entries: CodeTableEntry[];

  private constructor(entries: CodeTableEntry[], nearSize: number, sameSize: number) {
    if (entries.length !== 256) {
      throw new VcdiffError('InvalidCodeTable', `Code table must have 256 entries, got ${entries.length}`);
    }
    this.entries = entries;
    this.nearSize = nearSize;
    this.sameSize = sameSize;
  }

  /**
   * Number of valid address modes (SELF, HERE, near slots, same slots)
   */
  get modeCount(): number {
    return 2 + this.nearSize + this.sameSize;
  }

  get(opcode: number): CodeTableEntry {
    return this.entries[opcode & 0xff];
  }

  /**
   * Serialise to the 1536-byte form used for custom table deltas:
   * inst1[256] inst2[256] size1[256] size2[256] mode1[256] mode2[256]
   */
  toBytes(): Buffer {
    const out = allocBuffer(CODE_TABLE_SIZE);
    for (let i = 0; i < 256; i++) {
      const [first, second] = this.entries[i];
      out[i] = first.type;
      out[256 + i] = second.type;
      out[512 + i] = first.size;
      out[768 + i] = second.size;
      out[1024 + i] = first.mode;
      out[1280 + i] = second.mode;
    }
    return out;
  }

  /**
   * Build a table from its 1536-byte serialised form
   */
  static fromBytes(bytes: Buffer, nearSize: number = DEFAULT_NEAR_SIZE, sameSize: number = DEFAULT_SAME_SIZE): CodeTable {
    if (bytes.length !== CODE_TABLE_SIZE) {
      throw new VcdiffError('InvalidCodeTable', `Code table data must be ${CODE_TABLE_SIZE} bytes, got ${bytes.length}`);
    }
    const modeCount = 2 + nearSize + sameSize;
    if (modeCount > 256) {
      throw new VcdiffError('InvalidCodeTable', `Near cache size ${nearSize} plus same cache size ${sameSize} leaves no room for 256 modes`);
    }

    const read = (opcode: number, half: 0 | 1): Instruction => {
      const type = bytes[half * 256 + opcode];
      const size = bytes[512 + half * 256 + opcode];
      const mode = bytes[1024 + half * 256 + opcode];
      if (!isInstructionType(type)) {
        throw new VcdiffError('InvalidCodeTable', `Invalid instruction type ${type} for opcode ${opcode}`);
      }
      if (type === InstructionType.COPY && mode >= modeCount) {
        throw new VcdiffError('InvalidCodeTable', `Invalid COPY mode ${mode} for opcode ${opcode} (table has ${modeCount} modes)`);
      }
      return { type, size, mode };
    };

    const entries: CodeTableEntry[] = [];
    for (let opcode = 0; opcode < 256; opcode++) {
      entries.push([read(opcode, 0), read(opcode, 1)]);
    }
    return new CodeTable(entries, nearSize, sameSize);
  }
}
