/**
 * Hand assembler for VCDIFF test fixtures
 *
 * Emits opcodes of the default code table; not a diff encoder.
 */

import { allocBuffer, bufferFrom } from 'extract-base-iterator';
import { adler32 } from 'vcdiff-decoder';

export const MAGIC = [0xd6, 0xc3, 0xc4, 0x00];

/**
 * Big-endian base-128 varint
 */
export function varint(value: number): number[] {
  const bytes = [value & 0x7f];
  let rest = Math.floor(value / 128);
  while (rest > 0) {
    bytes.unshift((rest & 0x7f) | 0x80);
    rest = Math.floor(rest / 128);
  }
  return bytes;
}

export interface Op {
  instructions: number[];
  data: number[];
  addresses: number[];
}

function toBytes(input: string | number[] | Buffer): number[] {
  if (typeof input === 'string') return Array.from(bufferFrom(input, 'latin1'));
  return Array.from(input);
}

/** ADD literal bytes */
export function add(bytes: string | number[] | Buffer): Op {
  const data = toBytes(bytes);
  const size = data.length;
  const instructions = size >= 1 && size <= 17 ? [size + 1] : [1, ...varint(size)];
  return { instructions, data, addresses: [] };
}

/** RUN of one byte */
export function run(byte: number, size: number): Op {
  return { instructions: [0, ...varint(size)], data: [byte], addresses: [] };
}

/**
 * COPY with an encoded address field
 *
 * For SELF, HERE and near modes `address` is the varint written to the
 * addresses section; for same modes (6-8 in the default table) it is the raw byte.
 */
export function copy(address: number, size: number, mode = 0): Op {
  const base = 19 + mode * 16;
  const instructions = size >= 4 && size <= 18 ? [base + size - 3] : [base, ...varint(size)];
  const addresses = mode >= 6 ? [address] : varint(address);
  return { instructions, data: [], addresses };
}

/** A raw opcode followed by optional size varints */
export function opcode(code: number, data: number[] = [], addresses: number[] = [], sizes: number[] = []): Op {
  const instructions = [code];
  for (const size of sizes) instructions.push(...varint(size));
  return { instructions, data, addresses };
}

export interface WindowFixture {
  ops: Op[];
  /** Declared target length; defaults to the bytes the ops produce when `expected` is given */
  targetLength?: number;
  source?: { origin: 'dictionary' | 'target'; offset: number; length: number };
  /** Expected target bytes, used for the checksum and the default target length */
  expected?: string | number[] | Buffer;
  checksum?: boolean | number;
  deltaIndicator?: number;
  /** Added to the computed delta length */
  deltaLengthAdjust?: number;
}

export interface WindowLayout {
  bytes: number[];
  /** Offsets (relative to the window start) where each section begins, plus the end */
  boundaries: number[];
}

export function buildWindow(fixture: WindowFixture): WindowLayout {
  const data: number[] = [];
  const instructions: number[] = [];
  const addresses: number[] = [];
  for (const op of fixture.ops) {
    data.push(...op.data);
    instructions.push(...op.instructions);
    addresses.push(...op.addresses);
  }

  const expected = fixture.expected === undefined ? undefined : bufferFrom(toBytes(fixture.expected));
  const targetLength = fixture.targetLength ?? expected?.length ?? 0;

  let indicator = 0;
  if (fixture.source) indicator |= fixture.source.origin === 'dictionary' ? 0x01 : 0x02;

  let checksumBytes: number[] = [];
  if (fixture.checksum !== undefined && fixture.checksum !== false) {
    indicator |= 0x04;
    const value = typeof fixture.checksum === 'number' ? fixture.checksum : adler32(expected ?? allocBuffer(0));
    const buf = allocBuffer(4);
    buf.writeUInt32BE(value, 0);
    checksumBytes = Array.from(buf);
  }

  const body = [...varint(targetLength), fixture.deltaIndicator ?? 0, ...varint(data.length), ...varint(instructions.length), ...varint(addresses.length), ...checksumBytes];
  const deltaLength = body.length + data.length + instructions.length + addresses.length + (fixture.deltaLengthAdjust ?? 0);

  const head = [indicator];
  if (fixture.source) head.push(...varint(fixture.source.length), ...varint(fixture.source.offset));
  head.push(...varint(deltaLength));

  const headerEnd = head.length + body.length;
  const boundaries = [head.length, headerEnd, headerEnd + data.length, headerEnd + data.length + instructions.length, headerEnd + data.length + instructions.length + addresses.length];
  return { bytes: [...head, ...body, ...data, ...instructions, ...addresses], boundaries };
}

export interface DeltaFixture {
  windows: WindowFixture[];
  codeTable?: { nearSize: number; sameSize: number; delta: Buffer };
  applicationHeader?: Buffer;
  /** Overrides the computed header indicator */
  indicator?: number;
}

export interface DeltaLayout {
  delta: Buffer;
  headerSize: number;
  /** Absolute offsets of every header, section and window boundary */
  boundaries: number[];
  /** Absolute offsets where a window ends (valid truncation points) */
  windowEnds: number[];
}

export function layoutDelta(fixture: DeltaFixture): DeltaLayout {
  const bytes = [...MAGIC];
  let indicator = 0;
  const sections: number[] = [];

  if (fixture.codeTable) {
    indicator |= 0x02;
    const table = [fixture.codeTable.nearSize, fixture.codeTable.sameSize, ...fixture.codeTable.delta];
    sections.push(...varint(table.length), ...table);
  }
  if (fixture.applicationHeader) {
    indicator |= 0x04;
    sections.push(...varint(fixture.applicationHeader.length), ...fixture.applicationHeader);
  }
  bytes.push(fixture.indicator ?? indicator, ...sections);

  const headerSize = bytes.length;
  const boundaries = [headerSize];
  const windowEnds = [headerSize];

  for (const window of fixture.windows) {
    const start = bytes.length;
    const layout = buildWindow(window);
    bytes.push(...layout.bytes);
    for (const boundary of layout.boundaries) boundaries.push(start + boundary);
    windowEnds.push(bytes.length);
  }

  return { delta: bufferFrom(bytes), headerSize, boundaries, windowEnds };
}

export function buildDelta(fixture: DeltaFixture): Buffer {
  return layoutDelta(fixture).delta;
}
