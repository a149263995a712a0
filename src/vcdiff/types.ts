/**
 * VCDIFF Types and Constants
 *
 * Shared types and format constants for VCDIFF decoding.
 * Based on RFC 3284 (The VCDIFF Generic Differencing and Compression Data Format).
 */

// File header
export const VCDIFF_MAGIC = [0xd6, 0xc3, 0xc4];
export const VCDIFF_VERSION = 0x00;

// Header indicator bits
export const VCD_DECOMPRESS = 0x01;
export const VCD_CODETABLE = 0x02;
export const VCD_APPHEADER = 0x04;

// Window indicator bits
export const VCD_SOURCE = 0x01;
export const VCD_TARGET = 0x02;
export const VCD_ADLER32 = 0x04;

// Delta indicator bits (secondary compression per section)
export const VCD_DATACOMP = 0x01;
export const VCD_INSTCOMP = 0x02;
export const VCD_ADDRCOMP = 0x04;

// Address cache defaults
export const DEFAULT_NEAR_SIZE = 4;
export const DEFAULT_SAME_SIZE = 3;
export const VCD_SELF = 0;
export const VCD_HERE = 1;

// Serialised code table: six arrays of 256 bytes
export const CODE_TABLE_SIZE = 256 * 6;

// Largest value accepted for sizes, positions and addresses
export const MAX_UINT32 = 0xffffffff;

export const DEFAULT_MAX_TARGET_WINDOW_SIZE = 1 << 26; // 64MB
export const DEFAULT_MAX_TARGET_FILE_SIZE = 1 << 26; // 64MB
// Added to twice maxTargetWindowSize for the default maxEncodedWindowSize
export const WINDOW_ENCODING_OVERHEAD = 1 << 16;

/**
 * Instruction types as stored in code tables
 */
export const InstructionType = {
  NOOP: 0,
  ADD: 1,
  RUN: 2,
  COPY: 3,
} as const;

export type InstructionType = (typeof InstructionType)[keyof typeof InstructionType];

/**
 * One half of a code table entry
 */
export interface Instruction {
  type: InstructionType;
  /** Literal size, or 0 when the size follows in the instructions section */
  size: number;
  /** Address mode (COPY only) */
  mode: number;
}

/**
 * Parsed file header
 */
export interface VcdiffHeader {
  /** Raw header indicator byte */
  indicator: number;
  /** Near cache size of the custom code table (only when one is declared) */
  nearSize: number;
  /** Same cache size of the custom code table (only when one is declared) */
  sameSize: number;
  /** Encoded custom code table delta, or null for the default table */
  codeTableData: Buffer | null;
  /** Application-defined header bytes, or null */
  applicationHeader: Buffer | null;
  /** Total bytes consumed by the header */
  headerSize: number;
}

export type SourceSegmentOrigin = 'dictionary' | 'target';

export interface SourceSegment {
  origin: SourceSegmentOrigin;
  offset: number;
  length: number;
}

/**
 * Parsed window header with absolute section offsets
 */
export interface WindowHeader {
  /** Raw window indicator byte */
  indicator: number;
  sourceSegment: SourceSegment | null;
  deltaLength: number;
  targetLength: number;
  /** Raw delta indicator byte */
  deltaIndicator: number;
  dataLength: number;
  instructionsLength: number;
  addressesLength: number;
  /** Adler-32 of the target window, or null when absent */
  checksum: number | null;
  dataOffset: number;
  instructionsOffset: number;
  addressesOffset: number;
  /** Total bytes of the window, from the indicator to the end of the addresses section */
  totalSize: number;
}

/**
 * Decoder configuration
 */
export interface VcdiffDecodeOptions {
  /** Largest target_length accepted for one window */
  maxTargetWindowSize?: number;
  /** Largest total output accepted for one delta file */
  maxTargetFileSize?: number;
  /**
   * Largest encoded window accepted, from its indicator byte to the end of
   * its addresses section. Checked as soon as the delta length is read, so a
   * stream never buffers more than this. Defaults to
   * `2 * maxTargetWindowSize + WINDOW_ENCODING_OVERHEAD`.
   */
  maxEncodedWindowSize?: number;
}
