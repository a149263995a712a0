/**
 * vcdiff-decoder: VCDIFF (RFC 3284) Delta Decoding Library
 *
 * Pure JavaScript implementation. Reconstructs a target from a dictionary
 * and a VCDIFF delta, including custom code tables, VCD_TARGET windows and
 * Adler-32 window checksums.
 */

// ============================================================================
// High-Level APIs (Recommended)
// ============================================================================

// Async patching - callback or Promise
export { applyVcdiff, type PatchCallback } from './patch.ts';
// Synchronous all-or-nothing decode and the streaming Transform
export { createVcdiffDecoder, decodeVcdiff, VcdiffDecoder } from './vcdiff/index.ts';

// ============================================================================
// Low-Level APIs
// ============================================================================

// Window-level building blocks (code table, address cache, parsers)
export {
  AddressCache,
  type ApplierState,
  adler32,
  ByteCursor,
  CodeTable,
  type CodeTableEntry,
  DeltaApplier,
  decodeVarint,
  type HeaderParseResult,
  parseFileHeader,
  parseWindowHeader,
  readVarint,
  type VarintResult,
  type WindowDecodeResult,
  type WindowInput,
  type WindowParseResult,
} from './vcdiff/index.ts';

// ============================================================================
// Supporting APIs
// ============================================================================

export {
  DEFAULT_MAX_TARGET_FILE_SIZE,
  DEFAULT_MAX_TARGET_WINDOW_SIZE,
  DEFAULT_NEAR_SIZE,
  DEFAULT_SAME_SIZE,
  type Instruction,
  InstructionType,
  isVcdiffError,
  type SourceSegment,
  type SourceSegmentOrigin,
  VcdiffError,
  type VcdiffErrorCode,
  type VcdiffDecodeOptions,
  type VcdiffHeader,
  WINDOW_ENCODING_OVERHEAD,
  type WindowHeader,
} from './vcdiff/index.ts';

// Callback type used by async decoders
export type { DecodeCallback } from './utils/runDecode.ts';
