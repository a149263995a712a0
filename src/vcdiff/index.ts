/**
 * VCDIFF Decoder Module
 *
 * Provides synchronous and streaming decoders for VCDIFF (RFC 3284) deltas.
 *
 * Synchronous API: Use when the whole delta is a Buffer; all-or-nothing
 * Streaming API: Use with Transform streams to emit each window as it decodes
 */

export { AddressCache } from './sync/AddressCache.ts';
export { type ApplierState, DeltaApplier, type WindowInput } from './sync/DeltaApplier.ts';
export { decodeVcdiff, VcdiffDecoder, type WindowDecodeResult } from './sync/VcdiffDecoder.ts';
export { createVcdiffDecoder } from './stream/transforms.ts';
export { adler32 } from './lib/adler32.ts';
export { ByteCursor } from './lib/ByteCursor.ts';
export { CodeTable, type CodeTableEntry } from './lib/CodeTable.ts';
export { decodeVarint, readVarint, type VarintResult } from './lib/varint.ts';
export { type HeaderParseResult, parseFileHeader, parseWindowHeader, type WindowParseResult } from './lib/WindowParser.ts';
export * from './types.ts';
export { isVcdiffError, VcdiffError, type VcdiffErrorCode } from './VcdiffError.ts';
