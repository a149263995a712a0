/**
 * VCDIFF Header and Window Parser
 *
 * Shared parsing logic for the file header and window headers.
 * Used by both the synchronous and the streaming decoder.
 *
 * Both parsers report incomplete input as `{ success: false, needBytes }`
 * so the stream decoder can wait for more data, and throw VcdiffError for
 * content that can never become valid.
 *
 * Window layout:
 *   Win_Indicator                      byte
 *   [Source segment size]              varint  (VCD_SOURCE or VCD_TARGET)
 *   [Source segment position]          varint  (VCD_SOURCE or VCD_TARGET)
 *   Length of the delta encoding       varint
 *   ---- delta encoding ----
 *   Size of the target window          varint
 *   Delta_Indicator                    byte
 *   Length of data for ADDs and RUNs   varint
 *   Length of instructions section     varint
 *   Length of addresses for COPYs      varint
 *   [Adler-32 of the target window]    4 bytes big-endian (VCD_ADLER32)
 *   Data section
 *   Instructions section
 *   Addresses section
 */

import {
  VCD_ADDRCOMP,
  VCD_ADLER32,
  VCD_APPHEADER,
  VCD_CODETABLE,
  VCD_DATACOMP,
  VCD_DECOMPRESS,
  VCD_INSTCOMP,
  VCD_SOURCE,
  VCD_TARGET,
  VCDIFF_MAGIC,
  VCDIFF_VERSION,
  type VcdiffHeader,
  type WindowHeader,
} from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';
import { decodeVarint } from './varint.ts';

export type HeaderParseResult = { success: true; header: VcdiffHeader } | { success: false; needBytes: number };

export type WindowParseResult = { success: true; window: WindowHeader } | { success: false; needBytes: number };

/**
 * Parse the file header
 *
 * @param input - Input buffer
 * @param offset - Offset of the magic bytes
 */
export function parseFileHeader(input: Buffer, offset = 0): HeaderParseResult {
  for (let i = 0; i < VCDIFF_MAGIC.length; i++) {
    if (offset + i >= input.length) {
      return { success: false, needBytes: 5 - (input.length - offset) };
    }
    if (input[offset + i] !== VCDIFF_MAGIC[i]) {
      throw new VcdiffError('BadMagic', 'Invalid VCDIFF magic bytes');
    }
  }

  if (offset + 5 > input.length) {
    return { success: false, needBytes: 5 - (input.length - offset) };
  }

  const version = input[offset + 3];
  if (version !== VCDIFF_VERSION) {
    throw new VcdiffError('UnsupportedVersion', `Unsupported VCDIFF version: 0x${version.toString(16)}`);
  }

  const indicator = input[offset + 4];
  if ((indicator & ~(VCD_DECOMPRESS | VCD_CODETABLE | VCD_APPHEADER)) !== 0) {
    throw new VcdiffError('InvalidIndicator', `Invalid header indicator: 0x${indicator.toString(16)}`);
  }
  if (indicator & VCD_DECOMPRESS) {
    throw new VcdiffError('UnsupportedFeature', 'Secondary compression of delta files is not supported');
  }

  let pos = offset + 5;
  let nearSize = 0;
  let sameSize = 0;
  let codeTableData: Buffer | null = null;
  let applicationHeader: Buffer | null = null;

  if (indicator & VCD_CODETABLE) {
    const length = decodeVarint(input, pos);
    if (!length) return { success: false, needBytes: 1 };
    pos += length.bytesRead;
    if (length.value < 2) {
      throw new VcdiffError('InvalidCodeTable', `Custom code table section too short: ${length.value} byte(s)`);
    }
    if (pos + length.value > input.length) {
      return { success: false, needBytes: pos + length.value - input.length };
    }
    nearSize = input[pos];
    sameSize = input[pos + 1];
    codeTableData = input.slice(pos + 2, pos + length.value);
    pos += length.value;
  }

  if (indicator & VCD_APPHEADER) {
    const length = decodeVarint(input, pos);
    if (!length) return { success: false, needBytes: 1 };
    pos += length.bytesRead;
    if (pos + length.value > input.length) {
      return { success: false, needBytes: pos + length.value - input.length };
    }
    applicationHeader = input.slice(pos, pos + length.value);
    pos += length.value;
  }

  return {
    success: true,
    header: {
      indicator,
      nearSize,
      sameSize,
      codeTableData,
      applicationHeader,
      headerSize: pos - offset,
    },
  };
}

/**
 * Parse a window header and locate its three sections
 *
 * Succeeds only when the whole window (header and sections) is available.
 *
 * @param input - Input buffer
 * @param offset - Offset of the window indicator byte
 */
export function parseWindowHeader(input: Buffer, offset: number): WindowParseResult {
  if (offset >= input.length) {
    return { success: false, needBytes: 1 };
  }

  const indicator = input[offset];
  if ((indicator & ~(VCD_SOURCE | VCD_TARGET | VCD_ADLER32)) !== 0) {
    throw new VcdiffError('InvalidIndicator', `Invalid window indicator: 0x${indicator.toString(16)}`);
  }
  if ((indicator & VCD_SOURCE) && (indicator & VCD_TARGET)) {
    throw new VcdiffError('InvalidIndicator', 'Window indicator has both VCD_SOURCE and VCD_TARGET set');
  }

  let pos = offset + 1;
  let sourceSegment: WindowHeader['sourceSegment'] = null;

  if (indicator & (VCD_SOURCE | VCD_TARGET)) {
    const length = decodeVarint(input, pos);
    if (!length) return { success: false, needBytes: 1 };
    pos += length.bytesRead;
    const position = decodeVarint(input, pos);
    if (!position) return { success: false, needBytes: 1 };
    pos += position.bytesRead;
    sourceSegment = {
      origin: indicator & VCD_SOURCE ? 'dictionary' : 'target',
      offset: position.value,
      length: length.value,
    };
  }

  const deltaLengthResult = decodeVarint(input, pos);
  if (!deltaLengthResult) return { success: false, needBytes: 1 };
  pos += deltaLengthResult.bytesRead;

  const deltaLength = deltaLengthResult.value;
  const deltaEnd = pos + deltaLength;
  if (deltaEnd > input.length) {
    return { success: false, needBytes: deltaEnd - input.length };
  }

  // Every field below must sit inside the declared delta encoding
  const field = (name: string): number => {
    const result = decodeVarint(input, pos, deltaEnd);
    if (!result) {
      throw new VcdiffError('LengthMismatch', `Window ${name} runs past the delta encoding length ${deltaLength}`);
    }
    pos += result.bytesRead;
    return result.value;
  };

  const targetLength = field('target length');

  if (pos >= deltaEnd) {
    throw new VcdiffError('LengthMismatch', `Window delta indicator runs past the delta encoding length ${deltaLength}`);
  }
  const deltaIndicator = input[pos++];
  if (deltaIndicator & (VCD_DATACOMP | VCD_INSTCOMP | VCD_ADDRCOMP)) {
    throw new VcdiffError('UnsupportedFeature', `Secondary compression of window sections is not supported (delta indicator 0x${deltaIndicator.toString(16)})`);
  }
  if (deltaIndicator !== 0) {
    throw new VcdiffError('InvalidIndicator', `Invalid delta indicator: 0x${deltaIndicator.toString(16)}`);
  }

  const dataLength = field('data section length');
  const instructionsLength = field('instructions section length');
  const addressesLength = field('addresses section length');

  let checksum: number | null = null;
  if (indicator & VCD_ADLER32) {
    if (pos + 4 > deltaEnd) {
      throw new VcdiffError('LengthMismatch', `Window checksum runs past the delta encoding length ${deltaLength}`);
    }
    checksum = input.readUInt32BE(pos);
    pos += 4;
  }

  const dataOffset = pos;
  const instructionsOffset = dataOffset + dataLength;
  const addressesOffset = instructionsOffset + instructionsLength;
  const sectionsEnd = addressesOffset + addressesLength;

  if (sectionsEnd !== deltaEnd) {
    throw new VcdiffError(
      'LengthMismatch',
      `Window sections (data ${dataLength}, instructions ${instructionsLength}, addresses ${addressesLength}) do not match the delta encoding length ${deltaLength}`
    );
  }

  return {
    success: true,
    window: {
      indicator,
      sourceSegment,
      deltaLength,
      targetLength,
      deltaIndicator,
      dataLength,
      instructionsLength,
      addressesLength,
      checksum,
      dataOffset,
      instructionsOffset,
      addressesOffset,
      totalSize: deltaEnd - offset,
    },
  };
}
