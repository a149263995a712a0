/**
 * Synchronous VCDIFF Decoder
 *
 * Decodes a complete VCDIFF delta against a dictionary. Windows are decoded
 * in order and every window's output is kept, since later VCD_TARGET windows
 * may copy from any byte decoded before them.
 */

import { allocBuffer, BufferList, bufferFrom, canAllocateBufferSize } from 'extract-base-iterator';
import { ByteCursor } from '../lib/ByteCursor.ts';
import { CodeTable } from '../lib/CodeTable.ts';
import { type HeaderParseResult, parseFileHeader, parseWindowHeader } from '../lib/WindowParser.ts';
import { CODE_TABLE_SIZE, DEFAULT_MAX_TARGET_FILE_SIZE, DEFAULT_MAX_TARGET_WINDOW_SIZE, type VcdiffDecodeOptions, type VcdiffHeader, WINDOW_ENCODING_OVERHEAD, type WindowHeader } from '../types.ts';
import { isVcdiffError, VcdiffError } from '../VcdiffError.ts';
import { AddressCache } from './AddressCache.ts';
import { DeltaApplier } from './DeltaApplier.ts';

/**
 * Result of decoding one window
 */
export type WindowDecodeResult = { success: true; output: Buffer; bytesRead: number } | { success: false; needBytes: number };

/**
 * Decode the custom code table carried in a file header
 *
 * The table is itself a VCDIFF delta whose dictionary is the serialised
 * default code table.
 */
function loadCodeTable(header: VcdiffHeader): CodeTable {
  if (!header.codeTableData) return CodeTable.DEFAULT;

  const nested = parseFileHeader(header.codeTableData, 0);
  if (nested.success && nested.header.codeTableData) {
    throw new VcdiffError('InvalidCodeTable', 'A custom code table may not itself declare a custom code table');
  }

  let tableBytes: Buffer;
  try {
    tableBytes = new VcdiffDecoder(CodeTable.DEFAULT.toBytes(), {
      maxTargetWindowSize: CODE_TABLE_SIZE,
      maxTargetFileSize: CODE_TABLE_SIZE,
    }).decode(header.codeTableData);
  } catch (err) {
    if (isVcdiffError(err, 'LimitExceeded')) {
      throw new VcdiffError('InvalidCodeTable', `Custom code table decodes to more than ${CODE_TABLE_SIZE} bytes`);
    }
    throw err;
  }

  if (tableBytes.length !== CODE_TABLE_SIZE) {
    throw new VcdiffError('InvalidCodeTable', `Custom code table decodes to ${tableBytes.length} bytes, expected ${CODE_TABLE_SIZE}`);
  }
  return CodeTable.fromBytes(tableBytes, header.nearSize, header.sameSize);
}

/**
 * Stateful decoder for one delta file
 */
export class VcdiffDecoder {
  private dictionary: Buffer;
  private maxTargetWindowSize: number;
  private maxTargetFileSize: number;
  private maxEncodedWindowSize: number;
  private history: BufferList;
  private codeTable: CodeTable;
  private cache: AddressCache;
  private fileHeader: VcdiffHeader | null;

  constructor(dictionary: Buffer, options: VcdiffDecodeOptions = {}) {
    this.dictionary = dictionary;
    this.maxTargetWindowSize = options.maxTargetWindowSize ?? DEFAULT_MAX_TARGET_WINDOW_SIZE;
    this.maxTargetFileSize = options.maxTargetFileSize ?? DEFAULT_MAX_TARGET_FILE_SIZE;
    this.maxEncodedWindowSize = options.maxEncodedWindowSize ?? this.maxTargetWindowSize * 2 + WINDOW_ENCODING_OVERHEAD;
    this.history = new BufferList();
    this.codeTable = CodeTable.DEFAULT;
    this.cache = new AddressCache(this.codeTable.nearSize, this.codeTable.sameSize);
    this.fileHeader = null;
  }

  /** Parsed file header, once read */
  get header(): VcdiffHeader | null {
    return this.fileHeader;
  }

  /** Total bytes decoded so far */
  get outputLength(): number {
    return this.history.length;
  }

  /**
   * Parse the file header and install its code table
   */
  readHeader(input: Buffer, offset = 0): HeaderParseResult {
    if (this.fileHeader) {
      throw new Error('VCDIFF header has already been read');
    }

    const result = parseFileHeader(input, offset);
    if (!result.success) return result;

    const codeTable = loadCodeTable(result.header);
    if (codeTable !== this.codeTable) {
      this.codeTable = codeTable;
      this.cache = new AddressCache(codeTable.nearSize, codeTable.sameSize);
    }
    this.fileHeader = result.header;
    return result;
  }

  /**
   * Decode the window starting at `offset`
   *
   * Returns `{ success: false }` without consuming anything when the window
   * is not completely contained in `input`.
   */
  decodeWindow(input: Buffer, offset: number): WindowDecodeResult {
    if (!this.fileHeader) {
      throw new Error('VCDIFF header must be read before decoding windows');
    }

    const result = parseWindowHeader(input, offset);
    if (!result.success) {
      // Once the delta length is known, needBytes reaches the end of the window
      this.checkEncodedLength(input.length - offset + result.needBytes);
      return result;
    }

    const window = result.window;
    this.checkEncodedLength(window.totalSize);
    this.checkTargetLength(window.targetLength);

    const applier = new DeltaApplier(
      {
        header: window,
        source: this.sourceSegment(window),
        data: new ByteCursor(input, window.dataOffset, window.instructionsOffset, 'data section'),
        instructions: new ByteCursor(input, window.instructionsOffset, window.addressesOffset, 'instructions section'),
        addresses: new ByteCursor(input, window.addressesOffset, window.addressesOffset + window.addressesLength, 'addresses section'),
      },
      this.codeTable,
      this.cache
    );
    const output = applier.run();

    // Callers own the returned buffer; later VCD_TARGET windows read the private copy
    this.history.append(bufferFrom(output));
    return { success: true, output, bytesRead: window.totalSize };
  }

  /**
   * Decode a complete delta file
   * @returns The reconstructed target
   */
  decode(delta: Buffer): Buffer {
    const header = this.readHeader(delta, 0);
    if (!header.success) {
      throw new VcdiffError('TruncatedInput', `Truncated VCDIFF header (${header.needBytes} more byte(s) needed)`);
    }

    let offset = header.header.headerSize;
    while (offset < delta.length) {
      const result = this.decodeWindow(delta, offset);
      if (!result.success) {
        throw new VcdiffError('TruncatedInput', `Truncated VCDIFF window at offset ${offset} (${result.needBytes} more byte(s) needed)`);
      }
      offset += result.bytesRead;
    }

    return this.history.length === 0 ? allocBuffer(0) : this.history.toBuffer();
  }

  private checkEncodedLength(windowSize: number): void {
    if (windowSize > this.maxEncodedWindowSize) {
      throw new VcdiffError('LimitExceeded', `Encoded window of ${windowSize} bytes exceeds the maximum of ${this.maxEncodedWindowSize}`);
    }
  }

  private checkTargetLength(targetLength: number): void {
    if (targetLength > this.maxTargetWindowSize) {
      throw new VcdiffError('LimitExceeded', `Target window length ${targetLength} exceeds the maximum of ${this.maxTargetWindowSize}`);
    }
    if (this.history.length + targetLength > this.maxTargetFileSize) {
      throw new VcdiffError('LimitExceeded', `Decoded output would exceed the maximum target file size of ${this.maxTargetFileSize}`);
    }
    if (targetLength > 0 && !canAllocateBufferSize(targetLength)) {
      throw new VcdiffError('LimitExceeded', `Cannot allocate a target window of ${targetLength} bytes`);
    }
  }

  private sourceSegment(window: WindowHeader): Buffer {
    const segment = window.sourceSegment;
    if (!segment) return allocBuffer(0);

    const end = segment.offset + segment.length;
    if (segment.origin === 'dictionary') {
      if (end > this.dictionary.length) {
        throw new VcdiffError('LengthMismatch', `Source segment [${segment.offset}, ${end}) exceeds the ${this.dictionary.length} byte dictionary`);
      }
      return this.dictionary.slice(segment.offset, end);
    }

    if (end > this.history.length) {
      throw new VcdiffError('LengthMismatch', `Target segment [${segment.offset}, ${end}) exceeds the ${this.history.length} byte(s) decoded so far`);
    }
    return this.history.slice(segment.offset, end);
  }
}

/**
 * Decode a VCDIFF delta synchronously
 * @param dictionary - Source bytes the delta was computed against
 * @param delta - VCDIFF encoded delta
 * @param options - Size limits
 * @returns The reconstructed target
 */
export function decodeVcdiff(dictionary: Buffer, delta: Buffer, options?: VcdiffDecodeOptions): Buffer {
  return new VcdiffDecoder(dictionary, options).decode(delta);
}
