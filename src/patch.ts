/**
 * High-Level Patch API
 *
 * Asynchronous wrappers around the synchronous decoder, following the
 * callback-or-Promise convention used throughout this package.
 *
 * Decoding itself is a single synchronous pass over resident buffers; these
 * wrappers only move it off the caller's stack frame.
 */

import { type DecodeCallback, runDecode } from './utils/runDecode.ts';
import { decodeVcdiff } from './vcdiff/sync/VcdiffDecoder.ts';
import type { VcdiffDecodeOptions } from './vcdiff/types.ts';

/** Callback invoked when an async patch completes */
export type PatchCallback = DecodeCallback<Buffer>;

export function applyVcdiff(dictionary: Buffer, delta: Buffer, callback: PatchCallback): void;
export function applyVcdiff(dictionary: Buffer, delta: Buffer, options: VcdiffDecodeOptions, callback: PatchCallback): void;
export function applyVcdiff(dictionary: Buffer, delta: Buffer, options?: VcdiffDecodeOptions): Promise<Buffer>;
/**
 * Apply a VCDIFF delta to a dictionary
 */
export function applyVcdiff(dictionary: Buffer, delta: Buffer, options?: VcdiffDecodeOptions | PatchCallback, callback?: PatchCallback): Promise<Buffer> | void {
  if (typeof options === 'function') {
    callback = options;
    options = undefined;
  }
  const decodeOptions = options;
  return runDecode(() => decodeVcdiff(dictionary, delta, decodeOptions), callback);
}
