/**
 * VCDIFF Transform Stream
 *
 * Decodes a delta as it arrives. Input is buffered until the file header,
 * then each complete window, is available; every decoded window is pushed
 * as one chunk. Windows are bounded by their declared lengths, so only
 * the undecoded tail of the input is held between chunks.
 *
 * Unlike decodeVcdiff(), windows decoded before a failure have already been
 * emitted when the stream errors.
 */

import { Transform } from 'extract-base-iterator';
import { VcdiffDecoder } from '../sync/VcdiffDecoder.ts';
import type { VcdiffDecodeOptions } from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';

/**
 * Create a VCDIFF decoder Transform stream
 *
 * @param dictionary - Source bytes the delta was computed against
 * @param options - Size limits
 * @returns Transform stream that turns delta bytes into target bytes
 */
export function createVcdiffDecoder(dictionary: Buffer, options?: VcdiffDecodeOptions): InstanceType<typeof Transform> {
  const decoder = new VcdiffDecoder(dictionary, options);

  // Bytes received but not yet decoded
  let pending: Buffer | null = null;
  let headerRead = false;

  return new Transform({
    transform: function (this: InstanceType<typeof Transform>, chunk: Buffer, _encoding: string, callback: (err?: Error | null) => void) {
      let input: Buffer;
      if (pending && pending.length > 0) {
        input = Buffer.concat([pending, chunk]);
        pending = null;
      } else {
        input = chunk;
      }

      let offset = 0;

      try {
        if (!headerRead) {
          const result = decoder.readHeader(input, 0);
          if (!result.success) {
            pending = input;
            callback(null);
            return;
          }
          headerRead = true;
          offset = result.header.headerSize;
        }

        while (offset < input.length) {
          const result = decoder.decodeWindow(input, offset);
          if (!result.success) break;

          if (result.output.length > 0) this.push(result.output);
          offset += result.bytesRead;
        }

        if (offset < input.length) pending = input.slice(offset);
        callback(null);
      } catch (err) {
        callback(err as Error);
      }
    },

    flush: function (this: InstanceType<typeof Transform>, callback: (err?: Error | null) => void) {
      if (!headerRead) {
        callback(new VcdiffError('TruncatedInput', 'Truncated VCDIFF header'));
      } else if (pending && pending.length > 0) {
        callback(new VcdiffError('TruncatedInput', `Truncated VCDIFF window (${pending.length} byte(s) left over)`));
      } else {
        callback(null);
      }
    },
  });
}
