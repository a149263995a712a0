/**
 * VCDIFF decode errors
 *
 * Every failure raised while decoding a delta is a VcdiffError carrying a
 * machine-readable code. Messages are meant for humans; match on `code`.
 */

export type VcdiffErrorCode =
  | 'BadMagic'
  | 'UnsupportedVersion'
  | 'UnsupportedFeature'
  | 'InvalidIndicator'
  | 'TruncatedInput'
  | 'IntegerOverflow'
  | 'LengthMismatch'
  | 'InvalidAddress'
  | 'ChecksumMismatch'
  | 'InvalidCodeTable'
  | 'LimitExceeded';

export class VcdiffError extends Error {
  readonly code: VcdiffErrorCode;

  constructor(code: VcdiffErrorCode, message: string) {
    super(message);
    this.name = 'VcdiffError';
    this.code = code;
  }
}

/**
 * Narrow an unknown error to a VcdiffError, optionally of a given code
 */
export function isVcdiffError(err: unknown, code?: VcdiffErrorCode): err is VcdiffError {
  if (!(err instanceof VcdiffError)) return false;
  return code === undefined || err.code === code;
}
