// Adler-32 checksum (RFC 1950) as used by the VCD_ADLER32 window extension

const MOD_ADLER = 65521;
// Largest n such that 255n(n+1)/2 + (n+1)(MOD_ADLER-1) fits in 2^32 - 1
const NMAX = 5552;

/**
 * Compute Adler-32 over `buf[start..end)`
 *
 * @param initial - Running checksum to continue from (1 for a fresh checksum)
 */
export function adler32(buf: Buffer | Uint8Array, initial = 1, start = 0, end: number = buf.length): number {
  let a = initial & 0xffff;
  let b = (initial >>> 16) & 0xffff;
  let i = start;

  while (i < end) {
    const blockEnd = Math.min(i + NMAX, end);
    for (; i < blockEnd; i++) {
      a += buf[i];
      b += a;
    }
    a %= MOD_ADLER;
    b %= MOD_ADLER;
  }

  return ((b << 16) | a) >>> 0;
}
