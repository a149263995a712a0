import assert from 'assert';
import { allocBuffer, bufferFrom } from 'extract-base-iterator';
import { adler32 } from 'vcdiff-decoder';

describe('Adler-32', () => {
  it('should return 1 for empty input', () => {
    assert.strictEqual(adler32(allocBuffer(0)), 1);
  });

  it('should checksum "Wikipedia"', () => {
    assert.strictEqual(adler32(bufferFrom('Wikipedia', 'ascii')), 0x11e60398);
  });

  it('should checksum a single byte', () => {
    // a = 1 + 0x61, b = a
    assert.strictEqual(adler32(bufferFrom('a', 'ascii')), 0x00620062);
  });

  it('should checksum a region', () => {
    const buf = bufferFrom('XXWikipediaYY', 'ascii');
    assert.strictEqual(adler32(buf, 1, 2, 11), 0x11e60398);
  });

  it('should continue from a running checksum', () => {
    const buf = bufferFrom('Wikipedia', 'ascii');
    const first = adler32(buf.slice(0, 4));
    assert.strictEqual(adler32(buf.slice(4), first), 0x11e60398);
  });

  it('should stay in range over long input', () => {
    const buf = bufferFrom(new Array<number>(100000).fill(0xff));
    const sum = adler32(buf);
    assert.ok((sum & 0xffff) < 65521);
    assert.ok(sum >>> 16 < 65521);
  });
});
