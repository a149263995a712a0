import assert from 'assert';
import { bufferFrom } from 'extract-base-iterator';
import { AddressCache, ByteCursor } from 'vcdiff-decoder';
import { throwsCode } from '../lib/assertions.ts';

function cursor(bytes: number[]): ByteCursor {
  return new ByteCursor(bufferFrom(bytes), 0, bytes.length, 'addresses section');
}

describe('AddressCache', () => {
  it('should read SELF addresses directly', () => {
    const cache = new AddressCache(4, 3);
    assert.strictEqual(cache.decodeAddress(10, 0, cursor([0x05])), 5);
  });

  it('should read HERE addresses as a distance back', () => {
    const cache = new AddressCache(4, 3);
    assert.strictEqual(cache.decodeAddress(10, 1, cursor([0x03])), 7);
  });

  it('should add near offsets to recent addresses', () => {
    const cache = new AddressCache(4, 3);
    const addresses = cursor([0x05, 0x02, 0x01]);
    assert.strictEqual(cache.decodeAddress(100, 0, addresses), 5); // near[0] = 5
    assert.strictEqual(cache.decodeAddress(100, 2, addresses), 7); // near[0] + 2, near[1] = 7
    assert.strictEqual(cache.decodeAddress(100, 3, addresses), 8); // near[1] + 1
    assert.ok(addresses.isAtEnd());
  });

  it('should overwrite the oldest near slot', () => {
    const cache = new AddressCache(2, 0);
    const addresses = cursor([10, 20, 30, 0x00, 0x00]);
    cache.decodeAddress(100, 0, addresses); // slot 0
    cache.decodeAddress(100, 0, addresses); // slot 1
    cache.decodeAddress(100, 0, addresses); // slot 0 again
    assert.strictEqual(cache.decodeAddress(100, 2, addresses), 30);
    // that lookup itself went into slot 1
    assert.strictEqual(cache.decodeAddress(100, 3, addresses), 30);
  });

  it('should find exact addresses in the same cache with one raw byte', () => {
    const cache = new AddressCache(4, 3);
    const addresses = cursor([0x05, 0x82, 0x2c, 0x05, 0x2c]);
    cache.decodeAddress(1000, 0, addresses); // 5 -> same[5]
    cache.decodeAddress(1000, 0, addresses); // 300 -> same[300]
    assert.strictEqual(cache.decodeAddress(1000, 6, addresses), 5); // same[0 * 256 + 5]
    assert.strictEqual(cache.decodeAddress(1000, 7, addresses), 300); // same[1 * 256 + 44]
    assert.ok(addresses.isAtEnd());
  });

  it('should clear both caches on reset', () => {
    const cache = new AddressCache(4, 3);
    cache.decodeAddress(1000, 0, cursor([0x05]));
    cache.reset();
    assert.strictEqual(cache.decodeAddress(1000, 2, cursor([0x01])), 1);
    assert.strictEqual(cache.decodeAddress(1000, 6, cursor([0x05])), 0);
  });

  it('should reject addresses at or beyond here', () => {
    const cache = new AddressCache(4, 3);
    throwsCode(() => cache.decodeAddress(5, 0, cursor([0x05])), 'InvalidAddress');
  });

  it('should reject HERE distances past the start', () => {
    const cache = new AddressCache(4, 3);
    throwsCode(() => cache.decodeAddress(5, 1, cursor([0x06])), 'InvalidAddress');
  });

  it('should reject modes beyond the cache sizes', () => {
    const cache = new AddressCache(4, 3);
    throwsCode(() => cache.decodeAddress(100, 9, cursor([0x00])), 'InvalidAddress');
  });

  it('should fail with TruncatedInput when the addresses section runs out', () => {
    const cache = new AddressCache(4, 3);
    throwsCode(() => cache.decodeAddress(100, 0, cursor([0x81])), 'TruncatedInput');
    throwsCode(() => cache.decodeAddress(100, 6, cursor([])), 'TruncatedInput');
  });
});
