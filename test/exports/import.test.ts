import assert from 'assert';
import { applyVcdiff, CodeTable, createVcdiffDecoder, decodeVcdiff, isVcdiffError, VcdiffDecoder, VcdiffError } from 'vcdiff-decoder';

describe('exports .ts', () => {
  it('signature', () => {
    assert.ok(applyVcdiff);
    assert.ok(createVcdiffDecoder);
    assert.ok(decodeVcdiff);
    assert.ok(VcdiffDecoder);
    assert.ok(VcdiffError);
    assert.ok(isVcdiffError);
    assert.ok(CodeTable.DEFAULT);
  });
});
