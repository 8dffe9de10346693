import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { NativeIdSchema, PriceSchema } from '../price.js';

void describe('PriceSchema', () => {
  void it('accepts numbers and decimal strings', () => {
    assert.equal(PriceSchema.parse(1499.9), 1499.9);
    assert.equal(PriceSchema.parse(' 1499.90 '), 1499.9);
    assert.equal(PriceSchema.parse('0'), 0);
  });

  void it('rejects negative, non-finite and non-decimal values', () => {
    assert.equal(PriceSchema.safeParse(-1).success, false);
    assert.equal(PriceSchema.safeParse(Number.POSITIVE_INFINITY).success, false);
    assert.equal(PriceSchema.safeParse('12,50').success, false);
    assert.equal(PriceSchema.safeParse('').success, false);
  });
});

void describe('NativeIdSchema', () => {
  void it('normalizes numeric ids to strings', () => {
    assert.equal(NativeIdSchema.parse(123456), '123456');
    assert.equal(NativeIdSchema.parse('MLA100'), 'MLA100');
  });

  void it('rejects empty ids', () => {
    assert.equal(NativeIdSchema.safeParse('').success, false);
  });
});
