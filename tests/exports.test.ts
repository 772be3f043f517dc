import { describe, test, expect } from '@jest/globals';
import * as num from '../src/lib/num/index.js';

describe('lib/num entry point', () => {
  test('exposes the value type and its helpers', () => {
    const a = num.BigInteger.parse('-1_000_001');
    expect(num.formatGrouped(a)).toBe('-1,000,001');
    expect(num.max(a, num.BigInteger.zero()).isZero()).toBe(true);
    expect(a.sign).toBe(num.Sign.Negative);
    expect(num.BASE).toBe(10);
    expect(new num.DigitSequence([1]).length).toBe(1);
  });

  test('error classes share a base', () => {
    expect(new num.BigIntegerRangeError(0.5)).toBeInstanceOf(num.BigIntegerError);
    expect(new num.InvalidPositionError(1, 0)).toBeInstanceOf(num.BigIntegerError);
  });
});
