/**
 * Tests for value-pool arithmetic
 */

import {
  COIN,
  MAX_MONEY,
  AmountRangeError,
  addToPool,
  subtractFromPool,
  moneyRange,
  formatAmount
} from '../../src/consensus/amount';

const thrown = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('moneyRange', () => {
  test('accepts the closed range [0, MAX_MONEY]', () => {
    expect(moneyRange(0n)).toBe(true);
    expect(moneyRange(MAX_MONEY)).toBe(true);
  });

  test('rejects values outside the range', () => {
    expect(moneyRange(-1n)).toBe(false);
    expect(moneyRange(MAX_MONEY + 1n)).toBe(false);
  });
});

describe('addToPool', () => {
  test('adds within range', () => {
    expect(addToPool(0n, MAX_MONEY)).toBe(MAX_MONEY);
    expect(addToPool(5n * COIN, COIN)).toBe(6n * COIN);
  });

  test('reports an out-of-range amount', () => {
    expect(() => addToPool(0n, -1n)).toThrow(AmountRangeError);
    const error = thrown(() => addToPool(0n, MAX_MONEY + 1n));
    expect(error).toBeInstanceOf(AmountRangeError);
    expect(error).toBeInstanceOf(RangeError);
    expect(error).toMatchObject({ kind: 'amount', value: MAX_MONEY + 1n });
  });

  test('reports a total that leaves the range', () => {
    const error = thrown(() => addToPool(MAX_MONEY, 1n));
    expect(error).toBeInstanceOf(AmountRangeError);
    expect(error).toMatchObject({ kind: 'total', value: MAX_MONEY + 1n });
  });

  test('allows a negative running total down to -MAX_MONEY', () => {
    expect(addToPool(-MAX_MONEY, 0n)).toBe(-MAX_MONEY);
  });
});

describe('subtractFromPool', () => {
  test('subtracts down to -MAX_MONEY', () => {
    expect(subtractFromPool(0n, MAX_MONEY)).toBe(-MAX_MONEY);
  });

  test('throws when the total drops below -MAX_MONEY', () => {
    expect(() => subtractFromPool(-MAX_MONEY, 1n)).toThrow(AmountRangeError);
  });

  test('throws on a negative amount', () => {
    expect(() => subtractFromPool(0n, -1n)).toThrow('outside [0,');
  });
});

describe('formatAmount', () => {
  test('formats whole and fractional coins', () => {
    expect(formatAmount(150_000_000n)).toBe('1.50000000');
    expect(formatAmount(0n)).toBe('0.00000000');
    expect(formatAmount(MAX_MONEY)).toBe('84000000.00000000');
  });

  test('formats negative amounts', () => {
    expect(formatAmount(-5n)).toBe('-0.00000005');
  });
});
