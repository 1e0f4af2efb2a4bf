/**
 * Value-Pool Arithmetic
 * Range-checked accumulation over monetary amounts
 */

import type { Amount } from '../types/index';

export const COIN: Amount = 100_000_000n;

/**
 * Maximum supply; no single amount or running total may exceed it
 */
export const MAX_MONEY: Amount = 84_000_000n * COIN;

/**
 * True if value lies in [0, MAX_MONEY]
 */
export function moneyRange(value: Amount): boolean {
  return value >= 0n && value <= MAX_MONEY;
}

/**
 * Which operand left its range: the added amount or the resulting total
 */
export type AmountRangeKind = 'amount' | 'total';

export class AmountRangeError extends RangeError {
  constructor(
    public readonly kind: AmountRangeKind,
    public readonly value: Amount
  ) {
    super(
      kind === 'amount'
        ? `Amount ${value} outside [0, ${MAX_MONEY}]`
        : `Running total ${value} outside [-${MAX_MONEY}, ${MAX_MONEY}]`
    );
    this.name = 'AmountRangeError';
  }
}

/**
 * Add an amount entering a value pool to a running total.
 *
 * Throws AmountRangeError with kind 'amount' when the amount itself is
 * outside [0, MAX_MONEY], or kind 'total' when the result leaves
 * [-MAX_MONEY, MAX_MONEY].
 */
export function addToPool(total: Amount, amount: Amount): Amount {
  if (!moneyRange(amount)) {
    throw new AmountRangeError('amount', amount);
  }
  const next = total + amount;
  if (next > MAX_MONEY || next < -MAX_MONEY) {
    throw new AmountRangeError('total', next);
  }
  return next;
}

/**
 * Subtract an amount leaving a value pool, with the same checks as addToPool
 */
export function subtractFromPool(total: Amount, amount: Amount): Amount {
  if (!moneyRange(amount)) {
    throw new AmountRangeError('amount', amount);
  }
  const next = total - amount;
  if (next > MAX_MONEY || next < -MAX_MONEY) {
    throw new AmountRangeError('total', next);
  }
  return next;
}

/**
 * Format an amount as a decimal coin string (e.g. 150000000n -> "1.50000000")
 */
export function formatAmount(value: Amount): string {
  const sign = value < 0n ? '-' : '';
  const abs = value < 0n ? -value : value;
  return `${sign}${abs / COIN}.${(abs % COIN).toString().padStart(8, '0')}`;
}
