/**
 * Transaction Validity Checker
 * Context-free consensus checks on a single transaction
 */

import type { Amount, Transaction } from '../types/index';
import { AmountRangeError, MAX_MONEY, addToPool } from './amount';
import { MAX_BLOCK_WEIGHT, WITNESS_SCALE_FACTOR, COINBASE_SCRIPT_MIN_LENGTH, COINBASE_SCRIPT_MAX_LENGTH } from './params';
import { isCoinBase, isNullOutPoint, serializedSize } from '../primitives/transaction';
import { bytesToHex, isZeroBytes } from '../utils/bytes';

/**
 * Rejection reasons and their stable reject codes
 */
export const REJECTION_CODES = {
  EmptyInputs: 'bad-txns-vin-empty',
  EmptyOutputs: 'bad-txns-vout-empty',
  Oversize: 'bad-txns-oversize',
  NegativeOutput: 'bad-txns-vout-negative',
  OutputTooLarge: 'bad-txns-vout-toolarge',
  TotalTooLarge: 'bad-txns-txouttotal-toolarge',
  UnexpectedValueBalance: 'bad-txns-valuebalance-nonzero',
  ValueBalanceTooLarge: 'bad-txns-valuebalance-toolarge',
  VpubOldNegative: 'bad-txns-vpub_old-negative',
  VpubNewNegative: 'bad-txns-vpub_new-negative',
  VpubOldTooLarge: 'bad-txns-vpub_old-toolarge',
  VpubNewTooLarge: 'bad-txns-vpub_new-toolarge',
  BothVpubsNonzero: 'bad-txns-vpubs-both-nonzero',
  InputTotalTooLarge: 'bad-txns-txintotal-toolarge',
  DuplicateInputs: 'bad-txns-inputs-duplicate',
  DuplicateJoinSplitNullifiers: 'bad-joinsplits-nullifiers-duplicate',
  DuplicateSpendNullifiers: 'bad-spend-description-nullifiers-duplicate',
  CoinbaseScriptLengthInvalid: 'bad-cb-length',
  CoinbaseHasSpendDescription: 'bad-cb-has-spend-description',
  PrevoutNull: 'bad-txns-prevout-null',
  SpendNullifierNull: 'bad-spend-description-nullifier-null'
} as const;

export type RejectionReason = keyof typeof REJECTION_CODES;

export type TxCheckResult =
  | { valid: true }
  | { valid: false; reason: RejectionReason; code: string };

/**
 * Thrown by assertValidTransaction
 */
export class TxValidationError extends Error {
  constructor(
    public readonly reason: RejectionReason,
    public readonly code: string
  ) {
    super(`Transaction rejected: ${code}`);
    this.name = 'TxValidationError';
  }
}

const VALID: TxCheckResult = { valid: true };

function reject(reason: RejectionReason): TxCheckResult {
  return { valid: false, reason, code: REJECTION_CODES[reason] };
}

/**
 * Add to a running total, mapping a range failure to a rejection reason.
 * Returns the new total, or the rejection.
 */
function accumulate(
  total: Amount,
  amount: Amount,
  reason: RejectionReason
): { total: Amount } | { rejection: TxCheckResult } {
  try {
    return { total: addToPool(total, amount) };
  } catch (error) {
    if (error instanceof AmountRangeError) {
      return { rejection: reject(reason) };
    }
    throw error;
  }
}

/**
 * Check a transaction against the context-free consensus rules.
 *
 * Rules run in a fixed order and the first failure is reported, so the
 * reason for a given transaction is deterministic. Every addition to the
 * running value-out and value-in totals is range-checked on the spot.
 */
export function checkTransaction(tx: Transaction): TxCheckResult {
  // 1. Non-emptiness
  if (tx.vin.length === 0 && tx.joinSplits.length === 0) {
    return reject('EmptyInputs');
  }
  if (tx.vout.length === 0 && tx.joinSplits.length === 0 && tx.shieldedOutputs.length === 0) {
    return reject('EmptyOutputs');
  }

  // 2. Size limit (no witness data in this layout)
  if (serializedSize(tx) * WITNESS_SCALE_FACTOR > MAX_BLOCK_WEIGHT) {
    return reject('Oversize');
  }

  // 3. Transparent outputs
  let valueOut: Amount = 0n;
  for (const output of tx.vout) {
    if (output.value < 0n) {
      return reject('NegativeOutput');
    }
    if (output.value > MAX_MONEY) {
      return reject('OutputTooLarge');
    }
    const step = accumulate(valueOut, output.value, 'TotalTooLarge');
    if ('rejection' in step) {
      return step.rejection;
    }
    valueOut = step.total;
  }

  // 4. Value balance sanity
  if (tx.shieldedSpends.length === 0 && tx.shieldedOutputs.length === 0 && tx.valueBalance !== 0n) {
    return reject('UnexpectedValueBalance');
  }
  if (tx.valueBalance > MAX_MONEY || tx.valueBalance < -MAX_MONEY) {
    return reject('ValueBalanceTooLarge');
  }

  // 5. A negative value balance takes from the transparent pool, like an output
  if (tx.valueBalance <= 0n) {
    const step = accumulate(valueOut, -tx.valueBalance, 'TotalTooLarge');
    if ('rejection' in step) {
      return step.rejection;
    }
    valueOut = step.total;
  }

  // 6. Join-split values
  for (const js of tx.joinSplits) {
    if (js.vpubOld < 0n) {
      return reject('VpubOldNegative');
    }
    if (js.vpubNew < 0n) {
      return reject('VpubNewNegative');
    }
    if (js.vpubOld > MAX_MONEY) {
      return reject('VpubOldTooLarge');
    }
    if (js.vpubNew > MAX_MONEY) {
      return reject('VpubNewTooLarge');
    }
    if (js.vpubOld !== 0n && js.vpubNew !== 0n) {
      return reject('BothVpubsNonzero');
    }
    const step = accumulate(valueOut, js.vpubOld, 'TotalTooLarge');
    if ('rejection' in step) {
      return step.rejection;
    }
    valueOut = step.total;
  }

  // 7. Value the join-splits claim to add to the transparent pool
  let valueIn: Amount = 0n;
  for (const js of tx.joinSplits) {
    const step = accumulate(valueIn, js.vpubNew, 'InputTotalTooLarge');
    if ('rejection' in step) {
      return step.rejection;
    }
    valueIn = step.total;
  }

  // 8. A positive value balance adds to the transparent pool, like an input
  if (tx.valueBalance >= 0n) {
    const step = accumulate(valueIn, tx.valueBalance, 'InputTotalTooLarge');
    if ('rejection' in step) {
      return step.rejection;
    }
    valueIn = step.total;
  }

  // 9. Duplicate inputs
  const prevouts = new Set<string>();
  for (const input of tx.vin) {
    const key = `${bytesToHex(input.prevout.hash)}:${input.prevout.n}`;
    if (prevouts.has(key)) {
      return reject('DuplicateInputs');
    }
    prevouts.add(key);
  }

  // 10. Duplicate nullifiers, one namespace per pool
  const joinSplitNullifiers = new Set<string>();
  for (const js of tx.joinSplits) {
    for (const nf of js.nullifiers) {
      const key = bytesToHex(nf);
      if (joinSplitNullifiers.has(key)) {
        return reject('DuplicateJoinSplitNullifiers');
      }
      joinSplitNullifiers.add(key);
    }
  }

  const spendNullifiers = new Set<string>();
  for (const spend of tx.shieldedSpends) {
    const key = bytesToHex(spend.nullifier);
    if (spendNullifiers.has(key)) {
      return reject('DuplicateSpendNullifiers');
    }
    spendNullifiers.add(key);
  }

  if (isCoinBase(tx)) {
    // 11. Coinbase shape
    const scriptLength = tx.vin[0].scriptSig.length;
    if (scriptLength < COINBASE_SCRIPT_MIN_LENGTH || scriptLength > COINBASE_SCRIPT_MAX_LENGTH) {
      return reject('CoinbaseScriptLengthInvalid');
    }
    if (tx.shieldedSpends.length > 0) {
      return reject('CoinbaseHasSpendDescription');
    }
  } else {
    // 12. Everything else must spend real outputs and real notes
    for (const input of tx.vin) {
      if (isNullOutPoint(input.prevout)) {
        return reject('PrevoutNull');
      }
    }
    for (const spend of tx.shieldedSpends) {
      if (isZeroBytes(spend.nullifier)) {
        return reject('SpendNullifierNull');
      }
    }
  }

  return VALID;
}

/**
 * Throwing variant of checkTransaction
 */
export function assertValidTransaction(tx: Transaction): void {
  const result = checkTransaction(tx);
  if (!result.valid) {
    throw new TxValidationError(result.reason, result.code);
  }
}
