/**
 * Block Template Builder
 * Builds a candidate block on top of a chain-tip snapshot
 */

import type { Amount, CandidateBlock, ChainTipSnapshot, Transaction } from '../types/index';
import { SAPLING_TX_VERSION, SAPLING_VERSION_GROUP_ID, blockSubsidy } from '../consensus/params';
import type { ChainParams } from '../consensus/params';
import { checkTransaction } from '../consensus/txCheck';
import { nullOutPoint } from '../primitives/transaction';
import { blockMerkleRoot } from '../primitives/block';
import { InvariantViolationError } from './errors';

/**
 * Mempool-ordering service: picks and orders the transactions for the next block
 */
export interface TransactionSource {
  selectTransactions(rewardScript: Uint8Array, height: number): Promise<TransactionSelection>;
}

export interface TransactionSelection {
  transactions: Transaction[];
  totalFees: Amount;
}

const OP_0 = 0x00;
const OP_1 = 0x51;

/**
 * Script that pushes a number the way the script interpreter reads it:
 * OP_0 / OP_1..OP_16 for small values, otherwise a minimal
 * little-endian sign-magnitude push
 */
export function scriptNumberPush(value: number): Uint8Array {
  if (value === 0) {
    return new Uint8Array([OP_0]);
  }
  if (value >= 1 && value <= 16) {
    return new Uint8Array([OP_1 + value - 1]);
  }

  const bytes: number[] = [];
  let abs = Math.abs(value);
  while (abs > 0) {
    bytes.push(abs & 0xff);
    abs = Math.floor(abs / 256);
  }
  // Keep the top bit free for the sign
  if (bytes[bytes.length - 1] & 0x80) {
    bytes.push(value < 0 ? 0x80 : 0x00);
  } else if (value < 0) {
    bytes[bytes.length - 1] |= 0x80;
  }
  return new Uint8Array([bytes.length, ...bytes]);
}

/**
 * Coinbase script: the block height followed by OP_0
 */
export function coinbaseScript(height: number): Uint8Array {
  const heightPush = scriptNumberPush(height);
  const script = new Uint8Array(heightPush.length + 1);
  script.set(heightPush);
  script[heightPush.length] = OP_0;
  return script;
}

/**
 * Coinbase paying subsidy plus fees to the reward script
 */
export function createCoinbase(
  params: ChainParams,
  height: number,
  rewardScript: Uint8Array,
  totalFees: Amount
): Transaction {
  return {
    overwintered: true,
    version: SAPLING_TX_VERSION,
    versionGroupId: SAPLING_VERSION_GROUP_ID,
    vin: [{ prevout: nullOutPoint(), scriptSig: coinbaseScript(height), sequence: 0xffffffff }],
    vout: [{ value: blockSubsidy(params, height) + totalFees, scriptPubKey: rewardScript }],
    lockTime: 0,
    expiryHeight: 0,
    valueBalance: 0n,
    shieldedSpends: [],
    shieldedOutputs: [],
    joinSplits: []
  };
}

/**
 * Block Assembler
 */
export class BlockAssembler {
  constructor(private readonly params: ChainParams) {}

  /**
   * Build a candidate block on top of `tip`. Errors from the transaction
   * source propagate unchanged.
   */
  async build(
    source: TransactionSource,
    tip: ChainTipSnapshot,
    rewardScript: Uint8Array
  ): Promise<CandidateBlock> {
    const height = tip.height + 1;
    const { transactions, totalFees } = await source.selectTransactions(rewardScript, height);

    const coinbase = createCoinbase(this.params, height, rewardScript, totalFees);
    const coinbaseCheck = checkTransaction(coinbase);
    if (!coinbaseCheck.valid) {
      throw new InvariantViolationError(`Assembled coinbase is invalid: ${coinbaseCheck.code}`);
    }

    const blockTransactions = [coinbase, ...transactions];

    return {
      header: {
        version: this.params.blockVersion,
        prevHash: tip.hash,
        merkleRoot: blockMerkleRoot(blockTransactions),
        finalSaplingRoot: new Uint8Array(32),
        // Strictly after median time past
        time: tip.medianTimePast + 1,
        bits: tip.bits,
        nonce: new Uint8Array(32),
        solution: new Uint8Array(0)
      },
      transactions: blockTransactions
    };
  }
}
