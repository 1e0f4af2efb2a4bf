/**
 * Tests for block template construction
 */

import {
  BlockAssembler,
  coinbaseScript,
  createCoinbase,
  scriptNumberPush
} from '../../src/mining/blockAssembler';
import type { TransactionSource } from '../../src/mining/blockAssembler';
import { getChainParams } from '../../src/consensus/params';
import { COIN } from '../../src/consensus/amount';
import { checkTransaction } from '../../src/consensus/txCheck';
import { isCoinBase, transactionHash } from '../../src/primitives/transaction';
import { computeMerkleRoot } from '../../src/primitives/block';
import { bytesToHex } from '../../src/utils/bytes';
import type { ChainTipSnapshot } from '../../src/types';
import { createTransaction, filled, rewardScript } from '../helpers/fixtures';

const regtest = getChainParams('regtest');

const tip: ChainTipSnapshot = {
  hash: filled(0x22),
  height: 9,
  medianTimePast: 1_700_000_000,
  bits: 0x200f0f0f
};

describe('scriptNumberPush', () => {
  test('uses the small-number opcodes up to 16', () => {
    expect(scriptNumberPush(0)).toEqual(new Uint8Array([0x00]));
    expect(scriptNumberPush(1)).toEqual(new Uint8Array([0x51]));
    expect(scriptNumberPush(16)).toEqual(new Uint8Array([0x60]));
  });

  test('pushes larger values little-endian', () => {
    expect(scriptNumberPush(17)).toEqual(new Uint8Array([0x01, 0x11]));
    expect(scriptNumberPush(256)).toEqual(new Uint8Array([0x02, 0x00, 0x01]));
  });

  test('pads a value whose top bit would read as a sign', () => {
    expect(scriptNumberPush(128)).toEqual(new Uint8Array([0x02, 0x80, 0x00]));
    expect(scriptNumberPush(255)).toEqual(new Uint8Array([0x02, 0xff, 0x00]));
  });
});

describe('coinbaseScript', () => {
  test('is the height push followed by OP_0', () => {
    expect(bytesToHex(coinbaseScript(10))).toBe('5a00');
    expect(bytesToHex(coinbaseScript(500_000))).toBe('0320a10700');
  });

  test('is at least two bytes, as a coinbase script must be', () => {
    expect(coinbaseScript(0).length).toBe(2);
  });
});

describe('createCoinbase', () => {
  test('pays subsidy plus fees to the reward script', () => {
    const coinbase = createCoinbase(regtest, 10, rewardScript, 1_000n);
    expect(isCoinBase(coinbase)).toBe(true);
    expect(coinbase.vout).toEqual([{ value: 50n * COIN + 1_000n, scriptPubKey: rewardScript }]);
    expect(checkTransaction(coinbase)).toEqual({ valid: true });
  });

  test('follows the halving schedule', () => {
    const coinbase = createCoinbase(regtest, 150, rewardScript, 0n);
    expect(coinbase.vout[0].value).toBe(25n * COIN);
  });
});

describe('BlockAssembler', () => {
  const mempoolTx = createTransaction();

  const createSource = () => {
    const selectTransactions = jest.fn(async (_script: Uint8Array, _height: number) => ({
      transactions: [mempoolTx],
      totalFees: 1_000n
    }));
    const source: TransactionSource = { selectTransactions };
    return { source, selectTransactions };
  };

  test('builds on top of the tip', async () => {
    const { source } = createSource();
    const { header } = await new BlockAssembler(regtest).build(source, tip, rewardScript);

    expect(header.version).toBe(4);
    expect(header.prevHash).toEqual(tip.hash);
    expect(header.time).toBe(1_700_000_001);
    expect(header.bits).toBe(0x200f0f0f);
    expect(header.finalSaplingRoot).toEqual(new Uint8Array(32));
    expect(header.nonce).toEqual(new Uint8Array(32));
    expect(header.solution).toEqual(new Uint8Array(0));
  });

  test('asks the source for the next height', async () => {
    const { source, selectTransactions } = createSource();
    await new BlockAssembler(regtest).build(source, tip, rewardScript);
    expect(selectTransactions).toHaveBeenCalledWith(rewardScript, 10);
  });

  test('puts the coinbase first and commits to every transaction', async () => {
    const { source } = createSource();
    const block = await new BlockAssembler(regtest).build(source, tip, rewardScript);

    expect(block.transactions).toHaveLength(2);
    const [coinbase, second] = block.transactions;
    expect(isCoinBase(coinbase)).toBe(true);
    expect(bytesToHex(coinbase.vin[0].scriptSig)).toBe('5a00');
    expect(coinbase.vout[0].value).toBe(5_000_001_000n);
    expect(second).toBe(mempoolTx);
    expect(block.header.merkleRoot).toEqual(
      computeMerkleRoot([transactionHash(coinbase), transactionHash(mempoolTx)])
    );
  });

  test('passes transaction source failures through', async () => {
    const source: TransactionSource = {
      selectTransactions: jest.fn().mockRejectedValue(new Error('mempool unavailable'))
    };
    await expect(new BlockAssembler(regtest).build(source, tip, rewardScript)).rejects.toThrow('mempool unavailable');
  });
});
