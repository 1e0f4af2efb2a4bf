/**
 * Transaction and block builders shared by the test suites
 */

import type {
  JoinSplitDescription,
  OutputDescription,
  SpendDescription,
  Transaction,
  TxIn
} from '../../src/types';
import { COIN } from '../../src/consensus/amount';
import { SAPLING_TX_VERSION, SAPLING_VERSION_GROUP_ID } from '../../src/consensus/params';
import { createP2PKHScript } from '../../src/address/destination';
import { nullOutPoint } from '../../src/primitives/transaction';

export const filled = (byte: number, length: number = 32): Uint8Array =>
  new Uint8Array(length).fill(byte);

export const rewardScript = createP2PKHScript(filled(0x42, 20));

export const createInput = (hashByte: number, n: number = 0): TxIn => ({
  prevout: { hash: filled(hashByte), n },
  scriptSig: new Uint8Array([0x51]),
  sequence: 0xffffffff
});

export const createCoinbaseInput = (scriptSig: Uint8Array): TxIn => ({
  prevout: nullOutPoint(),
  scriptSig,
  sequence: 0xffffffff
});

export const createJoinSplit = (
  overrides: Partial<JoinSplitDescription> = {}
): JoinSplitDescription => ({
  vpubOld: 0n,
  vpubNew: 0n,
  anchor: filled(0),
  nullifiers: [filled(0xa1), filled(0xa2)],
  commitments: [filled(0xc1), filled(0xc2)],
  ephemeralKey: filled(0xe0),
  randomSeed: filled(0x5e),
  macs: [filled(0x01), filled(0x02)],
  proof: filled(0, 192),
  ciphertexts: [filled(0, 601), filled(0, 601)],
  ...overrides
});

export const createSpend = (nullifier: Uint8Array = filled(0x11)): SpendDescription => ({
  cv: filled(0x01),
  anchor: filled(0x02),
  nullifier,
  rk: filled(0x03),
  zkproof: filled(0, 192),
  spendAuthSig: filled(0, 64)
});

export const createOutput = (): OutputDescription => ({
  cv: filled(0x04),
  cmu: filled(0x05),
  ephemeralKey: filled(0x06),
  encCiphertext: filled(0, 580),
  outCiphertext: filled(0, 80),
  zkproof: filled(0, 192)
});

/**
 * A valid one-in one-out transparent Sapling transaction
 */
export const createTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  overwintered: true,
  version: SAPLING_TX_VERSION,
  versionGroupId: SAPLING_VERSION_GROUP_ID,
  vin: [createInput(0x01)],
  vout: [{ value: COIN, scriptPubKey: rewardScript }],
  lockTime: 0,
  expiryHeight: 0,
  valueBalance: 0n,
  shieldedSpends: [],
  shieldedOutputs: [],
  joinSplits: [],
  ...overrides
});
