/**
 * Core type definitions for the consensus core
 */

export type Network = 'mainnet' | 'testnet' | 'regtest';

/**
 * Monetary amount in base units (1 coin = 100_000_000)
 */
export type Amount = bigint;

/**
 * Reference to a transparent output: (txid, index)
 */
export interface OutPoint {
  readonly hash: Uint8Array;  // 32 bytes, internal byte order
  readonly n: number;
}

export interface TxIn {
  readonly prevout: OutPoint;
  readonly scriptSig: Uint8Array;
  readonly sequence: number;
}

export interface TxOut {
  readonly value: Amount;
  readonly scriptPubKey: Uint8Array;
}

/**
 * Legacy shielded pool transfer. Moves value in or out of the
 * transparent pool through vpubOld / vpubNew.
 */
export interface JoinSplitDescription {
  readonly vpubOld: Amount;
  readonly vpubNew: Amount;
  readonly anchor: Uint8Array;
  readonly nullifiers: readonly [Uint8Array, Uint8Array];
  readonly commitments: readonly [Uint8Array, Uint8Array];
  readonly ephemeralKey: Uint8Array;
  readonly randomSeed: Uint8Array;
  readonly macs: readonly [Uint8Array, Uint8Array];
  readonly proof: Uint8Array;
  readonly ciphertexts: readonly [Uint8Array, Uint8Array];
}

/**
 * Modern shielded pool spend
 */
export interface SpendDescription {
  readonly cv: Uint8Array;
  readonly anchor: Uint8Array;
  readonly nullifier: Uint8Array;
  readonly rk: Uint8Array;
  readonly zkproof: Uint8Array;
  readonly spendAuthSig: Uint8Array;
}

/**
 * Modern shielded pool output
 */
export interface OutputDescription {
  readonly cv: Uint8Array;
  readonly cmu: Uint8Array;
  readonly ephemeralKey: Uint8Array;
  readonly encCiphertext: Uint8Array;
  readonly outCiphertext: Uint8Array;
  readonly zkproof: Uint8Array;
}

/**
 * Transaction structure
 */
export interface Transaction {
  readonly overwintered: boolean;
  readonly version: number;
  readonly versionGroupId: number;
  readonly vin: readonly TxIn[];
  readonly vout: readonly TxOut[];
  readonly lockTime: number;
  readonly expiryHeight: number;
  /** Net transfer from the modern shielded pool into the transparent pool */
  readonly valueBalance: Amount;
  readonly shieldedSpends: readonly SpendDescription[];
  readonly shieldedOutputs: readonly OutputDescription[];
  readonly joinSplits: readonly JoinSplitDescription[];
  readonly joinSplitPubKey?: Uint8Array;
  readonly joinSplitSig?: Uint8Array;
  readonly bindingSig?: Uint8Array;
}

/**
 * Block header. Only nonce and solution change after construction.
 */
export interface BlockHeader {
  readonly version: number;
  readonly prevHash: Uint8Array;
  readonly merkleRoot: Uint8Array;
  readonly finalSaplingRoot: Uint8Array;
  readonly time: number;
  readonly bits: number;
  nonce: Uint8Array;  // 32 bytes, little-endian 256-bit counter
  solution: Uint8Array;
}

/**
 * Block under construction. transactions[0] is the coinbase.
 */
export interface CandidateBlock {
  readonly header: BlockHeader;
  readonly transactions: readonly Transaction[];
}

/**
 * Chain tip values the template builder needs, taken under the chain-state lock
 */
export interface ChainTipSnapshot {
  readonly hash: Uint8Array;
  readonly height: number;
  readonly medianTimePast: number;
  /** Compact difficulty bits required for the next block */
  readonly bits: number;
}

/**
 * Equihash puzzle parameters
 */
export interface EquihashParams {
  readonly n: number;
  readonly k: number;
}
