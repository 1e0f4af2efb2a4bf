/**
 * Chain Parameters
 * Per-network consensus constants and the Equihash upgrade schedule
 */

import type { Amount, EquihashParams, Network } from '../types/index';
import { COIN } from './amount';

/** Serialized transaction size is scaled by this before comparing with the block weight limit */
export const WITNESS_SCALE_FACTOR = 4;
export const MAX_BLOCK_WEIGHT = 4_000_000;

export const COINBASE_SCRIPT_MIN_LENGTH = 2;
export const COINBASE_SCRIPT_MAX_LENGTH = 100;

export const SAPLING_TX_VERSION = 4;
export const SAPLING_VERSION_GROUP_ID = 0x892f2085;

/**
 * Equihash parameters become active at a height and stay until the next entry
 */
export interface EquihashUpgrade extends EquihashParams {
  readonly activationHeight: number;
}

export interface ChainParams {
  readonly network: Network;
  readonly blockVersion: number;
  /** Highest allowed target (lowest difficulty) */
  readonly powLimit: bigint;
  /** Sorted by activationHeight; the first entry activates at height 0 */
  readonly equihashUpgrades: readonly EquihashUpgrade[];
  /** 8-byte prefix of the BLAKE2b personalization for the proof-of-work hash */
  readonly powPersonalization: string;
  readonly initialSubsidy: Amount;
  readonly subsidyHalvingInterval: number;
  readonly base58Prefixes: {
    readonly pubKeyHash: readonly [number, number];
    readonly scriptHash: readonly [number, number];
  };
}

const MAINNET: ChainParams = {
  network: 'mainnet',
  blockVersion: 4,
  powLimit: (1n << 243n) - 1n,
  equihashUpgrades: [
    { activationHeight: 0, n: 200, k: 9 },
    { activationHeight: 95_000, n: 144, k: 5 }
  ],
  powPersonalization: 'ZcashPoW',
  initialSubsidy: 50n * COIN,
  subsidyHalvingInterval: 840_000,
  base58Prefixes: {
    pubKeyHash: [0x1c, 0xb8], // t1...
    scriptHash: [0x1c, 0xbd]  // t3...
  }
};

const TESTNET: ChainParams = {
  ...MAINNET,
  network: 'testnet',
  powLimit: (1n << 251n) - 1n,
  equihashUpgrades: [
    { activationHeight: 0, n: 200, k: 9 },
    { activationHeight: 1_500, n: 144, k: 5 }
  ],
  base58Prefixes: {
    pubKeyHash: [0x1d, 0x25], // tm...
    scriptHash: [0x1c, 0xba]  // t2...
  }
};

const REGTEST: ChainParams = {
  ...TESTNET,
  network: 'regtest',
  // 0x0f0f...0f
  powLimit: BigInt('0x' + '0f'.repeat(32)),
  equihashUpgrades: [{ activationHeight: 0, n: 48, k: 5 }],
  subsidyHalvingInterval: 150
};

const PARAMS: Record<Network, ChainParams> = {
  mainnet: MAINNET,
  testnet: TESTNET,
  regtest: REGTEST
};

export function getChainParams(network: Network): ChainParams {
  return PARAMS[network];
}

/**
 * Equihash (N, K) in force for a block at the given height
 */
export function equihashParamsAt(params: ChainParams, height: number): EquihashParams {
  let active = params.equihashUpgrades[0];
  for (const upgrade of params.equihashUpgrades) {
    if (upgrade.activationHeight <= height) {
      active = upgrade;
    }
  }
  return { n: active.n, k: active.k };
}

/**
 * Block subsidy at height, halving every subsidyHalvingInterval blocks
 */
export function blockSubsidy(params: ChainParams, height: number): Amount {
  const halvings = Math.floor(height / params.subsidyHalvingInterval);
  if (halvings >= 64) {
    return 0n;
  }
  return params.initialSubsidy >> BigInt(halvings);
}
