/**
 * Proof-of-Work Search Engine
 * Nonce/solution search over a candidate block
 */

import type { CandidateBlock, EquihashParams } from '../types/index';
import { bigintToLEBytes, leBytesToBigint, leBytesToNumber } from '../utils/bytes';
import { hashToHex } from '../utils/hash';
import { blockHash, serializeEquihashInput } from '../primitives/block';
import { meetsTarget } from '../pow/difficulty';
import { basicSolver, initialiseState } from '../pow/equihash';
import type { PuzzleSolver } from '../pow/equihash';
import { MiningInterruptedError } from './errors';

/**
 * Search policy. None of these affect correctness; a regression node
 * keeps them small, a production miner large.
 */
export interface PowSearchConfig {
  solver: PuzzleSolver;
  /** BLAKE2b personalization prefix for the puzzle hash */
  personalization: string;
  /** Stop once (nonce & innerLoopMask) reaches this value */
  innerLoopCount: number;
  innerLoopMask: number;
}

export interface SolveOptions {
  /** Block hash (as a little-endian 256-bit integer) must not exceed this */
  target: bigint;
  /** Maximum number of nonces to try */
  maxTries: number;
  equihash: EquihashParams;
  signal?: AbortSignal;
}

export type SolveResult =
  | { status: 'solved'; block: CandidateBlock; tries: number }
  | { status: 'exhausted'; tries: number };

const DEFAULT_CONFIG: PowSearchConfig = {
  solver: basicSolver,
  personalization: 'ZcashPoW',
  innerLoopCount: 0xffff,
  innerLoopMask: 0xffff
};

const NONCE_MODULUS = 1n << 256n;

function nextNonce(nonce: Uint8Array): Uint8Array {
  return bigintToLEBytes((leBytesToBigint(nonce) + 1n) % NONCE_MODULUS, 32);
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Proof-of-Work Search
 *
 * Hashes the fixed header prefix once, then for each nonce extends a copy
 * of that state with the nonce and asks the puzzle solver for candidate
 * solutions until one gives a block hash under the target.
 */
export class ProofOfWorkSearch {
  private config: PowSearchConfig;

  constructor(config: Partial<PowSearchConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Search for a solution, writing nonce and solution into block.header.
   * Exhausting maxTries is a normal outcome; aborting through the signal
   * throws MiningInterruptedError.
   */
  async solve(block: CandidateBlock, options: SolveOptions): Promise<SolveResult> {
    const { target, maxTries, equihash, signal } = options;
    const { solver, personalization, innerLoopCount, innerLoopMask } = this.config;
    const header = block.header;

    // H(I || ...
    const prefixState = initialiseState(equihash, personalization);
    prefixState.update(serializeEquihashInput(header));

    let tries = 0;
    while (tries < maxTries && (leBytesToNumber(header.nonce.subarray(0, 4)) & innerLoopMask) < innerLoopCount) {
      if (signal?.aborted) {
        throw new MiningInterruptedError(tries);
      }

      header.nonce = nextNonce(header.nonce);
      tries++;

      // H(I || V || ...
      const nonceState = prefixState.clone();
      nonceState.update(header.nonce);

      for (const solution of solver.solve(equihash, nonceState)) {
        header.solution = solution;
        const hash = blockHash(header);
        if (meetsTarget(hash, target)) {
          console.log(`[PowSearch] Solved after ${tries} tries: ${hashToHex(hash)}`);
          return { status: 'solved', block, tries };
        }
      }

      await yieldToEventLoop();
    }

    console.warn(`[PowSearch] No solution after ${tries} tries`);
    return { status: 'exhausted', tries };
  }
}
