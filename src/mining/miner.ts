/**
 * Miner
 * Template -> search -> submit, with the chain-state lock held only while building
 */

import type { CandidateBlock, Network, OutPoint } from '../types/index';
import { equihashParamsAt, getChainParams } from '../consensus/params';
import type { ChainParams } from '../consensus/params';
import { formatAmount } from '../consensus/amount';
import { decodeDestination, isValidDestinationScript, scriptForDestination } from '../address/destination';
import type { ChainState } from '../node/chainState';
import { targetFromBits } from '../pow/difficulty';
import { coinbaseOf } from '../primitives/block';
import { BlockAssembler } from './blockAssembler';
import type { TransactionSource } from './blockAssembler';
import { ProofOfWorkSearch } from './powSearch';
import type { PowSearchConfig } from './powSearch';
import { SubmissionGate } from './submission';
import type { AcceptancePipeline } from './submission';
import { InvariantViolationError } from './errors';

export interface MinerConfig {
  network: Network;
  /** Nonces to try per mineBlock call */
  maxTries: number;
  /**
   * Use this target instead of the one the tip's bits encode.
   * MAX_UINT256 accepts any hash.
   */
  targetOverride?: bigint;
  search?: Partial<Omit<PowSearchConfig, 'personalization'>>;
}

export interface MinerServices {
  chain: ChainState;
  transactionSource: TransactionSource;
  pipeline: AcceptancePipeline;
}

export type MineResult =
  | { status: 'mined'; block: CandidateBlock; coinbase: OutPoint }
  | { status: 'exhausted'; tries: number };

const DEFAULT_MINER_CONFIG: MinerConfig = {
  network: 'regtest',
  maxTries: 1_000_000
};

/**
 * Miner
 */
export class Miner {
  private config: MinerConfig;
  private params: ChainParams;
  private assembler: BlockAssembler;
  private search: ProofOfWorkSearch;
  private gate: SubmissionGate;

  constructor(private readonly services: MinerServices, config: Partial<MinerConfig> = {}) {
    this.config = { ...DEFAULT_MINER_CONFIG, ...config };
    this.params = getChainParams(this.config.network);
    this.assembler = new BlockAssembler(this.params);
    this.search = new ProofOfWorkSearch({
      ...this.config.search,
      personalization: this.params.powPersonalization
    });
    this.gate = new SubmissionGate(services.pipeline);
  }

  /**
   * Mine one block paying to rewardScript. Running out of tries is
   * returned, not thrown; the caller can retry with a fresh template.
   */
  async mineBlock(rewardScript: Uint8Array, signal?: AbortSignal): Promise<MineResult> {
    // The tip must not move while the template is built; the search
    // itself only needs the snapshot, so the lock is released before it
    const { block, height } = await this.services.chain.withTip(async tip => ({
      block: await this.assembler.build(this.services.transactionSource, tip, rewardScript),
      height: tip.height + 1
    }));

    const target = this.config.targetOverride ?? targetFromBits(block.header.bits, this.params.powLimit);
    if (target === null) {
      throw new InvariantViolationError(`Template has invalid bits 0x${block.header.bits.toString(16)}`);
    }

    const result = await this.search.solve(block, {
      target,
      maxTries: this.config.maxTries,
      equihash: equihashParamsAt(this.params, height),
      signal
    });

    if (result.status === 'exhausted') {
      return { status: 'exhausted', tries: result.tries };
    }

    const coinbase = await this.gate.submit(result.block);
    console.log(
      `[Miner] Mined block at height ${height} paying ${formatAmount(coinbaseOf(result.block).vout[0].value)}`
    );
    return { status: 'mined', block: result.block, coinbase };
  }

  /**
   * Mine one block paying to a transparent address
   */
  async generateToAddress(address: string, signal?: AbortSignal): Promise<MineResult> {
    const destination = decodeDestination(address, this.params);
    if (destination === null) {
      throw new InvariantViolationError(`Cannot decode address ${address}`);
    }
    const script = scriptForDestination(destination);
    if (!isValidDestinationScript(script)) {
      throw new InvariantViolationError(`Address ${address} produced a malformed script`);
    }
    return this.mineBlock(script, signal);
  }
}
