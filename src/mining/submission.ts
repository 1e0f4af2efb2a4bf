/**
 * Submission Gate
 * Hands solved blocks to the acceptance pipeline
 */

import type { CandidateBlock, OutPoint } from '../types/index';
import { blockHash, coinbaseOf } from '../primitives/block';
import { transactionHash } from '../primitives/transaction';
import { hashToHex } from '../utils/hash';
import { InvariantViolationError } from './errors';

/**
 * Validates a block and, if it is good, extends the best chain with it
 */
export interface AcceptancePipeline {
  processNewBlock(block: CandidateBlock): Promise<boolean>;
}

export class SubmissionGate {
  constructor(private readonly pipeline: AcceptancePipeline) {}

  /**
   * Submit a solved block. A block the pipeline refuses means the build or
   * search produced something it must not, so this throws rather than
   * returning a failure. Returns the coinbase's first output.
   */
  async submit(block: CandidateBlock): Promise<OutPoint> {
    const hashHex = hashToHex(blockHash(block.header));

    let accepted: boolean;
    try {
      accepted = await this.pipeline.processNewBlock(block);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Submission] Pipeline failed on block ${hashHex}:`, message);
      throw new InvariantViolationError(`Acceptance pipeline failed on mined block ${hashHex}: ${message}`);
    }

    if (!accepted) {
      console.error(`[Submission] Block ${hashHex} rejected`);
      throw new InvariantViolationError(`Mined block ${hashHex} was rejected`);
    }

    return { hash: transactionHash(coinbaseOf(block)), n: 0 };
  }
}
