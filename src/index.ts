/**
 * shielded-pow-core
 *
 * Consensus-rule core of a proof-of-work node with transparent and
 * shielded value pools: context-free transaction checks, block templates,
 * Equihash mining and block submission.
 */

// Types
export * from './types/index';

// Utilities
export * from './utils/index';

// Consensus rules
export {
  COIN,
  MAX_MONEY,
  moneyRange,
  addToPool,
  subtractFromPool,
  formatAmount,
  AmountRangeError
} from './consensus/amount';
export type { AmountRangeKind } from './consensus/amount';
export {
  getChainParams,
  equihashParamsAt,
  blockSubsidy,
  MAX_BLOCK_WEIGHT,
  WITNESS_SCALE_FACTOR
} from './consensus/params';
export type { ChainParams, EquihashUpgrade } from './consensus/params';
export {
  checkTransaction,
  assertValidTransaction,
  TxValidationError,
  REJECTION_CODES
} from './consensus/txCheck';
export type { RejectionReason, TxCheckResult } from './consensus/txCheck';

// Serialization
export {
  serializeTransaction,
  serializedSize,
  transactionHash,
  isCoinBase,
  isNullOutPoint,
  nullOutPoint
} from './primitives/transaction';
export {
  serializeHeader,
  serializeEquihashInput,
  blockHash,
  computeMerkleRoot,
  blockMerkleRoot
} from './primitives/block';

// Proof of work
export {
  decodeCompact,
  encodeCompact,
  targetFromBits,
  checkProofOfWork,
  meetsTarget,
  MAX_UINT256
} from './pow/difficulty';
export {
  equihashSolutions,
  isValidSolution,
  initialiseState,
  solutionWidth,
  basicSolver
} from './pow/equihash';
export type { PuzzleSolver, EquihashState } from './pow/equihash';

// Mining
export { BlockAssembler, createCoinbase, coinbaseScript } from './mining/blockAssembler';
export type { TransactionSource, TransactionSelection } from './mining/blockAssembler';
export { ProofOfWorkSearch } from './mining/powSearch';
export type { PowSearchConfig, SolveOptions, SolveResult } from './mining/powSearch';
export { SubmissionGate } from './mining/submission';
export type { AcceptancePipeline } from './mining/submission';
export { Miner } from './mining/miner';
export type { MinerConfig, MinerServices, MineResult } from './mining/miner';
export { InvariantViolationError, MiningInterruptedError } from './mining/errors';

// Chain state
export { ChainState, ReadWriteLock, medianTime } from './node/chainState';
export type { TipUpdate } from './node/chainState';

// Addresses
export {
  decodeDestination,
  encodeDestination,
  scriptForDestination,
  isValidDestinationScript
} from './address/destination';
export type { Destination, DestinationType } from './address/destination';

// Parameter files
export { fetchParams, verifyParams, ParamsError } from './params/fetchParams';
export type { ProgressCallback, VerifyOptions, FetchOptions } from './params/fetchParams';
