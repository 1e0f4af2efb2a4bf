/**
 * Mining errors
 */

/**
 * A state that correct build/search code never produces. Not recoverable.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * The search was stopped through its abort signal
 */
export class MiningInterruptedError extends Error {
  constructor(public readonly tries: number) {
    super(`Proof-of-work search interrupted after ${tries} tries`);
    this.name = 'MiningInterruptedError';
  }
}
