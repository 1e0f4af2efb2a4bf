/**
 * Chain State
 * Best-chain tip guarded by a readers/writer lock
 */

import type { ChainTipSnapshot } from '../types/index';

/** Number of recent block times median time past is taken over */
export const MEDIAN_TIME_SPAN = 11;

interface Waiter {
  write: boolean;
  grant: () => void;
}

/**
 * FIFO readers/writer lock. Readers share; a writer excludes everyone;
 * a queued writer holds back readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  private canGrant(write: boolean): boolean {
    return write ? !this.writing && this.readers === 0 : !this.writing;
  }

  private take(write: boolean): void {
    if (write) {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private acquire(write: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(write)) {
      this.take(write);
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.queue.push({ write, grant: resolve });
    });
  }

  private release(write: boolean): void {
    if (write) {
      this.writing = false;
    } else {
      this.readers--;
    }

    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.write)) {
        break;
      }
      this.queue.shift();
      this.take(next.write);
      next.grant();
    }
  }
}

/**
 * Median of the given block times
 */
export function medianTime(times: readonly number[]): number {
  if (times.length === 0) {
    throw new Error('medianTime: no block times');
  }
  const sorted = [...times].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

export interface TipUpdate {
  hash: Uint8Array;
  time: number;
  /** Bits for the block after this one; unchanged when omitted */
  bits?: number;
}

/**
 * Chain State
 *
 * Holds the current tip and the recent block times its median time past
 * is computed from. Readers get an immutable snapshot; advancing the tip
 * takes the lock exclusively.
 */
export class ChainState {
  readonly lock = new ReadWriteLock();
  private tip: ChainTipSnapshot;
  private recentTimes: number[];

  constructor(genesis: TipUpdate & { bits: number }) {
    this.recentTimes = [genesis.time];
    this.tip = {
      hash: genesis.hash,
      height: 0,
      medianTimePast: genesis.time,
      bits: genesis.bits
    };
  }

  /**
   * Run fn with a snapshot of the tip while holding the lock shared
   */
  withTip<T>(fn: (tip: ChainTipSnapshot) => Promise<T> | T): Promise<T> {
    return this.lock.withRead(() => fn(this.tip));
  }

  /**
   * Connect a new block on top of the tip
   */
  advanceTip(update: TipUpdate): Promise<ChainTipSnapshot> {
    return this.lock.withWrite(() => {
      this.recentTimes = [...this.recentTimes, update.time].slice(-MEDIAN_TIME_SPAN);
      this.tip = {
        hash: update.hash,
        height: this.tip.height + 1,
        medianTimePast: medianTime(this.recentTimes),
        bits: update.bits ?? this.tip.bits
      };
      return this.tip;
    });
  }
}
