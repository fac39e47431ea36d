import type { Strategy } from '../strategy/types';

export interface ActiveEntry {
  readonly strategy: Strategy | null;
  readonly score: number;
  /** Bumped on every successful swap */
  readonly version: number;
}

export type SwapResult = { swapped: true; entry: ActiveEntry } | { swapped: false; current: ActiveEntry };

/**
 * The one piece of state shared by the decision loop and the optimizer.
 * Reads return an immutable snapshot; writes are compare-and-set on `version`,
 * so of two writers that read the same version only the first one lands.
 */
export class ActiveStrategySlot {
  private entry: ActiveEntry;

  constructor(strategy: Strategy | null = null, score = 0) {
    this.entry = Object.freeze({ strategy, score, version: 0 });
  }

  read(): ActiveEntry {
    return this.entry;
  }

  compareAndSet(expectedVersion: number, strategy: Strategy, score: number): SwapResult {
    if (this.entry.version !== expectedVersion) {
      return { swapped: false, current: this.entry };
    }
    this.entry = Object.freeze({ strategy, score, version: expectedVersion + 1 });
    return { swapped: true, entry: this.entry };
  }

  /**
   * Replace the score of the current strategy, keeping the strategy. Bumps the
   * version like a swap, so a writer holding an older snapshot still loses.
   */
  refreshScore(expectedVersion: number, score: number): SwapResult {
    const strategy = this.entry.strategy;
    if (this.entry.version !== expectedVersion || !strategy) {
      return { swapped: false, current: this.entry };
    }
    this.entry = Object.freeze({ strategy, score, version: expectedVersion + 1 });
    return { swapped: true, entry: this.entry };
  }
}
