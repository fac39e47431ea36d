import type { MarketDataFeed, Timeframe } from '../data/types';
import { lookbackFor, runDecisionStep, type DecisionResult } from '../execution/decision';
import type { PortfolioLedger } from '../execution/ledger';
import type { RiskPolicy, Trade } from '../execution/types';
import type { Signal } from '../strategy/types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ActiveStrategySlot } from './active-strategy';

const log = createLogger('decision-loop');

export type TickOutcome =
  | { kind: 'busy' }
  | { kind: 'no-data'; consecutive: number }
  | { kind: 'stale'; timestamp: number; lastTimestamp: number }
  | { kind: 'decided'; result: DecisionResult; strategyVersion: number };

export interface DecisionLoopHooks {
  onDecision?(result: DecisionResult): void;
  onTrade?(trade: Trade): void;
}

export interface DecisionLoopOptions {
  feed: MarketDataFeed;
  timeframe: Timeframe;
  ledger: PortfolioLedger;
  slot: ActiveStrategySlot;
  policy: RiskPolicy;
  intervalMs: number;
  hooks?: DecisionLoopHooks;
}

/**
 * Live periodic tick. Each tick reads the active strategy once, pulls at most
 * one new sample and runs the shared decision step on it. A tick with no new
 * sample, or a sample not newer than the last one, changes nothing.
 */
export class DecisionLoop {
  private readonly feed: MarketDataFeed;
  private readonly timeframe: Timeframe;
  private readonly ledger: PortfolioLedger;
  private readonly slot: ActiveStrategySlot;
  private readonly intervalMs: number;
  private readonly hooks: DecisionLoopHooks;
  private policy: RiskPolicy;

  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private lastTimestamp = -Infinity;
  private gapTicks = 0;
  private lastSignalValue: Signal | null = null;
  private lastSampleClose: number | null = null;

  constructor(opts: DecisionLoopOptions) {
    this.feed = opts.feed;
    this.timeframe = opts.timeframe;
    this.ledger = opts.ledger;
    this.slot = opts.slot;
    this.policy = opts.policy;
    this.intervalMs = opts.intervalMs;
    this.hooks = opts.hooks ?? {};
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get lastSignal(): Signal | null {
    return this.lastSignalValue;
  }

  /** Close of the most recent sample processed, for marking the portfolio in status reports. */
  get lastPrice(): number | null {
    return this.lastSampleClose;
  }

  /** Applies from the next tick on. */
  setPolicy(policy: RiskPolicy) {
    this.policy = policy;
  }

  tick(): TickOutcome {
    if (this.ticking) {
      log.debug('Previous tick still running, skipping');
      return { kind: 'busy' };
    }
    this.ticking = true;
    try {
      return this.step();
    } finally {
      this.ticking = false;
    }
  }

  private step(): TickOutcome {
    const active = this.slot.read();

    const sample = this.feed.nextSample(this.timeframe);
    if (!sample) {
      this.gapTicks++;
      if (this.gapTicks === 1) {
        log.warn('No new sample, skipping tick', { timeframe: this.timeframe });
      } else {
        log.debug('Still no new sample', { timeframe: this.timeframe, consecutive: this.gapTicks });
      }
      return { kind: 'no-data', consecutive: this.gapTicks };
    }
    if (this.gapTicks > 0) {
      log.info('Feed resumed', { timeframe: this.timeframe, missedTicks: this.gapTicks });
      this.gapTicks = 0;
    }

    if (sample.timestamp <= this.lastTimestamp) {
      log.debug('Stale sample, skipping tick', { timestamp: sample.timestamp, last: this.lastTimestamp });
      return { kind: 'stale', timestamp: sample.timestamp, lastTimestamp: this.lastTimestamp };
    }
    this.lastTimestamp = sample.timestamp;
    this.lastSampleClose = sample.close;

    const window = active.strategy
      ? this.feed.historicalRange(this.timeframe, -Infinity, sample.timestamp).slice(-lookbackFor(active.strategy, this.policy))
      : [sample];

    const result = runDecisionStep({
      ledger: this.ledger,
      strategy: active.strategy,
      policy: this.policy,
      sample,
      window,
    });

    if (result.signal) this.lastSignalValue = result.signal;
    if (result.exit) this.hooks.onTrade?.(result.exit);
    this.hooks.onDecision?.(result);

    return { kind: 'decided', result, strategyVersion: active.version };
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (err) {
        log.error('Tick failed', { error: errorMessage(err) });
      }
    }, this.intervalMs);
    log.info('Decision loop started', { timeframe: this.timeframe, intervalMs: this.intervalMs });
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Decision loop stopped');
  }
}
