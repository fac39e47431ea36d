import type { MarketDataFeed, PriceSample, Timeframe } from '../data/types';
import type { ActiveEntry, ActiveStrategySlot } from '../engine/active-strategy';
import type { RiskPolicy } from '../execution/types';
import type { Strategy } from '../strategy/types';
import { errorMessage, InsufficientHistoryError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { runBacktest } from './engine';
import { buildPopulation, createRng, type PopulationInput, type Rng } from './population';
import { computeMetrics, scoreMetrics } from './report';
import type { CycleKind, CycleOutcome, OptimizationResult } from './types';

const log = createLogger('scheduler');

export type CandidateEvaluator = (
  strategy: Strategy,
  samples: readonly PriceSample[],
  policy: RiskPolicy,
  startingBalance: number,
  discoveryIndex: number,
) => OptimizationResult;

/** Backtest one candidate and score it. Throws InsufficientHistoryError on short data. */
export const evaluateCandidate: CandidateEvaluator = (strategy, samples, policy, startingBalance, discoveryIndex) => {
  const result = runBacktest(samples, strategy, policy, { startingBalance });
  const metrics = computeMetrics(
    result.trades,
    result.equityCurve,
    startingBalance,
    result.dateRange.end - result.dateRange.start,
  );
  return {
    strategy,
    score: scoreMetrics(metrics),
    metrics,
    dateRange: result.dateRange,
    discoveryIndex,
    equityCurve: result.equityCurve,
  };
};

/** Score desc, then lower max drawdown, then earlier discovery. */
export function compareResults(a: OptimizationResult, b: OptimizationResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.metrics.maxDrawdownPct !== b.metrics.maxDrawdownPct) {
    return a.metrics.maxDrawdownPct - b.metrics.maxDrawdownPct;
  }
  return a.discoveryIndex - b.discoveryIndex;
}

export function rankResults(results: readonly OptimizationResult[], keep: number): OptimizationResult[] {
  return [...results].sort(compareResults).slice(0, keep);
}

/** A candidate replaces the active strategy only when it clears the threshold and beats it. */
export function shouldPromote(candidateScore: number, activeScore: number, threshold: number): boolean {
  return candidateScore >= threshold && candidateScore > activeScore;
}

export interface SchedulerHooks {
  /** `previous.score` is the outgoing strategy's score from this cycle when it was re-evaluated */
  onPromotion?(result: OptimizationResult, previous: ActiveEntry, kind: CycleKind): void;
  /** The active strategy was backtested this cycle and stays active */
  onActiveEvaluated?(result: OptimizationResult): void;
}

export interface SchedulerOptions {
  feed: MarketDataFeed;
  timeframe: Timeframe;
  slot: ActiveStrategySlot;
  /** Read at the start of every cycle so a profile switch applies to the next one */
  getPolicy: () => RiskPolicy;
  getStartingBalance: () => number;
  promotionThreshold: number;
  winnersToKeep: number;
  perturbationsPerStrategy: number;
  seed: number;
  optimizationIntervalMs: number;
  discoveryIntervalMs: number;
  /** Replay only the most recent N samples per candidate; unset or 0 replays the full history */
  maxSamples?: number;
  hooks?: SchedulerHooks;
  evaluate?: CandidateEvaluator;
  generate?: (input: PopulationInput) => Strategy[];
}

const yieldToEventLoop = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Periodic optimize/discover cycles over the feed's history. Cycles never
 * overlap: a trigger that fires while one is running is skipped. Candidates
 * run one at a time with a yield between them so live ticks keep flowing.
 * Promotion goes through compare-and-set on the active-strategy slot.
 */
export class OptimizationScheduler {
  private readonly opts: SchedulerOptions;
  private readonly rng: Rng;
  private readonly evaluate: CandidateEvaluator;
  private readonly generate: (input: PopulationInput) => Strategy[];

  private winners: OptimizationResult[] = [];
  private inFlight: Promise<CycleOutcome> | null = null;
  private optimizeTimer: NodeJS.Timeout | null = null;
  private discoverTimer: NodeJS.Timeout | null = null;
  private lastOutcome: CycleOutcome | null = null;

  constructor(opts: SchedulerOptions) {
    this.opts = opts;
    this.rng = createRng(opts.seed);
    this.evaluate = opts.evaluate ?? evaluateCandidate;
    this.generate = opts.generate ?? buildPopulation;
  }

  get cycleRunning(): boolean {
    return this.inFlight !== null;
  }

  get lastCycle(): CycleOutcome | null {
    return this.lastOutcome;
  }

  getWinners(): readonly OptimizationResult[] {
    return this.winners;
  }

  runCycle(kind: CycleKind): Promise<CycleOutcome> {
    if (this.inFlight) {
      log.info('Cycle already running, skipping trigger', { kind });
      const skipped: CycleOutcome = { ran: false, reason: 'already-running' };
      return Promise.resolve(skipped);
    }
    const cycle = this.execute(kind).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async execute(kind: CycleKind): Promise<CycleOutcome> {
    const started = Date.now();
    const { feed, timeframe, slot } = this.opts;

    const history = feed.historicalRange(timeframe, -Infinity, Infinity);
    const cap = this.opts.maxSamples ?? 0;
    const samples = cap > 0 ? history.slice(-cap) : history;
    if (samples.length === 0) {
      log.warn('No history to backtest on, skipping cycle', { kind, timeframe });
      const outcome: CycleOutcome = { ran: false, reason: 'no-data' };
      this.lastOutcome = outcome;
      return outcome;
    }

    const snapshot = slot.read();
    const policy = this.opts.getPolicy();
    const startingBalance = this.opts.getStartingBalance();

    const candidates = this.generate({
      kind,
      active: snapshot.strategy,
      winners: this.winners.map(w => w.strategy),
      rng: this.rng,
      perturbationsPerStrategy: this.opts.perturbationsPerStrategy,
    });
    log.info('Cycle started', { kind, candidates: candidates.length, samples: samples.length });

    const results: OptimizationResult[] = [];
    let failed = 0;
    for (let i = 0; i < candidates.length; i++) {
      await yieldToEventLoop();
      const candidate = candidates[i];
      try {
        results.push(this.evaluate(candidate, samples, policy, startingBalance, i));
      } catch (err) {
        failed++;
        if (err instanceof InsufficientHistoryError) {
          log.debug('Candidate excluded, not enough history', {
            strategyId: candidate.id,
            required: err.required,
            available: err.available,
          });
        } else {
          log.warn('Candidate failed, excluded from ranking', { strategyId: candidate.id, error: errorMessage(err) });
        }
      }
    }

    const ranked = rankResults(results, this.opts.winnersToKeep);
    this.winners = ranked;
    const best = ranked[0] ?? null;

    // The bar to beat is the active strategy's score on this cycle's data, when it was re-run
    const activeId = snapshot.strategy?.id;
    const activeResult = activeId === undefined ? null : results.find(r => r.strategy.id === activeId) ?? null;
    const activeScore = activeResult ? activeResult.score : snapshot.score;

    let promoted = false;
    if (best) {
      promoted = this.tryPromote(best, snapshot, activeScore, kind);
    }
    if (!promoted && activeResult) {
      this.refreshActive(activeResult, snapshot);
    }

    const outcome: CycleOutcome = {
      ran: true,
      kind,
      evaluated: results.length,
      failed,
      best,
      promoted,
      durationMs: Date.now() - started,
    };
    this.lastOutcome = outcome;
    log.info('Cycle finished', {
      kind,
      evaluated: results.length,
      failed,
      bestId: best?.strategy.id ?? null,
      bestScore: best?.score.toFixed(3) ?? null,
      promoted,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  private tryPromote(best: OptimizationResult, snapshot: ActiveEntry, activeScore: number, kind: CycleKind): boolean {
    if (snapshot.strategy?.id === best.strategy.id) return false;
    if (!shouldPromote(best.score, activeScore, this.opts.promotionThreshold)) {
      log.debug('Best candidate not promoted', {
        strategyId: best.strategy.id,
        score: best.score,
        activeScore,
        threshold: this.opts.promotionThreshold,
      });
      return false;
    }

    const swap = this.opts.slot.compareAndSet(snapshot.version, best.strategy, best.score);
    if (!swap.swapped) {
      log.warn('Lost promotion race, discarding candidate', {
        strategyId: best.strategy.id,
        current: swap.current.strategy?.id ?? null,
      });
      return false;
    }

    log.info('Strategy promoted', {
      kind,
      strategyId: best.strategy.id,
      score: best.score.toFixed(3),
      previous: snapshot.strategy?.id ?? null,
      previousScore: activeScore.toFixed(3),
    });
    try {
      this.opts.hooks?.onPromotion?.(best, { ...snapshot, score: activeScore }, kind);
    } catch (err) {
      log.error('Promotion hook failed', { strategyId: best.strategy.id, error: errorMessage(err) });
    }
    return true;
  }

  /** Store the active strategy's latest score in the slot; the strategy itself is unchanged. */
  private refreshActive(result: OptimizationResult, snapshot: ActiveEntry) {
    if (result.score !== snapshot.score) {
      const refresh = this.opts.slot.refreshScore(snapshot.version, result.score);
      if (!refresh.swapped) {
        log.warn('Active strategy changed during the cycle, score not refreshed', {
          strategyId: result.strategy.id,
          current: refresh.current.strategy?.id ?? null,
        });
        return;
      }
      log.debug('Active score refreshed', {
        strategyId: result.strategy.id,
        score: result.score.toFixed(3),
        previousScore: snapshot.score.toFixed(3),
      });
    }
    try {
      this.opts.hooks?.onActiveEvaluated?.(result);
    } catch (err) {
      log.error('Active evaluation hook failed', { strategyId: result.strategy.id, error: errorMessage(err) });
    }
  }

  start() {
    if (this.optimizeTimer) return;
    this.optimizeTimer = setInterval(async () => {
      try {
        await this.runCycle('optimize');
      } catch (err) {
        log.error('Optimization cycle failed', { error: errorMessage(err) });
      }
    }, this.opts.optimizationIntervalMs);
    this.discoverTimer = setInterval(async () => {
      try {
        await this.runCycle('discover');
      } catch (err) {
        log.error('Discovery cycle failed', { error: errorMessage(err) });
      }
    }, this.opts.discoveryIntervalMs);
    log.info('Scheduler started', {
      optimizationIntervalMs: this.opts.optimizationIntervalMs,
      discoveryIntervalMs: this.opts.discoveryIntervalMs,
    });
  }

  /** Stop the timers and wait for a cycle in flight to finish. */
  async stop() {
    if (this.optimizeTimer) clearInterval(this.optimizeTimer);
    if (this.discoverTimer) clearInterval(this.discoverTimer);
    this.optimizeTimer = null;
    this.discoverTimer = null;
    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (err) {
        log.error('Cycle in flight failed during stop', { error: errorMessage(err) });
      }
    }
    log.info('Scheduler stopped');
  }
}
