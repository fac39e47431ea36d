import type { DecisionJournal } from '../data/data-logger';
import type { StateStore } from '../data/state-store';
import type { MarketDataFeed, Timeframe } from '../data/types';
import { OptimizationScheduler, type CandidateEvaluator } from '../backtest/scheduler';
import type { OptimizationResult } from '../backtest/types';
import { PortfolioLedger } from '../execution/ledger';
import { getRiskProfile } from '../execution/risk-profiles';
import type { PortfolioSnapshot, RiskProfile, RiskProfileName } from '../execution/types';
import { PerformanceMonitor, type DivergenceReport } from '../monitor/performance-monitor';
import type { Signal, Strategy } from '../strategy/types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ActiveStrategySlot } from './active-strategy';
import { DecisionLoop } from './decision-loop';

const log = createLogger('paper-engine');

export interface OptimizerSettings {
  promotionThreshold: number;
  winnersToKeep: number;
  perturbationsPerStrategy: number;
  seed: number;
  optimizationIntervalMs: number;
  discoveryIntervalMs: number;
  maxSamples?: number;
}

export interface PaperEngineOptions {
  feed: MarketDataFeed;
  timeframe: Timeframe;
  tickIntervalMs: number;
  riskProfile: RiskProfile;
  optimizer: OptimizerSettings;
  divergenceAlertPct: number;
  /** Strategy to trade when there is no saved state */
  initialStrategy?: Strategy | null;
  stateStore?: StateStore;
  journal?: DecisionJournal;
  /** Resolves profile names for selectRiskProfile */
  resolveProfile?: (name: string) => RiskProfile;
  evaluateCandidate?: CandidateEvaluator;
  now?: () => number;
}

export interface EngineStatus {
  portfolio: PortfolioSnapshot;
  activeStrategyId: string | null;
  activeScore: number;
  lastSignal: Signal | null;
  uptimeMs: number;
  running: boolean;
  riskProfile: RiskProfileName;
  divergence: DivergenceReport | null;
  cycleRunning: boolean;
  winners: { strategyId: string; score: number }[];
}

/**
 * Paper-trading control surface: owns the live ledger, the decision loop,
 * the optimization scheduler and the performance monitor, and persists the
 * portfolio and active strategy across restarts.
 */
export class PaperTradingEngine {
  readonly slot: ActiveStrategySlot;
  readonly ledger: PortfolioLedger;
  readonly loop: DecisionLoop;
  readonly scheduler: OptimizationScheduler;
  readonly monitor: PerformanceMonitor;

  private profile: RiskProfile;
  private readonly stateStore: StateStore | null;
  private readonly journal: DecisionJournal | null;
  private readonly resolveProfile: (name: string) => RiskProfile;
  private readonly now: () => number;
  private startedAt: number | null = null;

  constructor(opts: PaperEngineOptions) {
    this.stateStore = opts.stateStore ?? null;
    this.journal = opts.journal ?? null;
    this.resolveProfile = opts.resolveProfile ?? (name => getRiskProfile(name));
    this.now = opts.now ?? Date.now;
    this.profile = opts.riskProfile;

    const saved = this.stateStore?.load() ?? null;
    if (saved) {
      if (saved.riskProfile !== opts.riskProfile.name) {
        this.profile = this.resolveProfile(saved.riskProfile);
      }
      this.ledger = PortfolioLedger.fromState(saved.portfolio, this.profile.policy);
      this.slot = new ActiveStrategySlot(saved.activeStrategy, saved.activeScore);
      log.info('Resumed saved state', {
        riskProfile: this.profile.name,
        trades: saved.portfolio.trades.length,
        activeStrategyId: saved.activeStrategy?.id ?? null,
      });
    } else {
      this.ledger = new PortfolioLedger(this.profile.startingBalance, this.profile.policy);
      this.slot = new ActiveStrategySlot(opts.initialStrategy ?? null, 0);
    }

    this.monitor = new PerformanceMonitor(opts.divergenceAlertPct);

    this.loop = new DecisionLoop({
      feed: opts.feed,
      timeframe: opts.timeframe,
      ledger: this.ledger,
      slot: this.slot,
      policy: this.profile.policy,
      intervalMs: opts.tickIntervalMs,
      hooks: {
        onDecision: result => {
          this.monitor.record(result.sample.timestamp, result.equity);
          this.journal?.logDecision(result);
          if (result.entry) this.persist();
        },
        onTrade: trade => {
          this.monitor.recordTrade(trade);
          this.journal?.logTrade(trade);
          this.persist();
        },
      },
    });

    this.scheduler = new OptimizationScheduler({
      feed: opts.feed,
      timeframe: opts.timeframe,
      slot: this.slot,
      getPolicy: () => this.profile.policy,
      getStartingBalance: () => this.profile.startingBalance,
      ...opts.optimizer,
      evaluate: opts.evaluateCandidate,
      hooks: {
        onPromotion: (result, previous, kind) => this.onPromotion(result, previous.strategy, previous.score, kind),
        onActiveEvaluated: result => this.onActiveEvaluated(result),
      },
    });
  }

  private onActiveEvaluated(result: OptimizationResult) {
    // A strategy loaded at startup has no backtest curve until its first cycle
    if (this.monitor.referenceId !== result.strategy.id) {
      this.monitor.setReference({
        strategyId: result.strategy.id,
        backtestCurve: result.equityCurve,
        backtestWinRate: result.metrics.winRate,
      });
    }
    this.persist();
  }

  private onPromotion(
    result: OptimizationResult,
    previous: Strategy | null,
    previousScore: number,
    kind: 'optimize' | 'discover',
  ) {
    this.monitor.setReference({
      strategyId: result.strategy.id,
      backtestCurve: result.equityCurve,
      backtestWinRate: result.metrics.winRate,
    });
    this.journal?.logPromotion(
      {
        cycle: kind,
        strategyId: result.strategy.id,
        score: result.score,
        previousStrategyId: previous?.id ?? null,
        previousScore,
      },
      this.now(),
    );
    this.persist();
  }

  get running(): boolean {
    return this.startedAt !== null;
  }

  start() {
    if (this.startedAt !== null) return;
    this.startedAt = this.now();
    this.loop.start();
    this.scheduler.start();
    log.info('Paper trading started', {
      riskProfile: this.profile.name,
      activeStrategyId: this.slot.read().strategy?.id ?? null,
    });
  }

  /** Stop ticking, wait for a running cycle, then save. */
  async stop() {
    if (this.startedAt === null) return;
    this.loop.stop();
    await this.scheduler.stop();
    this.startedAt = null;
    this.persist();
    log.info('Paper trading stopped');
  }

  status(): EngineStatus {
    const active = this.slot.read();
    return {
      portfolio: this.ledger.snapshot(this.loop.lastPrice ?? undefined),
      activeStrategyId: active.strategy?.id ?? null,
      activeScore: active.score,
      lastSignal: this.loop.lastSignal,
      uptimeMs: this.startedAt === null ? 0 : this.now() - this.startedAt,
      running: this.running,
      riskProfile: this.profile.name,
      divergence: this.monitor.divergence(),
      cycleRunning: this.scheduler.cycleRunning,
      winners: this.scheduler.getWinners().map(w => ({ strategyId: w.strategy.id, score: w.score })),
    };
  }

  /**
   * Switch risk profile. The new policy governs every later order and the next
   * optimization cycle; the open position keeps its brackets. The profile's
   * starting balance only applies to an account that has not traded yet.
   * Throws ConfigError for an unknown profile.
   */
  selectRiskProfile(name: string): RiskProfile {
    const profile = this.resolveProfile(name);
    this.profile = profile;
    this.ledger.setPolicy(profile.policy);
    this.loop.setPolicy(profile.policy);
    const rebalanced = this.ledger.resetBalance(profile.startingBalance);
    log.info('Risk profile selected', { riskProfile: profile.name, startingBalanceApplied: rebalanced });
    this.persist();
    return profile;
  }

  /** Save state if a store is configured. A failed save is logged, not thrown. */
  persist() {
    if (!this.stateStore) return;
    const active = this.slot.read();
    try {
      this.stateStore.save({
        savedAt: this.now(),
        riskProfile: this.profile.name,
        activeStrategy: active.strategy,
        activeScore: active.score,
        portfolio: this.ledger.toState(),
      });
    } catch (err) {
      log.error('Failed to save state', { path: this.stateStore.path, error: errorMessage(err) });
    }
  }
}
