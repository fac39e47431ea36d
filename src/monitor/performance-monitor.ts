import type { EquityPoint, Trade } from '../execution/types';
import { winRate } from '../execution/stats';
import { createLogger } from '../utils/logger';

const log = createLogger('performance-monitor');

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface DivergenceReport {
  strategyId: string;
  /** Live time covered since the reference was set */
  elapsedMs: number;
  liveReturnPct: number;
  /** Backtest return over the same elapsed duration from the start of its curve */
  backtestReturnPct: number;
  /** Live minus backtest, relative to |backtest|, in percent */
  deviationPct: number;
  liveWinRate: number | null;
  backtestWinRate: number;
  /** 0..1; 1 means live tracks the backtest exactly */
  accuracyScore: number;
  confidence: ConfidenceLevel;
  alerting: boolean;
}

export interface MonitorReference {
  strategyId: string;
  backtestCurve: readonly EquityPoint[];
  backtestWinRate: number;
}

function confidenceFor(accuracy: number): ConfidenceLevel {
  if (accuracy >= 0.7) return 'HIGH';
  if (accuracy >= 0.5) return 'MEDIUM';
  return 'LOW';
}

/** Equity of the last point at or before `ts`. Curve is ordered by timestamp. */
function equityAt(curve: readonly EquityPoint[], ts: number): number {
  let equity = curve[0].equity;
  for (const p of curve) {
    if (p.timestamp > ts) break;
    equity = p.equity;
  }
  return equity;
}

/**
 * Tracks the live equity curve against the active strategy's backtest curve.
 * Observes only: it never touches the ledger or the scheduler.
 */
export class PerformanceMonitor {
  private reference: MonitorReference | null = null;
  private live: EquityPoint[] = [];
  private liveTrades: Trade[] = [];
  private alerting = false;

  constructor(private readonly alertThresholdPct: number) {}

  get referenceId(): string | null {
    return this.reference?.strategyId ?? null;
  }

  /** Rebase on a new reference; called on promotion and when the active strategy is first re-scored. */
  setReference(ref: MonitorReference) {
    this.reference = { ...ref, backtestCurve: [...ref.backtestCurve] };
    this.live = [];
    this.liveTrades = [];
    this.alerting = false;
  }

  record(timestamp: number, equity: number) {
    if (!this.reference) return;
    const last = this.live[this.live.length - 1];
    if (last && timestamp <= last.timestamp) return;
    this.live.push({ timestamp, equity });

    const report = this.divergence();
    if (!report) return;
    if (report.alerting && !this.alerting) {
      log.warn('Live performance diverging from backtest', {
        strategyId: report.strategyId,
        liveReturnPct: report.liveReturnPct.toFixed(2),
        backtestReturnPct: report.backtestReturnPct.toFixed(2),
        deviationPct: report.deviationPct.toFixed(1),
        confidence: report.confidence,
      });
    } else if (!report.alerting && this.alerting) {
      log.info('Live performance back in line with backtest', { strategyId: report.strategyId });
    }
    this.alerting = report.alerting;
  }

  recordTrade(trade: Trade) {
    if (!this.reference) return;
    this.liveTrades.push(trade);
  }

  divergence(): DivergenceReport | null {
    const ref = this.reference;
    if (!ref || ref.backtestCurve.length === 0 || this.live.length < 2) return null;

    const liveStart = this.live[0];
    const liveEnd = this.live[this.live.length - 1];
    const elapsedMs = liveEnd.timestamp - liveStart.timestamp;
    const liveReturnPct = liveStart.equity > 0 ? (liveEnd.equity / liveStart.equity - 1) * 100 : 0;

    const btStart = ref.backtestCurve[0];
    const btEquity = equityAt(ref.backtestCurve, btStart.timestamp + elapsedMs);
    const backtestReturnPct = btStart.equity > 0 ? (btEquity / btStart.equity - 1) * 100 : 0;

    let deviationPct: number;
    if (Math.abs(backtestReturnPct) > 1e-9) {
      deviationPct = ((liveReturnPct - backtestReturnPct) / Math.abs(backtestReturnPct)) * 100;
    } else {
      deviationPct = Math.abs(liveReturnPct) > 1e-9 ? Math.sign(liveReturnPct) * 100 : 0;
    }

    const returnAccuracy = 1 - Math.min(1, Math.abs(deviationPct) / 100);
    const liveWinRate = this.liveTrades.length > 0 ? winRate(this.liveTrades) : null;
    const accuracyScore = liveWinRate === null
      ? returnAccuracy
      : (returnAccuracy + (1 - Math.abs(liveWinRate - ref.backtestWinRate))) / 2;

    return {
      strategyId: ref.strategyId,
      elapsedMs,
      liveReturnPct,
      backtestReturnPct,
      deviationPct,
      liveWinRate,
      backtestWinRate: ref.backtestWinRate,
      accuracyScore,
      confidence: confidenceFor(accuracyScore),
      alerting: Math.abs(deviationPct) > this.alertThresholdPct,
    };
  }
}
