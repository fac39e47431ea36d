import type { EquityPoint, Trade } from '../execution/types';
import type { Strategy } from '../strategy/types';

export interface DateRange {
  start: number;
  end: number;
}

export interface BacktestOptions {
  startingBalance: number;
}

export interface BacktestResult {
  strategy: Strategy;
  trades: Trade[];
  equityCurve: EquityPoint[];
  totalSamples: number;
  startingBalance: number;
  finalEquity: number;
  dateRange: DateRange;
}

export interface BacktestMetrics {
  totalTrades: number;
  wins: number;
  losses: number;
  /** 0..1 */
  winRate: number;
  avgWinPct: number;
  avgLossPct: number;
  profitFactor: number;
  totalReturnPct: number;
  maxDrawdownPct: number;
  sharpeRatio: number;
  avgHoldMinutes: number;
  tradesPerDay: number;
}

export interface OptimizationResult {
  strategy: Strategy;
  /** Composite 0..1, see scoreMetrics */
  score: number;
  metrics: BacktestMetrics;
  dateRange: DateRange;
  /** Position in the cycle's candidate list; breaks ranking ties */
  discoveryIndex: number;
  equityCurve: EquityPoint[];
}

export type CycleKind = 'optimize' | 'discover';

export type CycleOutcome =
  | { ran: false; reason: 'already-running' | 'no-data' }
  | {
      ran: true;
      kind: CycleKind;
      evaluated: number;
      failed: number;
      best: OptimizationResult | null;
      promoted: boolean;
      durationMs: number;
    };
