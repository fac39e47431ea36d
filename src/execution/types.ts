import type { Direction } from '../strategy/types';

export type StopMode = 'percent' | 'atr';

export interface RiskPolicy {
  /** Cap on a single position's notional as a fraction of equity, (0, 1] */
  maxPositionFraction: number;
  minConfidence: number;
  /** Fraction of equity per unit of confidence before the cap applies */
  confidenceScale: number;
  stopMode: StopMode;
  /** Percent offsets from entry, used in percent mode */
  stopLossPct: number;
  takeProfitPct: number;
  /** ATR lookback and multipliers, used in atr mode */
  atrPeriod: number;
  atrStopMultiplier: number;
  atrTakeProfitMultiplier: number;
  minTradeNotional: number;
  /** Charged on notional, per side */
  feePct: number;
  /** Close an open position when the signal points the other way */
  closeOnReversal: boolean;
}

export const RISK_PROFILE_NAMES = ['default', 'conservative', 'aggressive', 'learning'] as const;
export type RiskProfileName = (typeof RISK_PROFILE_NAMES)[number];

export interface RiskProfile {
  name: RiskProfileName;
  startingBalance: number;
  policy: RiskPolicy;
}

export interface Order {
  readonly direction: Direction;
  /** Fraction of equity at sizing time */
  readonly sizeFraction: number;
  readonly notional: number;
  readonly quantity: number;
  readonly entryPrice: number;
  readonly stopLossPrice: number;
  readonly takeProfitPrice: number;
  readonly openedAt: number;
  readonly strategyId: string;
}

/** The single open position: the accepted order plus its running mark. */
export interface Position extends Order {
  entryFee: number;
  lastPrice: number;
  unrealizedPnl: number;
}

export type ExitReason = 'stop-loss' | 'take-profit' | 'signal-reversal' | 'manual' | 'end-of-data';

export interface Trade {
  readonly strategyId: string;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly notional: number;
  readonly entryTime: number;
  readonly exitTime: number;
  readonly durationMs: number;
  /** Net of fees on both sides */
  readonly realizedPnl: number;
  readonly pnlPct: number;
  readonly fees: number;
  readonly exitReason: ExitReason;
}

export interface EquityPoint {
  timestamp: number;
  equity: number;
}

export type RejectionReason =
  | 'flat-signal'
  | 'low-confidence'
  | 'position-open'
  | 'exceeds-max-fraction'
  | 'invalid-stop'
  | 'below-min-trade'
  | 'insufficient-history'
  | 'non-positive-equity';

export interface Rejection {
  reason: RejectionReason;
  detail: string;
}

export type SizingResult = { ok: true; order: Order } | ({ ok: false } & Rejection);

export type ApplyResult = { accepted: true; position: Position } | ({ accepted: false } & Rejection);

/** Everything a ledger needs to be rebuilt. */
export interface PortfolioState {
  cash: number;
  startingBalance: number;
  openPosition: Position | null;
  trades: Trade[];
  equityCurve: EquityPoint[];
}

/** Read-only view for status reporting. Derived fields are computed on demand. */
export interface PortfolioSnapshot {
  cash: number;
  equity: number;
  startingBalance: number;
  openPosition: Position | null;
  tradeCount: number;
  winRate: number;
  totalReturnPct: number;
  maxDrawdownPct: number;
  sharpeRatio: number;
  realizedPnl: number;
}
