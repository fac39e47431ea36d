import type { EquityPoint, Trade } from './types';

const TRADING_DAYS = 252;

/** Fraction of trades with positive realized P&L, 0..1. */
export function winRate(trades: readonly Trade[]): number {
  if (trades.length === 0) return 0;
  return trades.filter(t => t.realizedPnl > 0).length / trades.length;
}

/** Gross wins over gross losses. Infinity when there are wins and no losses. */
export function profitFactor(trades: readonly Trade[]): number {
  const won = trades.filter(t => t.realizedPnl > 0).reduce((s, t) => s + t.realizedPnl, 0);
  const lost = Math.abs(trades.filter(t => t.realizedPnl <= 0).reduce((s, t) => s + t.realizedPnl, 0));
  return lost > 0 ? won / lost : won > 0 ? Infinity : 0;
}

/** Per-trade return mean over stdev, scaled by sqrt(252). Needs at least two trades. */
export function sharpeRatio(trades: readonly Trade[]): number {
  if (trades.length < 2) return 0;
  const returns = trades.map(t => t.pnlPct / 100);
  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / returns.length;
  const std = Math.sqrt(variance);
  return std > 0 ? (mean / std) * Math.sqrt(TRADING_DAYS) : 0;
}

/** Largest peak-to-trough decline of the curve, in percent of the peak. */
export function maxDrawdownPct(curve: readonly EquityPoint[]): number {
  let peak = -Infinity;
  let maxDD = 0;
  for (const p of curve) {
    if (p.equity > peak) peak = p.equity;
    if (peak > 0) {
      const dd = ((peak - p.equity) / peak) * 100;
      if (dd > maxDD) maxDD = dd;
    }
  }
  return maxDD;
}

export function totalReturnPct(equity: number, startingBalance: number): number {
  return startingBalance > 0 ? ((equity - startingBalance) / startingBalance) * 100 : 0;
}
