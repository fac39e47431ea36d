import { maxDrawdownPct, profitFactor, sharpeRatio, totalReturnPct, winRate } from '../execution/stats';
import type { EquityPoint, Trade } from '../execution/types';
import type { BacktestMetrics, BacktestResult } from './types';

const DAY_MS = 86_400_000;

export function computeMetrics(
  trades: readonly Trade[],
  equityCurve: readonly EquityPoint[],
  startingBalance: number,
  dateRangeMs: number,
): BacktestMetrics {
  const finalEquity = equityCurve.length > 0 ? equityCurve[equityCurve.length - 1].equity : startingBalance;
  const totalReturn = totalReturnPct(finalEquity, startingBalance);
  const maxDD = maxDrawdownPct(equityCurve);

  if (trades.length === 0) {
    return {
      totalTrades: 0, wins: 0, losses: 0, winRate: 0,
      avgWinPct: 0, avgLossPct: 0, profitFactor: 0,
      totalReturnPct: totalReturn, maxDrawdownPct: maxDD,
      sharpeRatio: 0, avgHoldMinutes: 0, tradesPerDay: 0,
    };
  }

  const wins = trades.filter(t => t.realizedPnl > 0);
  const losses = trades.filter(t => t.realizedPnl <= 0);
  const avgWinPct = wins.length > 0 ? wins.reduce((s, t) => s + t.pnlPct, 0) / wins.length : 0;
  const avgLossPct = losses.length > 0 ? losses.reduce((s, t) => s + t.pnlPct, 0) / losses.length : 0;
  const days = dateRangeMs / DAY_MS;

  return {
    totalTrades: trades.length,
    wins: wins.length,
    losses: losses.length,
    winRate: winRate(trades),
    avgWinPct,
    avgLossPct,
    profitFactor: profitFactor(trades),
    totalReturnPct: totalReturn,
    maxDrawdownPct: maxDD,
    sharpeRatio: sharpeRatio(trades),
    avgHoldMinutes: trades.reduce((s, t) => s + t.durationMs, 0) / trades.length / 60_000,
    tradesPerDay: days > 0 ? trades.length / days : trades.length,
  };
}

export const SCORE_WEIGHTS = {
  totalReturn: 0.4,
  riskAdjusted: 0.25,
  winRate: 0.15,
  tradeFrequency: 0.1,
} as const;

/**
 * Composite score in [0, 1]. Return is log-scaled and signed, Sharpe is
 * capped at 5 and penalized by drawdown, win rate saturates at 80 %, trade
 * count at 200, and profit factor adds up to 0.2. No trades scores 0.
 */
export function scoreMetrics(m: BacktestMetrics): number {
  if (m.totalTrades === 0) return 0;

  const ret = m.totalReturnPct / 100;
  let returnScore = Math.min(1, Math.log(1 + Math.abs(ret * 10)) / 3);
  if (ret < 0) returnScore = -returnScore;

  const dd = m.maxDrawdownPct / 100;
  let riskScore = Math.min(1, Math.max(0, m.sharpeRatio / 5));
  if (dd > 0) riskScore *= 1 - Math.min(0.5, dd / 0.3);

  const winScore = Math.min(1, m.winRate / 0.8);
  const freqScore = Math.min(1, m.totalTrades / 200);
  const profitBonus = Math.min(0.2, (m.profitFactor - 1) / 5);

  const score =
    returnScore * SCORE_WEIGHTS.totalReturn +
    riskScore * SCORE_WEIGHTS.riskAdjusted +
    winScore * SCORE_WEIGHTS.winRate +
    freqScore * SCORE_WEIGHTS.tradeFrequency +
    profitBonus;

  return Math.max(0, Math.min(1, score));
}

function fmt(v: number, digits = 2): string {
  return v === Infinity ? 'Inf' : v.toFixed(digits);
}

export function printReport(result: BacktestResult): void {
  const metrics = computeMetrics(
    result.trades,
    result.equityCurve,
    result.startingBalance,
    result.dateRange.end - result.dateRange.start,
  );
  const score = scoreMetrics(metrics);

  const startDate = new Date(result.dateRange.start).toISOString().split('T')[0];
  const endDate = new Date(result.dateRange.end).toISOString().split('T')[0];

  console.log('\n' + '='.repeat(60));
  console.log(`Strategy: ${result.strategy.id}`);
  console.log(`Period:   ${startDate} to ${endDate} (${result.totalSamples} samples)`);
  console.log('='.repeat(60));
  console.log(`Trades:        ${metrics.totalTrades} (${metrics.wins}W / ${metrics.losses}L)`);
  console.log(`Win rate:      ${(metrics.winRate * 100).toFixed(1)}%`);
  console.log(`Avg win:       +${fmt(metrics.avgWinPct)}%`);
  console.log(`Avg loss:      ${fmt(metrics.avgLossPct)}%`);
  console.log(`Profit factor: ${fmt(metrics.profitFactor)}`);
  console.log(`Return:        ${metrics.totalReturnPct >= 0 ? '+' : ''}${fmt(metrics.totalReturnPct)}%`);
  console.log(`Max drawdown:  ${fmt(metrics.maxDrawdownPct)}%`);
  console.log(`Sharpe:        ${fmt(metrics.sharpeRatio)}`);
  console.log(`Avg hold:      ${metrics.avgHoldMinutes.toFixed(0)} min`);
  console.log(`Trades/day:    ${fmt(metrics.tradesPerDay, 1)}`);
  console.log(`Score:         ${score.toFixed(3)}`);
  console.log('='.repeat(60));

  if (result.trades.length > 0 && result.trades.length <= 50) {
    console.log('\nTrade log:');
    for (const t of result.trades) {
      const time = new Date(t.entryTime).toISOString().slice(0, 16).replace('T', ' ');
      const sign = t.pnlPct >= 0 ? '+' : '';
      console.log(`  ${time} | ${t.direction.padEnd(5)} | ${sign}${t.pnlPct.toFixed(2)}% | ${t.exitReason}`);
    }
  }
}
