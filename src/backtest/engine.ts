import type { PriceSample } from '../data/types';
import { lookbackFor, runDecisionStep } from '../execution/decision';
import { PortfolioLedger } from '../execution/ledger';
import type { RiskPolicy } from '../execution/types';
import { requiredHistory } from '../strategy/evaluator';
import type { Strategy } from '../strategy/types';
import { InsufficientHistoryError } from '../utils/errors';
import type { BacktestOptions, BacktestResult } from './types';

/**
 * Replay `samples` (one timeframe, oldest first) through a private ledger
 * using the same decision step the live loop runs. Any position still open
 * after the last sample is closed at its close with reason end-of-data.
 *
 * Throws InsufficientHistoryError when the samples cannot cover the
 * strategy's lookback plus one tradable bar.
 */
export function runBacktest(
  samples: readonly PriceSample[],
  strategy: Strategy,
  policy: RiskPolicy,
  opts: BacktestOptions,
): BacktestResult {
  const needed = requiredHistory(strategy) + 1;
  if (samples.length < needed) {
    throw new InsufficientHistoryError(strategy.id, needed, samples.length);
  }

  const ledger = new PortfolioLedger(opts.startingBalance, policy);
  const lookback = lookbackFor(strategy, policy);
  const accepted: PriceSample[] = [];

  for (const sample of samples) {
    const prev = accepted[accepted.length - 1];
    // Same rule as the live loop: a sample not newer than the last is skipped
    if (prev && sample.timestamp <= prev.timestamp) continue;
    accepted.push(sample);

    runDecisionStep({
      ledger,
      strategy,
      policy,
      sample,
      window: accepted.slice(-lookback),
    });
  }

  const last = accepted[accepted.length - 1];
  ledger.closePosition(last.close, last.timestamp, 'end-of-data');
  const finalEquity = ledger.markToMarket(last.close, last.timestamp);

  return {
    strategy,
    trades: [...ledger.tradeHistory()],
    equityCurve: [...ledger.equityCurve()],
    totalSamples: accepted.length,
    startingBalance: opts.startingBalance,
    finalEquity,
    dateRange: { start: accepted[0].timestamp, end: last.timestamp },
  };
}
