import { describe, it, expect } from 'vitest';
import { BufferedFeed } from '../src/data/feed';
import { runBacktest } from '../src/backtest/engine';
import { ActiveStrategySlot } from '../src/engine/active-strategy';
import { DecisionLoop } from '../src/engine/decision-loop';
import { runDecisionStep, lookbackFor, WINDOW_SLACK } from '../src/execution/decision';
import { PortfolioLedger } from '../src/execution/ledger';
import { createStrategy } from '../src/strategy';
import { longOrder, priceSeries, testPolicy } from './helpers';

const meanRev = createStrategy('mean-reversion', { window: 10, stdMultiplier: 1.5 });

describe('runDecisionStep', () => {
  it('runs exits before entries and sizes against post-exit equity', () => {
    const ledger = new PortfolioLedger(100_000, testPolicy());
    ledger.applyOrder(longOrder());
    const window = priceSeries([...Array(9).fill(100), 90]);
    const sample = window[window.length - 1];

    const result = runDecisionStep({ ledger, strategy: meanRev, policy: testPolicy(), sample, window });

    expect(result.exit?.exitReason).toBe('stop-loss');
    expect(result.exit?.exitPrice).toBe(90);
    expect(result.signal?.direction).toBe('long');
    // 20% of 98,000 after the 2,000 loss
    expect(result.entry?.notional).toBeCloseTo(19_600, 6);
    expect(result.entry?.entryPrice).toBe(90);
    expect(ledger.tradeHistory()).toHaveLength(1);
  });

  it('ignores an opposite signal while a position is open', () => {
    const ledger = new PortfolioLedger(100_000, testPolicy());
    ledger.applyOrder(longOrder({ stopLossPrice: 80, takeProfitPrice: 130 }));
    const window = priceSeries([...Array(9).fill(100), 110]);

    const result = runDecisionStep({
      ledger,
      strategy: meanRev,
      policy: testPolicy(),
      sample: window[window.length - 1],
      window,
    });

    expect(result.signal?.direction).toBe('short');
    expect(result.exit).toBeNull();
    expect(result.rejection?.reason).toBe('position-open');
    expect(ledger.openPosition?.direction).toBe('long');
  });

  it('closes and flips on reversal when the policy allows it', () => {
    const policy = testPolicy({ closeOnReversal: true });
    const ledger = new PortfolioLedger(100_000, policy);
    ledger.applyOrder(longOrder({ stopLossPrice: 80, takeProfitPrice: 130 }));
    const window = priceSeries([...Array(9).fill(100), 110]);

    const result = runDecisionStep({ ledger, strategy: meanRev, policy, sample: window[window.length - 1], window });

    expect(result.exit?.exitReason).toBe('signal-reversal');
    expect(result.exit?.realizedPnl).toBe(2_000);
    expect(result.entry?.direction).toBe('short');
    expect(result.entry?.notional).toBeCloseTo(20_400, 6);
  });

  it('only marks to market when no strategy is active', () => {
    const ledger = new PortfolioLedger(100_000, testPolicy());
    const window = priceSeries([100]);
    const result = runDecisionStep({ ledger, strategy: null, policy: testPolicy(), sample: window[0], window });
    expect(result.signal).toBeNull();
    expect(result.entry).toBeNull();
    expect(ledger.equityCurve()).toHaveLength(1);
  });

  it('sizes the evaluation window from the strategy and stop mode', () => {
    expect(lookbackFor(meanRev, testPolicy())).toBe(10 + WINDOW_SLACK);
    expect(lookbackFor(meanRev, testPolicy({ stopMode: 'atr', atrPeriod: 20 }))).toBe(21 + WINDOW_SLACK);
  });
});

describe('live and replay parity', () => {
  it('produces the same trades live as in a backtest over the same samples', () => {
    const strategy = createStrategy('mean-reversion', { window: 10, stdMultiplier: 1 });
    const policy = testPolicy();
    const samples = priceSeries(Array.from({ length: 120 }, (_, i) => 100 + 10 * Math.sin(i / 3)));

    const feed = new BufferedFeed(samples);
    const ledger = new PortfolioLedger(100_000, policy);
    const loop = new DecisionLoop({
      feed,
      timeframe: '5m',
      ledger,
      slot: new ActiveStrategySlot(strategy),
      policy,
      intervalMs: 1_000,
    });
    for (let i = 0; i < samples.length; i++) loop.tick();

    const replay = runBacktest(samples, strategy, policy, { startingBalance: 100_000 });
    const replayTrades = replay.trades.filter(t => t.exitReason !== 'end-of-data');

    expect(ledger.tradeHistory().length).toBeGreaterThan(0);
    expect(ledger.tradeHistory()).toEqual(replayTrades);
    expect(ledger.equityCurve().slice(0, -1)).toEqual(replay.equityCurve.slice(0, -1));
  });
});
