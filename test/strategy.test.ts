import { describe, it, expect } from 'vitest';
import {
  createStrategy,
  evaluateSignal,
  requiredHistory,
  tryCreateStrategy,
  validateParams,
  listFamilies,
  isStrategyFamily,
} from '../src/strategy';
import { ConfigError } from '../src/utils/errors';
import { bar, priceSeries, STEP_5M, T0 } from './helpers';

// ---- Strategy values ----

describe('createStrategy', () => {
  it('derives the id from family, sorted params and version', () => {
    const s = createStrategy('rsi-reversal');
    expect(s.id).toBe('rsi-reversal(overbought=70,oversold=30,period=14)@v1');
  });

  it('gives identical knobs identical ids regardless of key order', () => {
    const a = createStrategy('rsi-reversal', { period: 14, oversold: 30, overbought: 70 });
    const b = createStrategy('rsi-reversal', { overbought: 70, period: 14, oversold: 30 });
    expect(a.id).toBe(b.id);
  });

  it('treats a new version as a new strategy', () => {
    expect(createStrategy('momentum', {}, 2).id).not.toBe(createStrategy('momentum').id);
  });

  it('freezes the strategy and its params', () => {
    const s = createStrategy('mean-reversion');
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.params)).toBe(true);
  });

  it('rejects unknown params', () => {
    expect(() => createStrategy('rsi-reversal', { foo: 1 })).toThrow(ConfigError);
    expect(validateParams('rsi-reversal', { period: 14, oversold: 30, overbought: 70, foo: 1 }))
      .toBe('Unknown params for rsi-reversal: foo');
  });

  it('rejects out-of-range params', () => {
    expect(() => createStrategy('rsi-reversal', { period: 1 })).toThrow('rsi-reversal.period=1 outside [2, 50]');
  });

  it('applies family constraints', () => {
    expect(() => createStrategy('trend-crossover', { fastWindow: 10, slowWindow: 10 }))
      .toThrow('fastWindow must be below slowWindow');
    expect(tryCreateStrategy('rsi-reversal', { oversold: 45, overbought: 55 })).not.toBeNull();
  });

  it('registers four families', () => {
    expect(listFamilies().map(f => f.family)).toEqual(['mean-reversion', 'trend-crossover', 'rsi-reversal', 'momentum']);
    expect(isStrategyFamily('momentum')).toBe(true);
    expect(isStrategyFamily('martingale')).toBe(false);
  });
});

// ---- Signal evaluation ----

describe('evaluateSignal', () => {
  const meanRev = createStrategy('mean-reversion', { window: 10, stdMultiplier: 1.5 });

  it('is flat with zero confidence on insufficient history', () => {
    const sig = evaluateSignal(meanRev, priceSeries(Array(9).fill(100)));
    expect(sig.direction).toBe('flat');
    expect(sig.confidence).toBe(0);
    expect(sig.reason).toBe('insufficient history (9/10)');
  });

  it('is deterministic for the same inputs', () => {
    const window = priceSeries([...Array(9).fill(100), 90]);
    const a = evaluateSignal(meanRev, window);
    const b = evaluateSignal(meanRev, window);
    expect(a).toEqual(b);
    expect(a.strategyId).toBe(meanRev.id);
    expect(a.timestamp).toBe(T0 + 9 * STEP_5M);
  });

  it('reports the required history of a strategy', () => {
    expect(requiredHistory(meanRev)).toBe(10);
    expect(requiredHistory(createStrategy('trend-crossover', { fastWindow: 2, slowWindow: 5 }))).toBe(6);
  });
});

describe('mean-reversion', () => {
  const s = createStrategy('mean-reversion', { window: 10, stdMultiplier: 1.5 });

  it('goes long below the lower band', () => {
    // mean 99, std 3, lower band 94.5
    const sig = evaluateSignal(s, priceSeries([...Array(9).fill(100), 90]));
    expect(sig.direction).toBe('long');
    expect(sig.confidence).toBe(0.95);
  });

  it('goes short above the upper band', () => {
    const sig = evaluateSignal(s, priceSeries([...Array(9).fill(100), 110]));
    expect(sig.direction).toBe('short');
  });

  it('stays flat inside the bands', () => {
    const sig = evaluateSignal(s, priceSeries(Array(10).fill(100)));
    expect(sig).toMatchObject({ direction: 'flat', confidence: 0, reason: 'inside bands' });
  });
});

describe('trend-crossover', () => {
  const s = createStrategy('trend-crossover', {
    fastWindow: 2,
    slowWindow: 5,
    crossoverThreshold: 1,
    crossunderThreshold: 1,
  });

  it('goes long on a bullish cross', () => {
    const sig = evaluateSignal(s, priceSeries([10, 10, 10, 10, 10, 12]));
    expect(sig.direction).toBe('long');
    expect(sig.confidence).toBe(0.95);
  });

  it('goes short on a bearish cross', () => {
    expect(evaluateSignal(s, priceSeries([10, 10, 10, 10, 10, 8])).direction).toBe('short');
  });

  it('stays flat without a cross', () => {
    expect(evaluateSignal(s, priceSeries([10, 10, 10, 10, 10, 10])).reason).toBe('no cross');
  });
});

describe('rsi-reversal', () => {
  it('scales long confidence with distance below oversold', () => {
    const s = createStrategy('rsi-reversal', { period: 2, oversold: 30, overbought: 70 });
    // avgGain 0.1, avgLoss 0.5 → rsi 16.67
    const sig = evaluateSignal(s, priceSeries([10, 10.2, 9.2]));
    expect(sig.direction).toBe('long');
    expect(sig.confidence).toBeCloseTo(0.9444, 3);
  });

  it('goes short when overbought', () => {
    const s = createStrategy('rsi-reversal', { period: 3, oversold: 30, overbought: 70 });
    const sig = evaluateSignal(s, priceSeries([1, 2, 3, 4, 5]));
    expect(sig.direction).toBe('short');
    expect(sig.confidence).toBe(0.95);
  });
});

describe('momentum', () => {
  const s = createStrategy('momentum', { lookback: 2, thresholdPct: 1, minVolumeRatio: 1 });

  function window(closes: number[], volumes: number[]) {
    return closes.map((c, i) => bar(T0 + i * STEP_5M, c, c, c, c, volumes[i]));
  }

  it('follows a confirmed move', () => {
    const sig = evaluateSignal(s, window([100, 100, 102], [100, 100, 200]));
    expect(sig.direction).toBe('long');
    expect(sig.confidence).toBeCloseTo(0.7, 10);
  });

  it('needs volume confirmation', () => {
    const sig = evaluateSignal(s, window([100, 100, 102], [100, 100, 50]));
    expect(sig.direction).toBe('flat');
  });

  it('ignores moves within the threshold', () => {
    expect(evaluateSignal(s, window([100, 100, 100.5], [100, 100, 200])).direction).toBe('flat');
  });

  it('goes short on a confirmed drop', () => {
    expect(evaluateSignal(s, window([100, 100, 97], [100, 100, 100])).direction).toBe('short');
  });
});
