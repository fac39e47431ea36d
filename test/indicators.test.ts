import { describe, it, expect } from 'vitest';
import {
  computeSma,
  computeRsi,
  computeBands,
  computeAtr,
  lastValue,
} from '../src/analysis';

describe('computeSma', () => {
  it('pads the SMA warm-up with NaN', () => {
    const sma = computeSma([1, 2, 3, 4, 5], 3);
    expect(sma.slice(0, 2).every(Number.isNaN)).toBe(true);
    expect(sma.slice(2)).toEqual([2, 3, 4]);
  });

  it('returns all NaN when the series is shorter than the period', () => {
    expect(computeSma([1, 2], 3).every(Number.isNaN)).toBe(true);
  });
});

describe('computeRsi', () => {
  it('returns null without period + 1 values', () => {
    expect(computeRsi([1, 2, 3], 3)).toBeNull();
  });

  it('is 100 for a strictly rising series', () => {
    expect(computeRsi([1, 2, 3, 4, 5], 3)).toBe(100);
  });

  it('is 0 for a strictly falling series', () => {
    expect(computeRsi([5, 4, 3, 2, 1], 3)).toBe(0);
  });

  it('is 50 for a flat series', () => {
    expect(computeRsi([3, 3, 3, 3], 3)).toBe(50);
  });

  it('balances equal gains and losses at 50', () => {
    // gains 2, losses 2 over period 2
    expect(computeRsi([10, 12, 10], 2)).toBe(50);
  });
});

describe('computeBands', () => {
  it('uses the population standard deviation of the trailing window', () => {
    const bands = computeBands([100, 2, 4, 4, 4, 5, 5, 7, 9], 8, 2);
    // window [2,4,4,4,5,5,7,9]: mean 5, std 2
    expect(bands).toEqual({ upper: 9, middle: 5, lower: 1 });
  });

  it('returns null for a short series', () => {
    expect(computeBands([1, 2], 3, 2)).toBeNull();
  });
});

describe('computeAtr', () => {
  it('averages true ranges over the first period then smooths', () => {
    const highs = [11, 12, 13];
    const lows = [9, 10, 11];
    const closes = [10, 11, 12];
    const atr = computeAtr(highs, lows, closes, 2);
    // tr = [2, max(2, 2, 0)=2, max(2, 2, 0)=2]
    expect(Number.isNaN(atr[0])).toBe(true);
    expect(atr[1]).toBe(2);
    expect(atr[2]).toBe(2);
  });

  it('includes gaps from the previous close', () => {
    const atr = computeAtr([10, 20], [9, 19], [10, 20], 1);
    // second bar: max(1, |20-10|, |19-10|) = 10
    expect(atr[1]).toBe(10);
  });
});

describe('lastValue', () => {
  it('returns the last finite value or null', () => {
    expect(lastValue([1, 2, 3])).toBe(3);
    expect(lastValue([1, NaN])).toBeNull();
    expect(lastValue([])).toBeNull();
  });
});
