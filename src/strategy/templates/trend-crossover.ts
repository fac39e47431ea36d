import { computeSma, lastValue } from '../../analysis/indicators';
import { closeSeries } from '../../data/samples';
import type { FamilyDefinition } from '../types';

const MAX_CONFIDENCE = 0.95;

/**
 * Fast/slow SMA crossover. A cross only counts once the fast average clears
 * the slow one scaled by the cross threshold, which filters out chop around
 * the slow line.
 */
export const trendCrossover: FamilyDefinition = {
  family: 'trend-crossover',
  description: 'Long on bullish fast/slow SMA cross, short on bearish cross',
  defaults: { fastWindow: 5, slowWindow: 20, crossoverThreshold: 1.01, crossunderThreshold: 0.99 },
  paramSpace: {
    fastWindow: { min: 2, max: 50, step: 1, grid: [5, 8, 12] },
    slowWindow: { min: 5, max: 200, step: 1, grid: [20, 30, 50] },
    crossoverThreshold: { min: 1, max: 1.05, step: 0.0025, grid: [1.0, 1.005, 1.01] },
    crossunderThreshold: { min: 0.95, max: 1, step: 0.0025, grid: [0.99, 0.995, 1.0] },
  },
  requiredHistory: p => p.slowWindow + 1,
  checkParams: p => (p.fastWindow < p.slowWindow ? null : 'fastWindow must be below slowWindow'),
  evaluate(window, p) {
    const closes = closeSeries(window);
    const fast = lastValue(computeSma(closes, p.fastWindow));
    const slow = lastValue(computeSma(closes, p.slowWindow));
    const prevCloses = closes.slice(0, -1);
    const prevFast = lastValue(computeSma(prevCloses, p.fastWindow));
    const prevSlow = lastValue(computeSma(prevCloses, p.slowWindow));
    if (fast === null || slow === null || prevFast === null || prevSlow === null || slow <= 0) {
      return { direction: 'flat', confidence: 0, reason: 'averages unavailable' };
    }

    const momentumPct = ((fast - slow) / slow) * 100;
    const confidence = Math.min(MAX_CONFIDENCE, Math.abs(momentumPct) * 10);

    if (prevFast <= prevSlow * p.crossoverThreshold && fast > slow * p.crossoverThreshold) {
      return { direction: 'long', confidence, reason: `bullish cross fast ${fast.toFixed(4)} > slow ${slow.toFixed(4)}` };
    }
    if (prevFast >= prevSlow * p.crossunderThreshold && fast < slow * p.crossunderThreshold) {
      return { direction: 'short', confidence, reason: `bearish cross fast ${fast.toFixed(4)} < slow ${slow.toFixed(4)}` };
    }
    return { direction: 'flat', confidence: 0, reason: 'no cross' };
  },
};
