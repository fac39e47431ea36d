import { computeBands } from '../../analysis/indicators';
import { closeSeries } from '../../data/samples';
import type { FamilyDefinition } from '../types';

const MAX_CONFIDENCE = 0.95;

/** Fade moves outside a standard-deviation band around the rolling mean. */
export const meanReversion: FamilyDefinition = {
  family: 'mean-reversion',
  description: 'Long below the lower band, short above the upper band',
  defaults: { window: 10, stdMultiplier: 1.5 },
  paramSpace: {
    window: { min: 5, max: 100, step: 1, grid: [10, 20, 30] },
    stdMultiplier: { min: 0.5, max: 4, step: 0.25, grid: [1.5, 2, 2.5] },
  },
  requiredHistory: p => p.window,
  evaluate(window, p) {
    const closes = closeSeries(window);
    const bands = computeBands(closes, p.window, p.stdMultiplier);
    if (!bands) return { direction: 'flat', confidence: 0, reason: 'bands unavailable' };

    const close = closes[closes.length - 1];
    // Deviation beyond the band in percent of price
    if (close < bands.lower) {
      const deviationPct = ((bands.lower - close) / close) * 100;
      return {
        direction: 'long',
        confidence: Math.min(MAX_CONFIDENCE, deviationPct),
        reason: `close ${close} < lower band ${bands.lower.toFixed(4)}`,
      };
    }
    if (close > bands.upper) {
      const deviationPct = ((close - bands.upper) / close) * 100;
      return {
        direction: 'short',
        confidence: Math.min(MAX_CONFIDENCE, deviationPct),
        reason: `close ${close} > upper band ${bands.upper.toFixed(4)}`,
      };
    }
    return { direction: 'flat', confidence: 0, reason: 'inside bands' };
  },
};
