import { computeRsi } from '../../analysis/indicators';
import { closeSeries } from '../../data/samples';
import type { FamilyDefinition } from '../types';

const MAX_CONFIDENCE = 0.95;

export const rsiReversal: FamilyDefinition = {
  family: 'rsi-reversal',
  description: 'Long when RSI is oversold, short when overbought',
  defaults: { period: 14, oversold: 30, overbought: 70 },
  paramSpace: {
    period: { min: 2, max: 50, step: 1, grid: [7, 14, 21] },
    oversold: { min: 5, max: 45, step: 1, grid: [20, 25, 30] },
    overbought: { min: 55, max: 95, step: 1, grid: [70, 75, 80] },
  },
  requiredHistory: p => p.period + 1,
  checkParams: p => (p.oversold < p.overbought ? null : 'oversold must be below overbought'),
  evaluate(window, p) {
    const rsi = computeRsi(closeSeries(window), p.period);
    if (rsi === null) return { direction: 'flat', confidence: 0, reason: 'rsi unavailable' };

    if (rsi < p.oversold) {
      return {
        direction: 'long',
        confidence: Math.min(MAX_CONFIDENCE, 0.5 + (p.oversold - rsi) / p.oversold),
        reason: `rsi ${rsi.toFixed(1)} < ${p.oversold}`,
      };
    }
    if (rsi > p.overbought) {
      return {
        direction: 'short',
        confidence: Math.min(MAX_CONFIDENCE, 0.5 + (rsi - p.overbought) / (100 - p.overbought)),
        reason: `rsi ${rsi.toFixed(1)} > ${p.overbought}`,
      };
    }
    return { direction: 'flat', confidence: 0, reason: `rsi ${rsi.toFixed(1)} neutral` };
  },
};
