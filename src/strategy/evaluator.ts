import type { PriceSample } from '../data/types';
import { getFamily } from './templates/catalog';
import type { Signal, Strategy } from './types';

export function requiredHistory(strategy: Strategy): number {
  return getFamily(strategy.family).requiredHistory(strategy.params);
}

/**
 * Evaluate a strategy against an ordered window of samples (oldest first).
 * Pure: no hidden state, so identical inputs give identical Signals.
 * Too little history yields flat with confidence 0.
 */
export function evaluateSignal(strategy: Strategy, window: readonly PriceSample[]): Signal {
  const last = window[window.length - 1];
  const timestamp = last ? last.timestamp : 0;
  const needed = requiredHistory(strategy);

  if (window.length < needed) {
    return Object.freeze({
      direction: 'flat',
      confidence: 0,
      strategyId: strategy.id,
      timestamp,
      reason: `insufficient history (${window.length}/${needed})`,
    });
  }

  const result = getFamily(strategy.family).evaluate(window, strategy.params);
  const flat = result.direction === 'flat' || !Number.isFinite(result.confidence) || result.confidence <= 0;

  return Object.freeze({
    direction: flat ? 'flat' : result.direction,
    confidence: flat ? 0 : Math.min(1, result.confidence),
    strategyId: strategy.id,
    timestamp,
    reason: result.reason,
  });
}
