/**
 * Strategy family catalog. Every call site goes through this table, so adding
 * a family means adding one entry here and nothing else.
 */

import { STRATEGY_FAMILIES, type FamilyDefinition, type StrategyFamily } from '../types';
import { meanReversion } from './mean-reversion';
import { momentum } from './momentum';
import { rsiReversal } from './rsi-reversal';
import { trendCrossover } from './trend-crossover';

const catalog: Record<StrategyFamily, FamilyDefinition> = {
  'mean-reversion': meanReversion,
  'trend-crossover': trendCrossover,
  'rsi-reversal': rsiReversal,
  'momentum': momentum,
};

export function getFamily(family: StrategyFamily): FamilyDefinition {
  return catalog[family];
}

export function listFamilies(): FamilyDefinition[] {
  return STRATEGY_FAMILIES.map(f => catalog[f]);
}

export function isStrategyFamily(value: string): value is StrategyFamily {
  return STRATEGY_FAMILIES.some(f => f === value);
}

/**
 * Check that params cover the family's space exactly, are finite and in range,
 * and satisfy the family's own constraints.
 * Returns null if valid, an error string if not.
 */
export function validateParams(family: StrategyFamily, params: Readonly<Record<string, number>>): string | null {
  const def = catalog[family];
  const known = Object.keys(def.paramSpace);

  const unknown = Object.keys(params).filter(k => !known.includes(k));
  if (unknown.length > 0) return `Unknown params for ${family}: ${unknown.join(', ')}`;

  const missing = known.filter(k => !(k in params) || !Number.isFinite(params[k]));
  if (missing.length > 0) return `Missing/invalid params for ${family}: ${missing.join(', ')}`;

  for (const key of known) {
    const spec = def.paramSpace[key];
    const value = params[key];
    if (value < spec.min || value > spec.max) {
      return `${family}.${key}=${value} outside [${spec.min}, ${spec.max}]`;
    }
  }

  return def.checkParams ? def.checkParams(params) : null;
}
