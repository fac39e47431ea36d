import { ConfigError } from '../utils/errors';
import { getFamily, validateParams } from './templates/catalog';
import type { Strategy, StrategyFamily, StrategyParams } from './types';

/** `family(k1=v1,k2=v2)@vN` with keys sorted, so equal knobs give equal ids. */
export function strategyId(family: StrategyFamily, params: StrategyParams, version: number): string {
  const knobs = Object.keys(params)
    .sort()
    .map(k => `${k}=${params[k]}`)
    .join(',');
  return `${family}(${knobs})@v${version}`;
}

/**
 * Build an immutable Strategy. Missing params fall back to the family defaults.
 * Throws ConfigError when the resulting parameter set is invalid.
 */
export function createStrategy(
  family: StrategyFamily,
  params: Readonly<Record<string, number>> = {},
  version = 1,
): Strategy {
  const merged: Record<string, number> = { ...getFamily(family).defaults, ...params };
  const problem = validateParams(family, merged);
  if (problem) throw new ConfigError(problem);
  if (!Number.isInteger(version) || version < 1) {
    throw new ConfigError(`Strategy version must be a positive integer, got ${version}`);
  }

  const frozenParams = Object.freeze(merged);
  return Object.freeze({
    id: strategyId(family, frozenParams, version),
    family,
    params: frozenParams,
    version,
  });
}

/** Same as createStrategy but returns null instead of throwing. Used for generated candidates. */
export function tryCreateStrategy(
  family: StrategyFamily,
  params: Readonly<Record<string, number>>,
  version = 1,
): Strategy | null {
  const merged: Record<string, number> = { ...getFamily(family).defaults, ...params };
  if (validateParams(family, merged) !== null) return null;
  return createStrategy(family, merged, version);
}
