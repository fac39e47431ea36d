import { tryCreateStrategy } from '../strategy/strategy';
import { getFamily, listFamilies } from '../strategy/templates/catalog';
import type { ParamSpec, Strategy } from '../strategy/types';
import type { CycleKind } from './types';

export type Rng = () => number;

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function createRng(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Cartesian product of per-key value lists, last key varying fastest. */
export function expandGrid(paramGrid: Record<string, readonly number[]>): Record<string, number>[] {
  const keys = Object.keys(paramGrid);
  if (keys.length === 0) return [{}];
  if (keys.some(k => paramGrid[k].length === 0)) return [];

  const combos: Record<string, number>[] = [];
  const values = keys.map(k => paramGrid[k]);
  const indices: number[] = new Array(keys.length).fill(0);

  while (true) {
    const combo: Record<string, number> = {};
    for (let k = 0; k < keys.length; k++) {
      combo[keys[k]] = values[k][indices[k]];
    }
    combos.push(combo);

    let carry = keys.length - 1;
    while (carry >= 0) {
      indices[carry]++;
      if (indices[carry] < values[carry].length) break;
      indices[carry] = 0;
      carry--;
    }
    if (carry < 0) break;
  }

  return combos;
}

function decimals(step: number): number {
  const text = String(step);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/** Snap to the parameter's step grid and clamp into range. */
export function snapToSpec(value: number, spec: ParamSpec): number {
  const steps = Math.round((value - spec.min) / spec.step);
  const snapped = Number((spec.min + steps * spec.step).toFixed(decimals(spec.step)));
  return Math.min(spec.max, Math.max(spec.min, snapped));
}

/** Every valid strategy on a family's discovery grid. */
export function gridStrategies(family: Strategy['family']): Strategy[] {
  const def = getFamily(family);
  const grid: Record<string, readonly number[]> = {};
  for (const [key, spec] of Object.entries(def.paramSpace)) grid[key] = spec.grid;

  const out: Strategy[] = [];
  for (const params of expandGrid(grid)) {
    const s = tryCreateStrategy(family, params);
    if (s) out.push(s);
  }
  return out;
}

/**
 * `count` neighbours of `base`: each knob moves by up to two steps, at least
 * one knob moves, and invalid or duplicate results are dropped. Deterministic
 * for a given rng state.
 */
export function perturb(base: Strategy, rng: Rng, count: number): Strategy[] {
  const space = getFamily(base.family).paramSpace;
  const keys = Object.keys(space);
  const seen = new Set<string>([base.id]);
  const out: Strategy[] = [];
  const maxAttempts = count * 5;

  for (let attempt = 0; attempt < maxAttempts && out.length < count; attempt++) {
    const params: Record<string, number> = { ...base.params };
    const forced = keys[Math.floor(rng() * keys.length)];
    for (const key of keys) {
      if (key !== forced && rng() < 0.5) continue;
      const spec = space[key];
      let shift = Math.floor(rng() * 5) - 2;
      if (shift === 0) shift = rng() < 0.5 ? -1 : 1;
      params[key] = snapToSpec(base.params[key] + shift * spec.step, spec);
    }
    const s = tryCreateStrategy(base.family, params, base.version);
    if (s && !seen.has(s.id)) {
      seen.add(s.id);
      out.push(s);
    }
  }
  return out;
}

export interface PopulationInput {
  kind: CycleKind;
  active: Strategy | null;
  winners: readonly Strategy[];
  rng: Rng;
  perturbationsPerStrategy: number;
}

/**
 * Candidates for one cycle, deduplicated by id in discovery order: the active
 * strategy, then current winners, then their perturbations. Discovery cycles
 * append every family's grid.
 */
export function buildPopulation(input: PopulationInput): Strategy[] {
  const byId = new Map<string, Strategy>();
  const add = (s: Strategy) => {
    if (!byId.has(s.id)) byId.set(s.id, s);
  };

  const seeds: Strategy[] = [];
  if (input.active) seeds.push(input.active);
  seeds.push(...input.winners);
  seeds.forEach(add);

  for (const s of seeds) {
    perturb(s, input.rng, input.perturbationsPerStrategy).forEach(add);
  }

  if (input.kind === 'discover' || byId.size === 0) {
    for (const def of listFamilies()) gridStrategies(def.family).forEach(add);
  }

  return [...byId.values()];
}
