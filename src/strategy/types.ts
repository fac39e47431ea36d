import type { PriceSample } from '../data/types';

export type Direction = 'long' | 'short';
export type SignalDirection = Direction | 'flat';

export const STRATEGY_FAMILIES = ['mean-reversion', 'trend-crossover', 'rsi-reversal', 'momentum'] as const;
export type StrategyFamily = (typeof STRATEGY_FAMILIES)[number];

export type StrategyParams = Readonly<Record<string, number>>;

/** Immutable. A different parameter set is a different Strategy with a different id. */
export interface Strategy {
  readonly id: string;
  readonly family: StrategyFamily;
  readonly params: StrategyParams;
  readonly version: number;
}

export interface Signal {
  readonly direction: SignalDirection;
  /** 0..1; always 0 for flat */
  readonly confidence: number;
  readonly strategyId: string;
  /** Timestamp of the newest sample the signal was derived from */
  readonly timestamp: number;
  readonly reason: string;
}

/** What a family evaluator returns before it is stamped with strategy id and timestamp. */
export interface Evaluation {
  direction: SignalDirection;
  confidence: number;
  reason: string;
}

export interface ParamSpec {
  min: number;
  max: number;
  /** Perturbation step; values are rounded to multiples of it */
  step: number;
  /** Values swept during discovery */
  grid: number[];
}

export interface FamilyDefinition {
  family: StrategyFamily;
  description: string;
  defaults: Record<string, number>;
  paramSpace: Record<string, ParamSpec>;
  /** Minimum number of samples in the window before `evaluate` can say anything */
  requiredHistory(params: StrategyParams): number;
  /** Cross-parameter constraints (e.g. fast < slow). Returns a reason when invalid. */
  checkParams?(params: StrategyParams): string | null;
  /** Pure: the same window and params always give the same Evaluation. */
  evaluate(window: readonly PriceSample[], params: StrategyParams): Evaluation;
}
