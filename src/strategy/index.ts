export { createStrategy, tryCreateStrategy, strategyId } from './strategy';
export { evaluateSignal, requiredHistory } from './evaluator';
export { getFamily, listFamilies, isStrategyFamily, validateParams } from './templates/catalog';
export { STRATEGY_FAMILIES } from './types';
export type {
  Direction,
  SignalDirection,
  StrategyFamily,
  StrategyParams,
  Strategy,
  Signal,
  FamilyDefinition,
  ParamSpec,
} from './types';
