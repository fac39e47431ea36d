export { PaperTradingEngine } from './paper-engine';
export { DecisionLoop } from './decision-loop';
export { ActiveStrategySlot } from './active-strategy';
export type { EngineStatus, PaperEngineOptions, OptimizerSettings } from './paper-engine';
export type { TickOutcome, DecisionLoopHooks } from './decision-loop';
export type { ActiveEntry, SwapResult } from './active-strategy';
