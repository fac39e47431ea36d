export { BufferedFeed } from './feed';
export { ReplaySource } from './replay';
export { loadSamples, parseCsvRow } from './data-loader';
export { DecisionJournal } from './data-logger';
export { StateStore } from './state-store';
export {
  createSample,
  sampleAtPrice,
  isValidSample,
  closeSeries,
  aggregateSamples,
} from './samples';
export { TIMEFRAMES, TIMEFRAME_MS, isTimeframe } from './types';
export type { PriceSample, Timeframe, MarketDataFeed } from './types';
export type { EngineState } from './state-store';
export type { PromotionLogEntry } from './data-logger';
