export const TIMEFRAMES = ['5m', '15m', '1h', '4h', '1d'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000,
  '1d': 24 * 60 * 60_000,
};

export function isTimeframe(value: string): value is Timeframe {
  return TIMEFRAMES.some(t => t === value);
}

export interface PriceSample {
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly timeframe: Timeframe;
}

/**
 * Source of market data. `nextSample` returns null when nothing new has
 * arrived since the last call; transport failures surface as thrown errors.
 */
export interface MarketDataFeed {
  nextSample(timeframe: Timeframe): PriceSample | null;
  historicalRange(timeframe: Timeframe, start: number, end: number): PriceSample[];
}
