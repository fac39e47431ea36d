import { PriceSample, Timeframe, TIMEFRAME_MS } from './types';

export function createSample(fields: Omit<PriceSample, 'timeframe'>, timeframe: Timeframe): PriceSample {
  return Object.freeze({ ...fields, timeframe });
}

/** Sample whose OHLC all equal one price — for tick-style feeds. */
export function sampleAtPrice(timestamp: number, price: number, timeframe: Timeframe, volume = 0): PriceSample {
  return createSample({ timestamp, open: price, high: price, low: price, close: price, volume }, timeframe);
}

export function isValidSample(s: PriceSample): boolean {
  return (
    Number.isFinite(s.timestamp) &&
    [s.open, s.high, s.low, s.close].every(v => Number.isFinite(v) && v > 0) &&
    s.high >= s.low &&
    Number.isFinite(s.volume) && s.volume >= 0
  );
}

export function closeSeries(samples: readonly PriceSample[]): number[] {
  return samples.map(s => s.close);
}

export function highSeries(samples: readonly PriceSample[]): number[] {
  return samples.map(s => s.high);
}

export function lowSeries(samples: readonly PriceSample[]): number[] {
  return samples.map(s => s.low);
}

/** Aggregate samples into a higher timeframe. Buckets align to epoch multiples of the target interval. */
export function aggregateSamples(samples: readonly PriceSample[], target: Timeframe): PriceSample[] {
  if (samples.length === 0) return [];

  const intervalMs = TIMEFRAME_MS[target];
  const result: PriceSample[] = [];
  let bucketStart = Math.floor(samples[0].timestamp / intervalMs) * intervalMs;
  let open = samples[0].open;
  let high = samples[0].high;
  let low = samples[0].low;
  let close = samples[0].close;
  let volume = samples[0].volume;

  for (let i = 1; i < samples.length; i++) {
    const s = samples[i];
    const bucket = Math.floor(s.timestamp / intervalMs) * intervalMs;

    if (bucket !== bucketStart) {
      result.push(createSample({ timestamp: bucketStart, open, high, low, close, volume }, target));
      bucketStart = bucket;
      open = s.open;
      high = s.high;
      low = s.low;
      close = s.close;
      volume = s.volume;
    } else {
      if (s.high > high) high = s.high;
      if (s.low < low) low = s.low;
      close = s.close;
      volume += s.volume;
    }
  }

  result.push(createSample({ timestamp: bucketStart, open, high, low, close, volume }, target));
  return result;
}
