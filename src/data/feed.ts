import { createLogger } from '../utils/logger';
import { isValidSample } from './samples';
import { MarketDataFeed, PriceSample, Timeframe } from './types';

const log = createLogger('feed');

interface Series {
  samples: PriceSample[];
  cursor: number; // index of the next sample nextSample() will hand out
}

/**
 * In-memory feed holding one ordered series per timeframe. Producers `push`
 * samples as they arrive; the decision loop drains them with `nextSample`.
 */
export class BufferedFeed implements MarketDataFeed {
  private readonly series = new Map<Timeframe, Series>();

  constructor(initial: readonly PriceSample[] = []) {
    for (const s of initial) this.push(s);
  }

  private getSeries(timeframe: Timeframe): Series {
    let series = this.series.get(timeframe);
    if (!series) {
      series = { samples: [], cursor: 0 };
      this.series.set(timeframe, series);
    }
    return series;
  }

  /** Append a sample. Returns false (and drops it) when it is malformed or not newer than the last one. */
  push(sample: PriceSample): boolean {
    if (!isValidSample(sample)) {
      log.warn('Dropping malformed sample', { timeframe: sample.timeframe, timestamp: sample.timestamp });
      return false;
    }
    const series = this.getSeries(sample.timeframe);
    const last = series.samples[series.samples.length - 1];
    if (last && sample.timestamp <= last.timestamp) {
      log.debug('Dropping out-of-order sample', {
        timeframe: sample.timeframe,
        timestamp: sample.timestamp,
        last: last.timestamp,
      });
      return false;
    }
    series.samples.push(sample);
    return true;
  }

  /** Load history without handing it out through nextSample. */
  preload(samples: readonly PriceSample[]) {
    for (const s of samples) {
      if (this.push(s)) {
        const series = this.getSeries(s.timeframe);
        series.cursor = series.samples.length;
      }
    }
  }

  nextSample(timeframe: Timeframe): PriceSample | null {
    const series = this.series.get(timeframe);
    if (!series || series.cursor >= series.samples.length) return null;
    return series.samples[series.cursor++];
  }

  historicalRange(timeframe: Timeframe, start: number, end: number): PriceSample[] {
    const series = this.series.get(timeframe);
    if (!series) return [];
    return series.samples.filter(s => s.timestamp >= start && s.timestamp <= end);
  }

  /** Samples already handed out (or preloaded), newest last. */
  consumed(timeframe: Timeframe, limit?: number): PriceSample[] {
    const series = this.series.get(timeframe);
    if (!series) return [];
    const from = limit === undefined ? 0 : Math.max(0, series.cursor - limit);
    return series.samples.slice(from, series.cursor);
  }

  size(timeframe: Timeframe): number {
    return this.series.get(timeframe)?.samples.length ?? 0;
  }
}
