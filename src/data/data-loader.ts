import fs from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger';
import { createSample, isValidSample } from './samples';
import { PriceSample, Timeframe } from './types';

const log = createLogger('data-loader');

/**
 * Read every `<dataDir>/candles/<timeframe>/*.csv` file
 * (`timestamp,open,high,low,close,volume`, header row first), sorted by time.
 * Malformed rows and duplicate timestamps are skipped.
 */
export function loadSamples(dataDir: string, timeframe: Timeframe, fromMs?: number, toMs?: number): PriceSample[] {
  const dir = path.join(dataDir, 'candles', timeframe);
  if (!fs.existsSync(dir)) return [];

  const files = fs.readdirSync(dir)
    .filter(f => f.endsWith('.csv'))
    .sort();

  const byTimestamp = new Map<number, PriceSample>();
  let skipped = 0;
  for (const file of files) {
    const content = fs.readFileSync(path.join(dir, file), 'utf-8');
    const lines = content.split('\n');
    for (let i = 1; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      const sample = parseCsvRow(line, timeframe);
      if (!sample) {
        skipped++;
        continue;
      }
      if (fromMs !== undefined && sample.timestamp < fromMs) continue;
      if (toMs !== undefined && sample.timestamp > toMs) continue;
      byTimestamp.set(sample.timestamp, sample);
    }
  }

  if (skipped > 0) {
    log.warn('Skipped malformed candle rows', { timeframe, skipped });
  }

  return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
}

export function parseCsvRow(line: string, timeframe: Timeframe): PriceSample | null {
  const parts = line.split(',');
  if (parts.length < 6) return null;
  const [timestamp, open, high, low, close, volume] = parts.map(Number);
  const sample = createSample({ timestamp, open, high, low, close, volume }, timeframe);
  return isValidSample(sample) ? sample : null;
}
