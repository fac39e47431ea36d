import fs from 'fs';
import path from 'path';
import type { DecisionResult } from '../execution/decision';
import type { Trade } from '../execution/types';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const log = createLogger('journal');

function dateStr(ts: number): string {
  return new Date(ts).toISOString().split('T')[0];
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export interface PromotionLogEntry {
  cycle: 'optimize' | 'discover';
  strategyId: string;
  score: number;
  previousStrategyId: string | null;
  previousScore: number;
}

/**
 * Append-only JSONL journal of live decisions, closed trades and promotions,
 * one file per UTC day under `<dir>/<kind>/`.
 * A failed write is logged and dropped; it never interrupts trading.
 */
export class DecisionJournal {
  constructor(private readonly dir: string) {}

  private append(subdir: string, ts: number, obj: Record<string, unknown>) {
    try {
      const dir = path.join(this.dir, subdir);
      ensureDir(dir);
      fs.appendFileSync(path.join(dir, `${dateStr(ts)}.jsonl`), JSON.stringify(obj) + '\n');
    } catch (err) {
      log.warn('Journal write failed', { subdir, error: errorMessage(err) });
    }
  }

  logDecision(result: DecisionResult) {
    const ts = result.sample.timestamp;
    this.append('decisions', ts, {
      ts,
      close: result.sample.close,
      strategyId: result.signal?.strategyId ?? null,
      direction: result.signal?.direction ?? null,
      confidence: result.signal?.confidence ?? null,
      reason: result.signal?.reason ?? null,
      entered: result.entry !== null,
      rejectReason: result.rejection?.reason ?? null,
      exitReason: result.exit?.exitReason ?? null,
      equity: result.equity,
    });
  }

  logTrade(trade: Trade) {
    this.append('trades', trade.exitTime, { ...trade });
  }

  logPromotion(entry: PromotionLogEntry, ts: number) {
    this.append('promotions', ts, { ts, ...entry });
  }

  /** Lines previously written for `kind` on the UTC day containing `ts`. */
  read(kind: 'decisions' | 'trades' | 'promotions', ts: number): unknown[] {
    const file = path.join(this.dir, kind, `${dateStr(ts)}.jsonl`);
    if (!fs.existsSync(file)) return [];
    return fs
      .readFileSync(file, 'utf-8')
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(line => JSON.parse(line));
  }
}
