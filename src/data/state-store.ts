import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { RISK_PROFILE_NAMES, type PortfolioState, type RiskProfileName } from '../execution/types';
import { STRATEGY_FAMILIES, type Strategy } from '../strategy/types';
import { tryCreateStrategy } from '../strategy/strategy';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const log = createLogger('state-store');

export const STATE_VERSION = 1;

const direction = z.enum(['long', 'short']);

const positionSchema = z.object({
  direction,
  sizeFraction: z.number(),
  notional: z.number().positive(),
  quantity: z.number().positive(),
  entryPrice: z.number().positive(),
  stopLossPrice: z.number(),
  takeProfitPrice: z.number(),
  openedAt: z.number(),
  strategyId: z.string(),
  entryFee: z.number().min(0),
  lastPrice: z.number(),
  unrealizedPnl: z.number(),
});

const tradeSchema = z.object({
  strategyId: z.string(),
  direction,
  entryPrice: z.number(),
  exitPrice: z.number(),
  quantity: z.number(),
  notional: z.number(),
  entryTime: z.number(),
  exitTime: z.number(),
  durationMs: z.number(),
  realizedPnl: z.number(),
  pnlPct: z.number(),
  fees: z.number(),
  exitReason: z.enum(['stop-loss', 'take-profit', 'signal-reversal', 'manual', 'end-of-data']),
});

const strategyRefSchema = z.object({
  family: z.enum(STRATEGY_FAMILIES),
  params: z.record(z.string(), z.number()),
  version: z.number().int().positive(),
});

const stateSchema = z.object({
  version: z.literal(STATE_VERSION),
  savedAt: z.number(),
  riskProfile: z.enum(RISK_PROFILE_NAMES),
  activeStrategy: strategyRefSchema.nullable(),
  activeScore: z.number(),
  portfolio: z.object({
    cash: z.number(),
    startingBalance: z.number().positive(),
    openPosition: positionSchema.nullable(),
    trades: z.array(tradeSchema),
    equityCurve: z.array(z.object({ timestamp: z.number(), equity: z.number() })),
  }),
});

export interface EngineState {
  savedAt: number;
  riskProfile: RiskProfileName;
  activeStrategy: Strategy | null;
  activeScore: number;
  portfolio: PortfolioState;
}

/** JSON snapshot of the live engine: portfolio, active strategy and risk profile. */
export class StateStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /** Write atomically via a temp file and rename. */
  save(state: EngineState) {
    const body = {
      version: STATE_VERSION,
      savedAt: state.savedAt,
      riskProfile: state.riskProfile,
      activeStrategy: state.activeStrategy
        ? { family: state.activeStrategy.family, params: { ...state.activeStrategy.params }, version: state.activeStrategy.version }
        : null,
      activeScore: state.activeScore,
      portfolio: state.portfolio,
    };
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(body, null, 2));
    fs.renameSync(tmp, this.filePath);
  }

  /**
   * Read the saved state. Returns null when there is none, or when the file is
   * unreadable or fails validation (logged; the engine then starts fresh).
   */
  load(): EngineState | null {
    if (!fs.existsSync(this.filePath)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      log.error('State file unreadable, starting fresh', { path: this.filePath, error: errorMessage(err) });
      return null;
    }

    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      log.error('State file failed validation, starting fresh', {
        path: this.filePath,
        issues: parsed.error.issues.slice(0, 5).map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }

    const data = parsed.data;
    let activeStrategy: Strategy | null = null;
    if (data.activeStrategy) {
      activeStrategy = tryCreateStrategy(data.activeStrategy.family, data.activeStrategy.params, data.activeStrategy.version);
      if (!activeStrategy) {
        log.warn('Saved strategy no longer valid, dropping it', { family: data.activeStrategy.family });
      }
    }

    return {
      savedAt: data.savedAt,
      riskProfile: data.riskProfile,
      activeStrategy,
      activeScore: activeStrategy ? data.activeScore : 0,
      portfolio: data.portfolio,
    };
  }
}
