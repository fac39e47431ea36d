import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from './errors';
import { isTimeframe, Timeframe, TIMEFRAMES } from '../data/types';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalNumber(key: string, fallback: number, min = 0): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val) || val < min) {
    throw new ConfigError(`Env var ${key} must be a number >= ${min}, got "${raw}"`);
  }
  return val;
}

function optionalFraction(key: string, fallback: number): number {
  const val = optionalNumber(key, fallback);
  if (val > 1) {
    throw new ConfigError(`Env var ${key} must be within [0, 1], got ${val}`);
  }
  return val;
}

function optionalTimeframe(key: string, fallback: Timeframe): Timeframe {
  const raw = optional(key, fallback);
  if (!isTimeframe(raw)) {
    throw new ConfigError(`Env var ${key} must be one of ${TIMEFRAMES.join(', ')}, got "${raw}"`);
  }
  return raw;
}

export interface AppConfig {
  riskProfile: string;
  dataDir: string;
  riskProfilesPath: string;
  statePath: string;
  journalDir: string;
  trading: {
    timeframe: Timeframe;
    tickIntervalMs: number;
    initialFamily: string;
    /** Share of the loaded history preloaded as past; the rest is replayed one sample per tick */
    replayPreloadFraction: number;
  };
  optimizer: {
    optimizationIntervalMs: number;
    discoveryIntervalMs: number;
    promotionThreshold: number;
    winnersToKeep: number;
    perturbationsPerStrategy: number;
    seed: number;
    /** 0 replays the full history */
    maxSamples: number;
  };
  monitor: {
    divergenceAlertPct: number;
  };
}

export function loadAppConfig(): AppConfig {
  const dataDir = path.resolve(optional('DATA_DIR', path.resolve(__dirname, '../../data')));

  return {
    riskProfile: optional('RISK_PROFILE', 'default'),
    dataDir,
    statePath: path.resolve(optional('STATE_PATH', path.join(dataDir, 'paper-state.json'))),
    journalDir: path.resolve(optional('JOURNAL_DIR', path.join(dataDir, 'journal'))),
    riskProfilesPath: path.resolve(
      optional('RISK_PROFILES_PATH', path.resolve(__dirname, '../../config/risk-profiles.json'))
    ),
    trading: {
      timeframe: optionalTimeframe('TIMEFRAME', '5m'),
      tickIntervalMs: optionalNumber('TICK_INTERVAL_MS', 1_000, 1),
      initialFamily: optional('INITIAL_FAMILY', 'mean-reversion'),
      replayPreloadFraction: optionalFraction('REPLAY_PRELOAD_FRACTION', 0.7),
    },
    optimizer: {
      optimizationIntervalMs: optionalNumber('OPTIMIZATION_INTERVAL_MS', 10 * 60_000, 1),
      discoveryIntervalMs: optionalNumber('DISCOVERY_INTERVAL_MS', 30 * 60_000, 1),
      promotionThreshold: optionalFraction('PROMOTION_THRESHOLD', 0.75),
      winnersToKeep: optionalNumber('WINNERS_TO_KEEP', 10, 1),
      perturbationsPerStrategy: optionalNumber('PERTURBATIONS_PER_STRATEGY', 4),
      seed: optionalNumber('OPTIMIZER_SEED', 42),
      maxSamples: optionalNumber('OPTIMIZER_MAX_SAMPLES', 0),
    },
    monitor: {
      divergenceAlertPct: optionalNumber('DIVERGENCE_ALERT_PCT', 50),
    },
  };
}
