import { afterEach, describe, expect, it, vi } from 'vitest';
import path from 'path';
import { createLogger, setLogLevel } from '../src/utils/logger';
import { loadAppConfig } from '../src/utils/config';
import { ConfigError } from '../src/utils/errors';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  setLogLevel('ERROR');
});

describe('loadAppConfig', () => {
  it('derives state and journal paths from the data directory', () => {
    vi.stubEnv('DATA_DIR', '/tmp/paper-data');
    vi.stubEnv('STATE_PATH', '');
    vi.stubEnv('JOURNAL_DIR', '');
    const config = loadAppConfig();
    expect(config.dataDir).toBe(path.resolve('/tmp/paper-data'));
    expect(config.statePath).toBe(path.resolve('/tmp/paper-data/paper-state.json'));
    expect(config.journalDir).toBe(path.resolve('/tmp/paper-data/journal'));
  });

  it('reads numeric settings', () => {
    vi.stubEnv('TIMEFRAME', '1h');
    vi.stubEnv('PROMOTION_THRESHOLD', '0.6');
    vi.stubEnv('WINNERS_TO_KEEP', '3');
    vi.stubEnv('OPTIMIZER_MAX_SAMPLES', '2000');
    const config = loadAppConfig();
    expect(config.trading.timeframe).toBe('1h');
    expect(config.optimizer.promotionThreshold).toBe(0.6);
    expect(config.optimizer.winnersToKeep).toBe(3);
    expect(config.optimizer.maxSamples).toBe(2000);
  });

  it('replays the full history by default', () => {
    vi.stubEnv('OPTIMIZER_MAX_SAMPLES', '');
    expect(loadAppConfig().optimizer.maxSamples).toBe(0);
  });

  it('throws ConfigError on invalid values', () => {
    vi.stubEnv('TIMEFRAME', '2h');
    expect(() => loadAppConfig()).toThrow(ConfigError);
    vi.stubEnv('TIMEFRAME', '5m');

    vi.stubEnv('PROMOTION_THRESHOLD', '1.5');
    expect(() => loadAppConfig()).toThrow(ConfigError);
    vi.stubEnv('PROMOTION_THRESHOLD', '0.75');

    vi.stubEnv('TICK_INTERVAL_MS', 'soon');
    expect(() => loadAppConfig()).toThrow('TICK_INTERVAL_MS');
  });
});

describe('createLogger', () => {
  it('writes one JSON line per entry at or above the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('WARN');
    const log = createLogger('test');

    log.info('hidden');
    log.warn('shown', { error: new Error('boom'), n: 1 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'WARN',
      module: 'test',
      msg: 'shown',
      data: { error: { name: 'Error', message: 'boom' }, n: 1 },
    });
  });
});
