import { BufferedFeed, DecisionJournal, loadSamples, ReplaySource, StateStore } from './data';
import { PaperTradingEngine } from './engine';
import { getRiskProfile } from './execution';
import { createStrategy, isStrategyFamily } from './strategy';
import { ConfigError, createLogger, errorMessage, loadAppConfig } from './utils';

const log = createLogger('main');

const STATUS_INTERVAL_MS = 5 * 60_000;

async function main() {
  const config = loadAppConfig();
  const profile = getRiskProfile(config.riskProfile, config.riskProfilesPath);
  if (!isStrategyFamily(config.trading.initialFamily)) {
    throw new ConfigError(`Unknown strategy family "${config.trading.initialFamily}"`);
  }
  const initialStrategy = createStrategy(config.trading.initialFamily);

  const { timeframe, tickIntervalMs } = config.trading;
  const history = loadSamples(config.dataDir, timeframe);
  const split = Math.floor(history.length * config.trading.replayPreloadFraction);

  const feed = new BufferedFeed();
  feed.preload(history.slice(0, split));
  const replay = new ReplaySource(feed, history.slice(split), tickIntervalMs);

  log.info('Market data loaded', {
    timeframe,
    preloaded: split,
    toReplay: replay.remaining,
    dataDir: config.dataDir,
  });
  if (history.length === 0) {
    log.warn('No candle history found; the loop will idle until samples arrive', { dataDir: config.dataDir });
  }

  const engine = new PaperTradingEngine({
    feed,
    timeframe,
    tickIntervalMs,
    riskProfile: profile,
    optimizer: config.optimizer,
    divergenceAlertPct: config.monitor.divergenceAlertPct,
    initialStrategy,
    stateStore: new StateStore(config.statePath),
    journal: new DecisionJournal(config.journalDir),
    resolveProfile: name => getRiskProfile(name, config.riskProfilesPath),
  });

  replay.start();
  engine.start();

  // Seed the winners set right away instead of waiting a full discovery period
  try {
    await engine.scheduler.runCycle('discover');
  } catch (err) {
    log.error('Initial discovery cycle failed', { error: errorMessage(err) });
  }

  const statusTimer = setInterval(() => {
    const s = engine.status();
    log.info('Status', {
      activeStrategyId: s.activeStrategyId,
      activeScore: s.activeScore.toFixed(3),
      equity: s.portfolio.equity.toFixed(2),
      trades: s.portfolio.tradeCount,
      winRate: s.portfolio.tradeCount > 0 ? (s.portfolio.winRate * 100).toFixed(1) + '%' : 'N/A',
      returnPct: s.portfolio.totalReturnPct.toFixed(2),
      confidence: s.divergence?.confidence ?? 'N/A',
      uptimeMin: Math.round(s.uptimeMs / 60_000),
    });
  }, STATUS_INTERVAL_MS);

  const shutdown = async () => {
    log.info('Shutting down...');
    clearInterval(statusTimer);
    replay.stop();
    await engine.stop();
    log.info('Goodbye');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.error('Shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  log.info('Paper trader is running. Press Ctrl+C to stop.', { riskProfile: profile.name });
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    log.error('Configuration error', { error: err.message });
  } else {
    log.error('Fatal error', err);
  }
  process.exit(1);
});
