import { aggregateSamples } from '../data/samples';
import { loadSamples } from '../data/data-loader';
import { isTimeframe, TIMEFRAMES, type PriceSample, type Timeframe } from '../data/types';
import { getRiskProfile } from '../execution/risk-profiles';
import { createStrategy } from '../strategy/strategy';
import { isStrategyFamily, listFamilies } from '../strategy/templates/catalog';
import type { StrategyFamily } from '../strategy/types';
import { errorMessage, loadAppConfig } from '../utils';
import { runBacktest } from './engine';
import { gridStrategies } from './population';
import { printReport } from './report';
import { evaluateCandidate, rankResults } from './scheduler';
import type { OptimizationResult } from './types';

const USAGE = `Usage: npm run backtest -- [family|all] [timeframe] [--profile NAME] [--from YYYY-MM-DD] [--to YYYY-MM-DD] [--source TF] [--grid]`;

function parseDate(raw: string, flag: string): number {
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) {
    console.error(`Invalid ${flag} date: ${raw}`);
    process.exit(1);
  }
  return ms;
}

function main() {
  const rawArgs = process.argv.slice(2);
  const config = loadAppConfig();

  let profileName = config.riskProfile;
  let fromMs: number | undefined;
  let toMs: number | undefined;
  let sourceTf: string | undefined;
  let grid = false;
  const positional: string[] = [];

  for (let i = 0; i < rawArgs.length; i++) {
    if (rawArgs[i] === '--profile' && rawArgs[i + 1]) { profileName = rawArgs[++i]; }
    else if (rawArgs[i] === '--from' && rawArgs[i + 1]) { fromMs = parseDate(rawArgs[++i], '--from'); }
    else if (rawArgs[i] === '--to' && rawArgs[i + 1]) { toMs = parseDate(rawArgs[++i], '--to'); }
    else if (rawArgs[i] === '--source' && rawArgs[i + 1]) { sourceTf = rawArgs[++i]; }
    else if (rawArgs[i] === '--grid') { grid = true; }
    else if (rawArgs[i] === '--help') { console.log(USAGE); return; }
    else { positional.push(rawArgs[i]); }
  }

  const familyArg = positional[0] ?? 'all';
  const families: StrategyFamily[] = [];
  if (familyArg === 'all') {
    families.push(...listFamilies().map(f => f.family));
  } else if (isStrategyFamily(familyArg)) {
    families.push(familyArg);
  } else {
    console.error(`Unknown strategy family: ${familyArg}`);
    console.error(`Available: ${listFamilies().map(f => f.family).join(', ')}`);
    process.exit(1);
  }

  const tfArg = positional[1] ?? config.trading.timeframe;
  if (!isTimeframe(tfArg) || (sourceTf !== undefined && !isTimeframe(sourceTf))) {
    console.error(`Timeframes must be one of ${TIMEFRAMES.join(', ')}`);
    process.exit(1);
  }
  const timeframe: Timeframe = tfArg;

  const profile = getRiskProfile(profileName, config.riskProfilesPath);

  let samples: PriceSample[];
  if (sourceTf !== undefined && isTimeframe(sourceTf) && sourceTf !== timeframe) {
    samples = aggregateSamples(loadSamples(config.dataDir, sourceTf, fromMs, toMs), timeframe);
  } else {
    samples = loadSamples(config.dataDir, timeframe, fromMs, toMs);
  }
  if (samples.length === 0) {
    console.error(`No ${timeframe} candle data under ${config.dataDir}/candles`);
    process.exit(1);
  }

  console.log(`Risk profile: ${profile.name} (balance ${profile.startingBalance}, fee ${profile.policy.feePct}%/side)`);
  console.log(`Running ${families.length} family(s) on ${samples.length} ${timeframe} samples${grid ? ' (full grid)' : ''}\n`);

  if (!grid) {
    for (const family of families) {
      const strategy = createStrategy(family);
      try {
        printReport(runBacktest(samples, strategy, profile.policy, { startingBalance: profile.startingBalance }));
      } catch (err) {
        console.error(`[WARN] ${strategy.id}: ${errorMessage(err)}`);
      }
    }
    return;
  }

  const results: OptimizationResult[] = [];
  let index = 0;
  for (const family of families) {
    for (const strategy of gridStrategies(family)) {
      try {
        results.push(evaluateCandidate(strategy, samples, profile.policy, profile.startingBalance, index));
      } catch (err) {
        console.error(`[WARN] ${strategy.id}: ${errorMessage(err)}`);
      }
      index++;
    }
  }

  const top = rankResults(results, config.optimizer.winnersToKeep);
  console.log('='.repeat(96));
  console.log(
    'Strategy'.padEnd(62) +
    'Score'.padStart(7) +
    'Trades'.padStart(7) +
    'Win%'.padStart(7) +
    'Ret%'.padStart(7) +
    'DD%'.padStart(6)
  );
  console.log('-'.repeat(96));
  for (const r of top) {
    console.log(
      r.strategy.id.padEnd(62) +
      r.score.toFixed(3).padStart(7) +
      String(r.metrics.totalTrades).padStart(7) +
      (r.metrics.winRate * 100).toFixed(1).padStart(7) +
      r.metrics.totalReturnPct.toFixed(2).padStart(7) +
      r.metrics.maxDrawdownPct.toFixed(1).padStart(6)
    );
  }
  console.log('='.repeat(96));

  const best = top[0];
  if (best) {
    console.log(`\nBest: ${best.strategy.id} (score ${best.score.toFixed(3)})`);
  }
}

main();
