import type { PriceSample } from '../data/types';
import { evaluateSignal, requiredHistory } from '../strategy/evaluator';
import type { Signal, Strategy } from '../strategy/types';
import { createLogger } from '../utils/logger';
import type { PortfolioLedger } from './ledger';
import { sizeOrder } from './risk';
import type { Position, Rejection, RiskPolicy, Trade } from './types';

const log = createLogger('decision');

/** Extra samples kept beyond what the strategy strictly needs. */
export const WINDOW_SLACK = 5;

/**
 * Number of trailing samples handed to the evaluator. Live and replay both
 * size their windows with this, so they see identical inputs.
 */
export function lookbackFor(strategy: Strategy, policy: RiskPolicy): number {
  const atrNeed = policy.stopMode === 'atr' ? policy.atrPeriod + 1 : 0;
  return Math.max(requiredHistory(strategy), atrNeed) + WINDOW_SLACK;
}

export interface DecisionInput {
  ledger: PortfolioLedger;
  strategy: Strategy | null;
  policy: RiskPolicy;
  sample: PriceSample;
  /** Trailing samples ending with `sample`, oldest first */
  window: readonly PriceSample[];
}

export interface DecisionResult {
  sample: PriceSample;
  /** Position closed on this step, by stop, take-profit or reversal */
  exit: Trade | null;
  signal: Signal | null;
  entry: Position | null;
  rejection: Rejection | null;
  equity: number;
}

/**
 * One step of the trading pipeline: exits first, then mark to market, then
 * evaluate, size and apply. Shared by the live loop and backtest replay.
 */
export function runDecisionStep(input: DecisionInput): DecisionResult {
  const { ledger, strategy, policy, sample, window } = input;

  let exit = ledger.checkExits(sample);
  let equity = ledger.markToMarket(sample.close, sample.timestamp);

  if (!strategy) {
    return { sample, exit, signal: null, entry: null, rejection: null, equity };
  }

  const signal = evaluateSignal(strategy, window);
  const open = ledger.openPosition;

  if (
    open &&
    policy.closeOnReversal &&
    signal.direction !== 'flat' &&
    signal.direction !== open.direction &&
    signal.confidence >= policy.minConfidence
  ) {
    exit = ledger.closePosition(sample.close, sample.timestamp, 'signal-reversal');
    equity = ledger.markToMarket(sample.close, sample.timestamp);
  }

  const sized = sizeOrder({
    signal,
    portfolio: { equity, openPosition: ledger.openPosition },
    policy,
    price: sample.close,
    timestamp: sample.timestamp,
    window,
  });

  if (!sized.ok) {
    const rejection: Rejection = { reason: sized.reason, detail: sized.detail };
    if (sized.reason !== 'flat-signal' && sized.reason !== 'position-open') {
      log.debug('Order rejected', { strategyId: strategy.id, ...rejection });
    }
    return { sample, exit, signal, entry: null, rejection, equity };
  }

  const applied = ledger.applyOrder(sized.order);
  if (!applied.accepted) {
    const rejection: Rejection = { reason: applied.reason, detail: applied.detail };
    log.warn('Ledger refused sized order', { strategyId: strategy.id, ...rejection });
    return { sample, exit, signal, entry: null, rejection, equity };
  }

  equity = ledger.markToMarket(sample.close, sample.timestamp);
  return { sample, exit, signal, entry: applied.position, rejection: null, equity };
}
