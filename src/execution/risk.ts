import { computeAtr, lastValue } from '../analysis/indicators';
import { closeSeries, highSeries, lowSeries } from '../data/samples';
import type { PriceSample } from '../data/types';
import type { Direction, Signal } from '../strategy/types';
import type { Position, RejectionReason, RiskPolicy, SizingResult } from './types';

const EPSILON = 1e-9;

export interface SizingRequest {
  signal: Signal;
  /** The portfolio as the sizer needs to see it */
  portfolio: { equity: number; openPosition: Position | null };
  policy: RiskPolicy;
  /** Entry price, normally the latest close */
  price: number;
  timestamp: number;
  /** Recent samples, needed for ATR stops */
  window?: readonly PriceSample[];
  /** Explicit fraction of equity. Over the policy cap it is rejected, never clipped. */
  requestedFraction?: number;
}

function reject(reason: RejectionReason, detail: string): SizingResult {
  return { ok: false, reason, detail };
}

interface Brackets {
  stopLossPrice: number;
  takeProfitPrice: number;
}

function percentBrackets(direction: Direction, price: number, policy: RiskPolicy): Brackets {
  const sl = policy.stopLossPct / 100;
  const tp = policy.takeProfitPct / 100;
  return direction === 'long'
    ? { stopLossPrice: price * (1 - sl), takeProfitPrice: price * (1 + tp) }
    : { stopLossPrice: price * (1 + sl), takeProfitPrice: price * (1 - tp) };
}

function atrBrackets(direction: Direction, price: number, atr: number, policy: RiskPolicy): Brackets {
  const stopDistance = atr * policy.atrStopMultiplier;
  const takeDistance = atr * policy.atrTakeProfitMultiplier;
  return direction === 'long'
    ? { stopLossPrice: price - stopDistance, takeProfitPrice: price + takeDistance }
    : { stopLossPrice: price + stopDistance, takeProfitPrice: price - takeDistance };
}

/**
 * Long: 0 < stop < entry < take-profit. Short: 0 < take-profit < entry < stop.
 * Returns a reason when the brackets break that ordering.
 */
export function checkBrackets(direction: Direction, entry: number, b: Brackets): string | null {
  const values = [entry, b.stopLossPrice, b.takeProfitPrice];
  if (!values.every(v => Number.isFinite(v) && v > 0)) {
    return `non-finite or non-positive level (entry ${entry}, stop ${b.stopLossPrice}, take-profit ${b.takeProfitPrice})`;
  }
  if (direction === 'long' && !(b.stopLossPrice < entry && entry < b.takeProfitPrice)) {
    return `long needs stop ${b.stopLossPrice} < entry ${entry} < take-profit ${b.takeProfitPrice}`;
  }
  if (direction === 'short' && !(b.takeProfitPrice < entry && entry < b.stopLossPrice)) {
    return `short needs take-profit ${b.takeProfitPrice} < entry ${entry} < stop ${b.stopLossPrice}`;
  }
  return null;
}

/**
 * Turn a signal into an Order or a typed rejection. Nothing is clipped or
 * corrected: anything outside the policy is rejected with its reason.
 *
 * fraction = min(maxPositionFraction, confidence × confidenceScale)
 * notional = fraction × equity
 */
export function sizeOrder(req: SizingRequest): SizingResult {
  const { signal, portfolio, policy, price } = req;

  if (signal.direction === 'flat') return reject('flat-signal', signal.reason);
  const direction = signal.direction;

  if (signal.confidence < policy.minConfidence) {
    return reject('low-confidence', `confidence ${signal.confidence.toFixed(3)} < min ${policy.minConfidence}`);
  }

  if (portfolio.openPosition) {
    return reject('position-open', `already ${portfolio.openPosition.direction} since ${portfolio.openPosition.openedAt}`);
  }

  if (!(portfolio.equity > 0)) {
    return reject('non-positive-equity', `equity ${portfolio.equity}`);
  }

  let fraction: number;
  if (req.requestedFraction !== undefined) {
    if (req.requestedFraction > policy.maxPositionFraction + EPSILON) {
      return reject(
        'exceeds-max-fraction',
        `requested ${req.requestedFraction} > max ${policy.maxPositionFraction}`,
      );
    }
    fraction = req.requestedFraction;
  } else {
    fraction = Math.min(policy.maxPositionFraction, signal.confidence * policy.confidenceScale);
  }

  const notional = fraction * portfolio.equity;
  if (notional > policy.maxPositionFraction * portfolio.equity + EPSILON) {
    return reject('exceeds-max-fraction', `notional ${notional.toFixed(2)} over cap of equity ${portfolio.equity.toFixed(2)}`);
  }
  if (!(notional > 0) || notional < policy.minTradeNotional) {
    return reject('below-min-trade', `notional ${notional.toFixed(2)} < min ${policy.minTradeNotional}`);
  }

  let brackets: Brackets;
  if (policy.stopMode === 'atr') {
    const window = req.window ?? [];
    const atr = lastValue(computeAtr(highSeries(window), lowSeries(window), closeSeries(window), policy.atrPeriod));
    if (atr === null) {
      return reject('insufficient-history', `ATR(${policy.atrPeriod}) needs more than ${window.length} samples`);
    }
    brackets = atrBrackets(direction, price, atr, policy);
  } else {
    brackets = percentBrackets(direction, price, policy);
  }

  const problem = checkBrackets(direction, price, brackets);
  if (problem) return reject('invalid-stop', problem);

  return {
    ok: true,
    order: Object.freeze({
      direction,
      sizeFraction: fraction,
      notional,
      quantity: notional / price,
      entryPrice: price,
      stopLossPrice: brackets.stopLossPrice,
      takeProfitPrice: brackets.takeProfitPrice,
      openedAt: req.timestamp,
      strategyId: signal.strategyId,
    }),
  };
}
