import { createSample, sampleAtPrice } from '../src/data/samples';
import type { PriceSample, Timeframe } from '../src/data/types';
import type { Order, RiskPolicy } from '../src/execution/types';
import type { Signal } from '../src/strategy/types';

export const T0 = Date.UTC(2024, 0, 1);
export const STEP_5M = 5 * 60_000;

export function testPolicy(overrides: Partial<RiskPolicy> = {}): RiskPolicy {
  return {
    maxPositionFraction: 0.2,
    minConfidence: 0.2,
    confidenceScale: 1,
    stopMode: 'percent',
    stopLossPct: 5,
    takeProfitPct: 10,
    atrPeriod: 14,
    atrStopMultiplier: 2,
    atrTakeProfitMultiplier: 4,
    minTradeNotional: 0,
    feePct: 0,
    closeOnReversal: false,
    ...overrides,
  };
}

/** Flat OHLC samples at the given closes, 5 minutes apart. */
export function priceSeries(closes: readonly number[], start = T0, timeframe: Timeframe = '5m'): PriceSample[] {
  return closes.map((c, i) => sampleAtPrice(start + i * STEP_5M, c, timeframe, 100));
}

export function bar(
  timestamp: number,
  open: number,
  high: number,
  low: number,
  close: number,
  volume = 100,
  timeframe: Timeframe = '5m',
): PriceSample {
  return createSample({ timestamp, open, high, low, close, volume }, timeframe);
}

export function signal(direction: Signal['direction'], confidence: number, strategyId = 'test-strategy'): Signal {
  return { direction, confidence, strategyId, timestamp: T0, reason: 'test' };
}

export function longOrder(overrides: Partial<Order> = {}): Order {
  return {
    direction: 'long',
    sizeFraction: 0.2,
    notional: 20_000,
    quantity: 200,
    entryPrice: 100,
    stopLossPrice: 95,
    takeProfitPrice: 110,
    openedAt: T0,
    strategyId: 'test-strategy',
    ...overrides,
  };
}
