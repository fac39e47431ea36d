import { describe, it, expect } from 'vitest';
import { checkBrackets, sizeOrder } from '../src/execution/risk';
import type { Position, SizingResult } from '../src/execution/types';
import { bar, longOrder, signal, STEP_5M, T0, testPolicy } from './helpers';

const flatBook = { equity: 100_000, openPosition: null };

function expectRejected(result: SizingResult, reason: string) {
  expect(result.ok).toBe(false);
  if (!result.ok) expect(result.reason).toBe(reason);
}

describe('sizeOrder', () => {
  it('sizes by confidence capped at the max fraction', () => {
    const result = sizeOrder({
      signal: signal('long', 0.5),
      portfolio: flatBook,
      policy: testPolicy(),
      price: 100,
      timestamp: T0,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.order.sizeFraction).toBe(0.2);
    expect(result.order.notional).toBe(20_000);
    expect(result.order.quantity).toBe(200);
    expect(result.order.stopLossPrice).toBeCloseTo(95, 9);
    expect(result.order.takeProfitPrice).toBeCloseTo(110, 9);
    expect(result.order.openedAt).toBe(T0);
  });

  it('uses the confidence-scaled fraction below the cap', () => {
    const result = sizeOrder({
      signal: signal('long', 0.1),
      portfolio: flatBook,
      policy: testPolicy({ minConfidence: 0.05 }),
      price: 100,
      timestamp: T0,
    });
    expect(result.ok && result.order.notional).toBe(10_000);
  });

  it('places short brackets on the other side of entry', () => {
    const result = sizeOrder({
      signal: signal('short', 0.9),
      portfolio: flatBook,
      policy: testPolicy(),
      price: 100,
      timestamp: T0,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.order.direction).toBe('short');
    expect(result.order.stopLossPrice).toBeCloseTo(105, 9);
    expect(result.order.takeProfitPrice).toBeCloseTo(90, 9);
  });

  it('rejects a flat signal', () => {
    expectRejected(
      sizeOrder({ signal: signal('flat', 0), portfolio: flatBook, policy: testPolicy(), price: 100, timestamp: T0 }),
      'flat-signal',
    );
  });

  it('rejects low confidence', () => {
    expectRejected(
      sizeOrder({ signal: signal('long', 0.1), portfolio: flatBook, policy: testPolicy(), price: 100, timestamp: T0 }),
      'low-confidence',
    );
  });

  it('rejects while a position is open', () => {
    const open: Position = { ...longOrder(), entryFee: 0, lastPrice: 100, unrealizedPnl: 0 };
    expectRejected(
      sizeOrder({
        signal: signal('long', 0.9),
        portfolio: { equity: 100_000, openPosition: open },
        policy: testPolicy(),
        price: 100,
        timestamp: T0,
      }),
      'position-open',
    );
  });

  it('rejects a requested fraction over the cap instead of clipping it', () => {
    expectRejected(
      sizeOrder({
        signal: signal('long', 0.9),
        portfolio: flatBook,
        policy: testPolicy(),
        price: 100,
        timestamp: T0,
        requestedFraction: 0.3,
      }),
      'exceeds-max-fraction',
    );
  });

  it('honours a requested fraction within the cap', () => {
    const result = sizeOrder({
      signal: signal('long', 0.9),
      portfolio: flatBook,
      policy: testPolicy(),
      price: 100,
      timestamp: T0,
      requestedFraction: 0.1,
    });
    expect(result.ok && result.order.notional).toBe(10_000);
  });

  it('rejects when equity is not positive', () => {
    expectRejected(
      sizeOrder({
        signal: signal('long', 0.9),
        portfolio: { equity: 0, openPosition: null },
        policy: testPolicy(),
        price: 100,
        timestamp: T0,
      }),
      'non-positive-equity',
    );
  });

  it('rejects trades under the minimum notional', () => {
    expectRejected(
      sizeOrder({
        signal: signal('long', 0.9),
        portfolio: flatBook,
        policy: testPolicy({ minTradeNotional: 50_000 }),
        price: 100,
        timestamp: T0,
      }),
      'below-min-trade',
    );
  });

  it('rejects a long stop above entry rather than correcting it', () => {
    expectRejected(
      sizeOrder({
        signal: signal('long', 0.9),
        portfolio: flatBook,
        policy: testPolicy({ stopLossPct: -5 }),
        price: 100,
        timestamp: T0,
      }),
      'invalid-stop',
    );
  });

  describe('ATR stops', () => {
    const policy = testPolicy({ stopMode: 'atr', atrPeriod: 2, atrStopMultiplier: 2, atrTakeProfitMultiplier: 4 });

    it('offsets stops by ATR multiples', () => {
      const window = [0, 1, 2].map(i => bar(T0 + i * STEP_5M, 100, 101, 99, 100));
      const result = sizeOrder({ signal: signal('long', 0.9), portfolio: flatBook, policy, price: 100, timestamp: T0, window });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      // ATR 2
      expect(result.order.stopLossPrice).toBe(96);
      expect(result.order.takeProfitPrice).toBe(108);
    });

    it('rejects without enough bars for ATR', () => {
      const window = [bar(T0, 100, 101, 99, 100)];
      expectRejected(
        sizeOrder({ signal: signal('long', 0.9), portfolio: flatBook, policy, price: 100, timestamp: T0, window }),
        'insufficient-history',
      );
    });
  });
});

describe('checkBrackets', () => {
  it('accepts monotonic brackets', () => {
    expect(checkBrackets('long', 100, { stopLossPrice: 95, takeProfitPrice: 110 })).toBeNull();
    expect(checkBrackets('short', 100, { stopLossPrice: 105, takeProfitPrice: 90 })).toBeNull();
  });

  it('flags inverted or non-finite brackets', () => {
    expect(checkBrackets('long', 100, { stopLossPrice: 105, takeProfitPrice: 110 })).not.toBeNull();
    expect(checkBrackets('short', 100, { stopLossPrice: 95, takeProfitPrice: 90 })).not.toBeNull();
    expect(checkBrackets('long', 100, { stopLossPrice: NaN, takeProfitPrice: 110 })).not.toBeNull();
  });
});
