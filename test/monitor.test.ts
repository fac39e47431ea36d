import { describe, it, expect } from 'vitest';
import type { Trade } from '../src/execution/types';
import { PerformanceMonitor } from '../src/monitor';
import { T0 } from './helpers';

const HOUR = 3_600_000;

const rising = [
  { timestamp: T0, equity: 100_000 },
  { timestamp: T0 + HOUR, equity: 102_000 },
  { timestamp: T0 + 2 * HOUR, equity: 104_000 },
];

function win(): Trade {
  return {
    strategyId: 'test-strategy', direction: 'long',
    entryPrice: 100, exitPrice: 101, quantity: 10, notional: 1_000,
    entryTime: T0, exitTime: T0 + HOUR, durationMs: HOUR,
    realizedPnl: 10, pnlPct: 1, fees: 0, exitReason: 'take-profit',
  };
}

function monitorWith(curve = rising, threshold = 50) {
  const monitor = new PerformanceMonitor(threshold);
  monitor.setReference({ strategyId: 'test-strategy', backtestCurve: curve, backtestWinRate: 0.5 });
  return monitor;
}

describe('PerformanceMonitor', () => {
  it('reports nothing without a reference or with a single live point', () => {
    const bare = new PerformanceMonitor(50);
    bare.record(T0, 100_000);
    bare.record(T0 + HOUR, 101_000);
    expect(bare.divergence()).toBeNull();

    const monitor = monitorWith();
    monitor.record(T0, 100_000);
    expect(monitor.divergence()).toBeNull();
  });

  it('compares live return with the backtest over the same elapsed time', () => {
    const monitor = monitorWith();
    monitor.record(T0 + 10 * HOUR, 50_000);
    monitor.record(T0 + 11 * HOUR, 50_750);

    const report = monitor.divergence();
    expect(report?.elapsedMs).toBe(HOUR);
    expect(report?.liveReturnPct).toBeCloseTo(1.5, 9);
    expect(report?.backtestReturnPct).toBeCloseTo(2, 9);
    expect(report?.deviationPct).toBeCloseTo(-25, 6);
    expect(report?.accuracyScore).toBeCloseTo(0.75, 6);
    expect(report?.confidence).toBe('HIGH');
    expect(report?.liveWinRate).toBeNull();
    expect(report?.alerting).toBe(false);
  });

  it('blends win-rate accuracy once live trades exist', () => {
    const monitor = monitorWith();
    monitor.record(T0, 50_000);
    monitor.record(T0 + HOUR, 50_750);
    monitor.recordTrade(win());

    const report = monitor.divergence();
    expect(report?.liveWinRate).toBe(1);
    expect(report?.accuracyScore).toBeCloseTo(0.625, 6);
    expect(report?.confidence).toBe('MEDIUM');
  });

  it('alerts when deviation passes the threshold', () => {
    const monitor = monitorWith();
    monitor.record(T0, 50_000);
    monitor.record(T0 + HOUR, 49_500);

    const report = monitor.divergence();
    expect(report?.deviationPct).toBeCloseTo(-150, 6);
    expect(report?.accuracyScore).toBe(0);
    expect(report?.confidence).toBe('LOW');
    expect(report?.alerting).toBe(true);
  });

  it('uses plus or minus 100 when the backtest did not move', () => {
    const flat = [
      { timestamp: T0, equity: 100_000 },
      { timestamp: T0 + HOUR, equity: 100_000 },
    ];
    const up = monitorWith(flat);
    up.record(T0, 100_000);
    up.record(T0 + HOUR, 100_500);
    expect(up.divergence()?.deviationPct).toBe(100);

    const down = monitorWith(flat);
    down.record(T0, 100_000);
    down.record(T0 + HOUR, 99_500);
    expect(down.divergence()?.deviationPct).toBe(-100);

    const still = monitorWith(flat);
    still.record(T0, 100_000);
    still.record(T0 + HOUR, 100_000);
    expect(still.divergence()?.deviationPct).toBe(0);
    expect(still.divergence()?.confidence).toBe('HIGH');
  });

  it('ignores points that are not newer than the last one', () => {
    const monitor = monitorWith();
    monitor.record(T0, 50_000);
    monitor.record(T0 + HOUR, 50_750);
    monitor.record(T0 + HOUR, 10_000);
    expect(monitor.divergence()?.liveReturnPct).toBeCloseTo(1.5, 9);
  });

  it('starts over when the reference changes', () => {
    const monitor = monitorWith();
    monitor.record(T0, 50_000);
    monitor.record(T0 + HOUR, 50_750);
    monitor.recordTrade(win());

    monitor.setReference({ strategyId: 'next', backtestCurve: rising, backtestWinRate: 0.4 });
    expect(monitor.divergence()).toBeNull();
    monitor.record(T0 + 2 * HOUR, 50_000);
    monitor.record(T0 + 3 * HOUR, 51_000);
    const report = monitor.divergence();
    expect(report?.strategyId).toBe('next');
    expect(report?.liveWinRate).toBeNull();
  });
});
