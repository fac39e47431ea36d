import type { PriceSample } from '../data/types';
import { createLogger } from '../utils/logger';
import { checkBrackets } from './risk';
import { maxDrawdownPct, sharpeRatio, totalReturnPct, winRate } from './stats';
import type {
  ApplyResult,
  EquityPoint,
  ExitReason,
  Order,
  PortfolioSnapshot,
  PortfolioState,
  Position,
  RiskPolicy,
  Trade,
} from './types';

const log = createLogger('ledger');

const EPSILON = 1e-9;

function grossPnl(position: Position, price: number): number {
  const move = position.direction === 'long' ? price - position.entryPrice : position.entryPrice - price;
  return move * position.quantity;
}

/**
 * The virtual account. Holds at most one open position (Flat → Open → Flat)
 * and is the only thing that mutates cash, trade history or the equity curve.
 *
 * Cash is untouched by an entry apart from its fee; equity is cash plus the
 * open position's unrealized P&L.
 */
export class PortfolioLedger {
  private cash: number;
  private startingBalance: number;
  private position: Position | null = null;
  private readonly trades: Trade[] = [];
  private readonly curve: EquityPoint[] = [];

  constructor(startingBalance: number, private policy: RiskPolicy) {
    this.startingBalance = startingBalance;
    this.cash = startingBalance;
  }

  static fromState(state: PortfolioState, policy: RiskPolicy): PortfolioLedger {
    const ledger = new PortfolioLedger(state.startingBalance, policy);
    ledger.cash = state.cash;
    ledger.position = state.openPosition ? { ...state.openPosition } : null;
    ledger.trades.push(...state.trades.map(t => Object.freeze({ ...t })));
    ledger.curve.push(...state.equityCurve.map(p => ({ ...p })));
    return ledger;
  }

  toState(): PortfolioState {
    return {
      cash: this.cash,
      startingBalance: this.startingBalance,
      openPosition: this.position ? { ...this.position } : null,
      trades: this.trades.map(t => ({ ...t })),
      equityCurve: this.curve.map(p => ({ ...p })),
    };
  }

  /** Swap the policy used for validation and fees from now on. */
  setPolicy(policy: RiskPolicy) {
    this.policy = policy;
  }

  /**
   * Start over with a new balance. Only allowed while nothing has been traded;
   * returns false (and changes nothing) otherwise.
   */
  resetBalance(startingBalance: number): boolean {
    if (this.hasHistory) return false;
    this.startingBalance = startingBalance;
    this.cash = startingBalance;
    this.curve.length = 0;
    return true;
  }

  get cashBalance(): number {
    return this.cash;
  }

  get openPosition(): Position | null {
    return this.position ? { ...this.position } : null;
  }

  /** True once anything has happened to this account. */
  get hasHistory(): boolean {
    return this.trades.length > 0 || this.position !== null;
  }

  equity(price?: number): number {
    if (!this.position) return this.cash;
    const unrealized = price === undefined ? this.position.unrealizedPnl : grossPnl(this.position, price);
    return this.cash + unrealized;
  }

  applyOrder(order: Order): ApplyResult {
    if (this.position) {
      return { accepted: false, reason: 'position-open', detail: `position ${this.position.strategyId} still open` };
    }

    const equity = this.equity();
    if (!(equity > 0)) {
      return { accepted: false, reason: 'non-positive-equity', detail: `equity ${equity}` };
    }
    if (order.notional > this.policy.maxPositionFraction * equity + EPSILON) {
      return {
        accepted: false,
        reason: 'exceeds-max-fraction',
        detail: `notional ${order.notional.toFixed(2)} > ${this.policy.maxPositionFraction} × equity ${equity.toFixed(2)}`,
      };
    }
    if (!(order.notional > 0) || !(order.quantity > 0)) {
      return { accepted: false, reason: 'below-min-trade', detail: `notional ${order.notional}, quantity ${order.quantity}` };
    }
    const problem = checkBrackets(order.direction, order.entryPrice, order);
    if (problem) return { accepted: false, reason: 'invalid-stop', detail: problem };

    const entryFee = (order.notional * this.policy.feePct) / 100;
    this.cash -= entryFee;
    this.position = { ...order, entryFee, lastPrice: order.entryPrice, unrealizedPnl: 0 };

    log.info('Position opened', {
      strategyId: order.strategyId,
      direction: order.direction,
      entry: order.entryPrice,
      notional: order.notional.toFixed(2),
      stop: order.stopLossPrice,
      takeProfit: order.takeProfitPrice,
    });
    return { accepted: true, position: { ...this.position } };
  }

  /** Revalue the open position at `price` and record an equity point. Returns equity. */
  markToMarket(price: number, timestamp: number): number {
    if (this.position) {
      this.position.lastPrice = price;
      this.position.unrealizedPnl = grossPnl(this.position, price);
    }
    const equity = this.equity();
    const last = this.curve[this.curve.length - 1];
    if (last && last.timestamp === timestamp) {
      last.equity = equity;
    } else {
      this.curve.push({ timestamp, equity });
    }
    return equity;
  }

  /**
   * Close the position if the sample's range touched its stop or take-profit.
   * The stop wins when both were touched. Fills at the level, or at the open
   * when the sample gapped through it.
   */
  checkExits(sample: PriceSample): Trade | null {
    const p = this.position;
    if (!p) return null;

    if (p.direction === 'long') {
      if (sample.low <= p.stopLossPrice) {
        return this.closePosition(Math.min(sample.open, p.stopLossPrice), sample.timestamp, 'stop-loss');
      }
      if (sample.high >= p.takeProfitPrice) {
        return this.closePosition(Math.max(sample.open, p.takeProfitPrice), sample.timestamp, 'take-profit');
      }
    } else {
      if (sample.high >= p.stopLossPrice) {
        return this.closePosition(Math.max(sample.open, p.stopLossPrice), sample.timestamp, 'stop-loss');
      }
      if (sample.low <= p.takeProfitPrice) {
        return this.closePosition(Math.min(sample.open, p.takeProfitPrice), sample.timestamp, 'take-profit');
      }
    }
    return null;
  }

  closePosition(price: number, timestamp: number, reason: ExitReason): Trade | null {
    const p = this.position;
    if (!p) return null;

    const gross = grossPnl(p, price);
    const exitFee = (price * p.quantity * this.policy.feePct) / 100;
    const realizedPnl = gross - p.entryFee - exitFee;
    this.cash += gross - exitFee;
    this.position = null;

    const trade: Trade = Object.freeze({
      strategyId: p.strategyId,
      direction: p.direction,
      entryPrice: p.entryPrice,
      exitPrice: price,
      quantity: p.quantity,
      notional: p.notional,
      entryTime: p.openedAt,
      exitTime: timestamp,
      durationMs: timestamp - p.openedAt,
      realizedPnl,
      pnlPct: (realizedPnl / p.notional) * 100,
      fees: p.entryFee + exitFee,
      exitReason: reason,
    });
    this.trades.push(trade);

    log.info('Position closed', {
      strategyId: trade.strategyId,
      reason,
      exit: price,
      pnl: realizedPnl.toFixed(2),
      pnlPct: trade.pnlPct.toFixed(2),
    });
    return trade;
  }

  tradeHistory(): readonly Trade[] {
    return this.trades;
  }

  equityCurve(): readonly EquityPoint[] {
    return this.curve;
  }

  winRate(): number {
    return winRate(this.trades);
  }

  sharpeRatio(): number {
    return sharpeRatio(this.trades);
  }

  maxDrawdownPct(): number {
    return maxDrawdownPct(this.curve);
  }

  totalReturnPct(price?: number): number {
    return totalReturnPct(this.equity(price), this.startingBalance);
  }

  snapshot(price?: number): PortfolioSnapshot {
    return {
      cash: this.cash,
      equity: this.equity(price),
      startingBalance: this.startingBalance,
      openPosition: this.openPosition,
      tradeCount: this.trades.length,
      winRate: this.winRate(),
      totalReturnPct: this.totalReturnPct(price),
      maxDrawdownPct: this.maxDrawdownPct(),
      sharpeRatio: this.sharpeRatio(),
      realizedPnl: this.trades.reduce((s, t) => s + t.realizedPnl, 0),
    };
  }
}
