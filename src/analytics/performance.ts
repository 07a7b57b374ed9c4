import { Transaction } from '../core/types';
import { sum } from '../core/utils';

export interface EquityPoint {
  timestamp: string;
  equity: number;
  drawdown: number; // fraction below the running peak
}

export interface PerformanceSummary {
  trades: number;
  buys: number;
  sells: number;
  realizedPnl: number;
  winRate: number; // winning SELLs / all SELLs
  totalCommission: number;
  totalSlippage: number;
  tradedNotional: number;
  maxDrawdown: number;
  finalEquity: number;
}

const chronological = (transactions: Transaction[]): Transaction[] =>
  transactions.slice().sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));

/** Equity marked only by realized P&L, one point per transaction. */
export const buildRealizedEquityCurve = (transactions: Transaction[], initialCapital: number): EquityPoint[] => {
  let equity = initialCapital;
  let peak = initialCapital;
  return chronological(transactions).map((t) => {
    equity += t.realizedPnl;
    peak = Math.max(peak, equity);
    return { timestamp: t.timestamp, equity, drawdown: peak > 0 ? (peak - equity) / peak : 0 };
  });
};

export const summarizePerformance = (transactions: Transaction[], initialCapital: number): PerformanceSummary => {
  const curve = buildRealizedEquityCurve(transactions, initialCapital);
  const sells = transactions.filter((t) => t.action === 'SELL');
  const wins = sells.filter((t) => t.realizedPnl > 0).length;
  const realizedPnl = sum(transactions.map((t) => t.realizedPnl));
  return {
    trades: transactions.length,
    buys: transactions.length - sells.length,
    sells: sells.length,
    realizedPnl,
    winRate: sells.length ? wins / sells.length : 0,
    totalCommission: sum(transactions.map((t) => t.commission)),
    totalSlippage: sum(transactions.map((t) => t.slippage)),
    tradedNotional: sum(transactions.map((t) => t.shares * t.price)),
    maxDrawdown: curve.length ? Math.max(...curve.map((p) => p.drawdown)) : 0,
    finalEquity: initialCapital + realizedPnl
  };
};
