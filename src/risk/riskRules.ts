import { PortfolioSnapshot, RiskLimits, RiskViolation, SessionClock } from '../core/types';

// Relative slack for price comparisons so that levels computed as price * (1 - pct)
// are not rejected over the last binary digit.
const EPS = 1e-9;

export interface RiskCandidate {
  ticker: string;
  action: 'BUY' | 'SELL' | 'HOLD';
  quantity: number;
  price: number;
  stopLoss: number | null;
  takeProfit: number | null;
}

export const notional = (candidate: Pick<RiskCandidate, 'quantity' | 'price'>): number =>
  candidate.quantity * candidate.price;

export const riskRewardRatio = (price: number, stopLoss: number, takeProfit: number): number | undefined => {
  const risk = price - stopLoss;
  if (!(risk > 0)) return undefined;
  return (takeProfit - price) / risk;
};

export const checkPositionSize = (
  candidate: RiskCandidate,
  portfolio: PortfolioSnapshot,
  limits: RiskLimits
): RiskViolation | undefined => {
  const limit = limits.maxPositionSizePct * portfolio.totalValue;
  const value = notional(candidate);
  if (value <= limit * (1 + EPS)) return undefined;
  return {
    code: 'POSITION_SIZE',
    message: `Position size ${value.toFixed(2)} exceeds ${(limits.maxPositionSizePct * 100).toFixed(1)}% of portfolio value (${limit.toFixed(2)})`
  };
};

export const checkStopLoss = (candidate: RiskCandidate, limits: RiskLimits): RiskViolation | undefined => {
  const maxStop = candidate.price * (1 - limits.stopLossPct);
  if (candidate.stopLoss === null) {
    return { code: 'STOP_LOSS_TOO_TIGHT', message: 'Stop-loss is required for a BUY' };
  }
  if (candidate.stopLoss <= maxStop + candidate.price * EPS) return undefined;
  const distance = (1 - candidate.stopLoss / candidate.price) * 100;
  return {
    code: 'STOP_LOSS_TOO_TIGHT',
    message: `Stop-loss ${candidate.stopLoss.toFixed(2)} is ${distance.toFixed(2)}% below price; minimum is ${(limits.stopLossPct * 100).toFixed(2)}% (<= ${maxStop.toFixed(2)})`
  };
};

export const checkTakeProfit = (candidate: RiskCandidate, limits: RiskLimits): RiskViolation | undefined => {
  const minTake = candidate.price * (1 + limits.takeProfitPct);
  if (candidate.takeProfit === null) {
    return { code: 'TAKE_PROFIT_TOO_LOW', message: 'Take-profit is required for a BUY' };
  }
  if (candidate.takeProfit >= minTake - candidate.price * EPS) return undefined;
  return {
    code: 'TAKE_PROFIT_TOO_LOW',
    message: `Take-profit ${candidate.takeProfit.toFixed(2)} is below the minimum ${minTake.toFixed(2)} (+${(limits.takeProfitPct * 100).toFixed(2)}%)`
  };
};

export const checkRiskReward = (candidate: RiskCandidate, limits: RiskLimits): RiskViolation | undefined => {
  if (candidate.stopLoss === null || candidate.takeProfit === null) {
    return { code: 'RISK_REWARD', message: 'Risk/reward cannot be computed without stop-loss and take-profit' };
  }
  const ratio = riskRewardRatio(candidate.price, candidate.stopLoss, candidate.takeProfit);
  if (ratio === undefined) {
    return { code: 'RISK_REWARD', message: 'Stop-loss must be below price for risk/reward to be defined' };
  }
  if (ratio >= limits.minRiskRewardRatio - EPS) return undefined;
  return {
    code: 'RISK_REWARD',
    message: `Risk/reward ${ratio.toFixed(2)} is below the minimum ${limits.minRiskRewardRatio.toFixed(2)}`
  };
};

export const checkSessionBlackout = (session: SessionClock, blackoutMinutes: number): RiskViolation | undefined => {
  if (!session.isTradingDay) {
    return { code: 'SESSION_BLACKOUT', message: 'Market is closed today' };
  }
  if (session.minutesSinceOpen < 0 || session.minutesUntilClose < 0) {
    return { code: 'SESSION_BLACKOUT', message: 'Market session is closed' };
  }
  if (session.minutesSinceOpen < blackoutMinutes) {
    return {
      code: 'SESSION_BLACKOUT',
      message: `No new trades in the first ${blackoutMinutes} minutes of the session`
    };
  }
  if (session.minutesUntilClose < blackoutMinutes) {
    return {
      code: 'SESSION_BLACKOUT',
      message: `No new trades in the last ${blackoutMinutes} minutes of the session`
    };
  }
  return undefined;
};

export const checkInventory = (candidate: RiskCandidate, portfolio: PortfolioSnapshot): RiskViolation | undefined => {
  const held = portfolio.positions.find((p) => p.ticker === candidate.ticker)?.shares ?? 0;
  if (candidate.quantity <= held) return undefined;
  return {
    code: 'INSUFFICIENT_INVENTORY',
    message: `Cannot sell ${candidate.quantity} ${candidate.ticker}; only ${held} held`
  };
};
