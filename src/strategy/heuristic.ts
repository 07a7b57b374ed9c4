import { AnalysisContext, ProposalDraft, RiskLimits } from '../core/types';

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;
const HEURISTIC_CONFIDENCE = 60;
const DEFAULT_CONFIDENCE = 50;
// Fraction of the position-size limit a fallback BUY uses.
const HEURISTIC_SIZE_FRACTION = 0.5;

const floorCents = (value: number) => Math.floor(value * 100) / 100;
const ceilCents = (value: number) => Math.ceil(value * 100) / 100;

/**
 * Stop and target for a long entry at `price`: the stop sits at least `stopLossPct`
 * below, the target at least `takeProfitPct` above and far enough for the
 * minimum reward/risk against the rounded stop.
 */
export const longProtectiveLevels = (price: number, limits: RiskLimits): { stopLoss: number; takeProfit: number } => {
  const stopLoss = floorCents(price * (1 - limits.stopLossPct));
  const byPct = price * (1 + limits.takeProfitPct);
  const byRatio = price + limits.minRiskRewardRatio * (price - stopLoss);
  return { stopLoss, takeProfit: ceilCents(Math.max(byPct, byRatio)) };
};

export const shortProtectiveLevels = (price: number, limits: RiskLimits): { stopLoss: number; takeProfit: number } => ({
  stopLoss: ceilCents(price * (1 + limits.stopLossPct)),
  takeProfit: floorCents(price * (1 - limits.takeProfitPct))
});

/** Largest whole-share BUY within `fraction` of the size limit that cash (with costs) can pay for. */
export const sizeLongEntry = (context: AnalysisContext, price: number, fraction: number, costRate: number): number => {
  const budget = fraction * context.settings.maxPositionSizePct * context.portfolio.totalValue;
  const bySize = Math.floor(budget / price);
  const affordable = Math.floor(context.portfolio.cash / (price * (1 + costRate)));
  return Math.max(0, Math.min(bySize, affordable));
};

const indicatorFactors = (context: AnalysisContext): string[] => {
  const ind = context.indicators;
  if (!ind) return [];
  return [
    `RSI14 ${ind.rsi14.toFixed(1)}`,
    `MACD ${ind.macd.toFixed(3)} vs signal ${ind.macdSignal.toFixed(3)}`,
    `SMA20 ${ind.sma20.toFixed(2)} / SMA50 ${ind.sma50.toFixed(2)}`
  ];
};

const hold = (price: number, reasoning: string, keyFactors: string[]): ProposalDraft => ({
  action: 'HOLD',
  quantity: 0,
  price,
  stopLoss: null,
  takeProfit: null,
  reasoning,
  riskLevel: 'MEDIUM',
  confidence: HEURISTIC_CONFIDENCE,
  timeHorizon: 'short-term',
  keyFactors
});

/**
 * RSI mean-reversion rule used when the advisor is unavailable. Returns undefined when
 * there is no price or no indicator data to apply it to.
 */
export const heuristicProposal = (context: AnalysisContext, costRate = 0): ProposalDraft | undefined => {
  const price = context.currentPrice;
  const ind = context.indicators;
  if (price === undefined || !ind) return undefined;
  const rsiValue = ind.rsi14;
  const factors = indicatorFactors(context);

  if (rsiValue < RSI_OVERSOLD) {
    const quantity = sizeLongEntry(context, price, HEURISTIC_SIZE_FRACTION, costRate);
    if (quantity < 1) {
      return hold(price, `RSI ${rsiValue.toFixed(1)} is oversold but cash does not cover one share.`, factors);
    }
    const levels = longProtectiveLevels(price, context.settings);
    return {
      action: 'BUY',
      quantity,
      price,
      ...levels,
      reasoning: `RSI ${rsiValue.toFixed(1)} is below ${RSI_OVERSOLD}: oversold, expecting a rebound.`,
      riskLevel: 'MEDIUM',
      confidence: HEURISTIC_CONFIDENCE,
      timeHorizon: 'short-term',
      keyFactors: factors
    };
  }

  if (rsiValue > RSI_OVERBOUGHT) {
    const held = context.portfolio.positions.find((p) => p.ticker === context.ticker)?.shares ?? 0;
    if (held < 1) {
      return hold(price, `RSI ${rsiValue.toFixed(1)} is overbought but there is no position to sell.`, factors);
    }
    return {
      action: 'SELL',
      quantity: held,
      price,
      ...shortProtectiveLevels(price, context.settings),
      reasoning: `RSI ${rsiValue.toFixed(1)} is above ${RSI_OVERBOUGHT}: overbought, taking profit.`,
      riskLevel: 'MEDIUM',
      confidence: HEURISTIC_CONFIDENCE,
      timeHorizon: 'short-term',
      keyFactors: factors
    };
  }

  return hold(price, `RSI ${rsiValue.toFixed(1)} is neutral; no edge.`, factors);
};

export const defaultProposal = (context: AnalysisContext): ProposalDraft => ({
  action: 'HOLD',
  quantity: 0,
  price: context.currentPrice ?? 0,
  stopLoss: null,
  takeProfit: null,
  reasoning: 'advisor unavailable',
  riskLevel: 'LOW',
  confidence: DEFAULT_CONFIDENCE,
  keyFactors: context.issues.map((i) => i.message)
});
