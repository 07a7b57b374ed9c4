import { AnalysisContext } from '../core/types';

export const CONTEXT_MARKER = 'Context JSON:';

const fmt = (value: number | undefined, digits = 2): string =>
  value === undefined || !Number.isFinite(value) ? 'n/a' : value.toFixed(digits);

/** Machine-readable digest of the context, embedded in the prompt on a single line. */
export interface PromptDigest {
  ticker: string;
  price: number | null;
  cash: number;
  totalValue: number;
  sharesHeld: number;
  avgPurchasePrice: number | null;
  rsi14: number | null;
  macd: number | null;
  macdSignal: number | null;
  sma20: number | null;
  sma50: number | null;
  maxPositionSizePct: number;
  stopLossPct: number;
  takeProfitPct: number;
  minRiskRewardRatio: number;
}

export const buildPromptDigest = (context: AnalysisContext): PromptDigest => {
  const position = context.portfolio.positions.find((p) => p.ticker === context.ticker);
  const ind = context.indicators;
  return {
    ticker: context.ticker,
    price: context.currentPrice ?? null,
    cash: context.portfolio.cash,
    totalValue: context.portfolio.totalValue,
    sharesHeld: position?.shares ?? 0,
    avgPurchasePrice: position?.avgPurchasePrice ?? null,
    rsi14: ind?.rsi14 ?? null,
    macd: ind?.macd ?? null,
    macdSignal: ind?.macdSignal ?? null,
    sma20: ind?.sma20 ?? null,
    sma50: ind?.sma50 ?? null,
    maxPositionSizePct: context.settings.maxPositionSizePct,
    stopLossPct: context.settings.stopLossPct,
    takeProfitPct: context.settings.takeProfitPct,
    minRiskRewardRatio: context.settings.minRiskRewardRatio
  };
};

export const buildAdvisorPrompt = (context: AnalysisContext): string => {
  const { portfolio, settings, indicators: ind, session } = context;
  const position = portfolio.positions.find((p) => p.ticker === context.ticker);
  const recentBars = context.bars
    .slice(-5)
    .map((b) => `${b.date} O ${fmt(b.open)} H ${fmt(b.high)} L ${fmt(b.low)} C ${fmt(b.close)} V ${b.volume}`)
    .join('\n');
  const newsLines = context.news
    .map((n) => `- ${n.publishedAt.slice(0, 10)} ${n.title}${n.sentiment !== undefined ? ` (sentiment ${fmt(n.sentiment)})` : ''}`)
    .join('\n');
  const sessionLine = session.isTradingDay
    ? `Session: ${fmt(session.minutesSinceOpen, 0)} min since open, ${fmt(session.minutesUntilClose, 0)} min until close`
    : 'Session: market closed today';

  return [
    'You are a disciplined equity trading advisor for a paper-trading account.',
    `Date: ${context.asOf}`,
    `Instrument: ${context.ticker} at ${fmt(context.currentPrice)}`,
    `Portfolio: cash ${fmt(portfolio.cash)}, total value ${fmt(portfolio.totalValue)}, holding ${position?.shares ?? 0} shares${
      position ? ` @ avg ${fmt(position.avgPurchasePrice)}` : ''
    }`,
    `Indicators: RSI14 ${fmt(ind?.rsi14, 1)}, MACD ${fmt(ind?.macd, 3)} / signal ${fmt(ind?.macdSignal, 3)}, SMA20 ${fmt(
      ind?.sma20
    )}, SMA50 ${fmt(ind?.sma50)}, SMA200 ${fmt(ind?.sma200)}, avg volume ${fmt(ind?.volumeAvg, 0)}`,
    sessionLine,
    `Limits: max position ${(settings.maxPositionSizePct * 100).toFixed(1)}% of portfolio value, stop-loss at least ${(
      settings.stopLossPct * 100
    ).toFixed(1)}% below entry, take-profit at least ${(settings.takeProfitPct * 100).toFixed(1)}% above entry, reward/risk >= ${fmt(
      settings.minRiskRewardRatio,
      1
    )}`,
    recentBars ? `Recent daily bars:\n${recentBars}` : 'Recent daily bars: none',
    newsLines ? `News:\n${newsLines}` : 'News: none',
    `${CONTEXT_MARKER} ${JSON.stringify(buildPromptDigest(context))}`,
    'Respond ONLY with a JSON object: {"action":"BUY"|"SELL"|"HOLD","quantity":int (0 for HOLD),"price":number>0,"stop_loss":number|null,"take_profit":number|null,"reasoning":string,"risk_level":"LOW"|"MEDIUM"|"HIGH","confidence":int 0..100,"time_horizon":string,"key_factors":string[]}'
  ].join('\n');
};
