import { z } from 'zod';
import { ProviderError } from '../core/errors';
import { AdvisorClient } from './advisor.types';
import { CONTEXT_MARKER, PromptDigest } from './llmPrompt';
import { longProtectiveLevels } from './heuristic';

const nullableNumber = z.number().nullable();

const digestSchema: z.ZodType<PromptDigest> = z.object({
  ticker: z.string(),
  price: nullableNumber,
  cash: z.number(),
  totalValue: z.number(),
  sharesHeld: z.number(),
  avgPurchasePrice: nullableNumber,
  rsi14: nullableNumber,
  macd: nullableNumber,
  macdSignal: nullableNumber,
  sma20: nullableNumber,
  sma50: nullableNumber,
  maxPositionSizePct: z.number(),
  stopLossPct: z.number(),
  takeProfitPct: z.number(),
  minRiskRewardRatio: z.number()
});

// Share of the position-size limit the stub commits to a new entry.
const ENTRY_FRACTION = 0.8;

const readDigest = (prompt: string): PromptDigest => {
  const line = prompt.split('\n').find((l) => l.startsWith(CONTEXT_MARKER));
  if (!line) {
    throw new ProviderError('Stub advisor: prompt carries no context digest', { retryable: false });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(line.slice(CONTEXT_MARKER.length));
  } catch (err) {
    throw new ProviderError('Stub advisor: context digest is not JSON', { retryable: false, cause: err });
  }
  const parsed = digestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`Stub advisor: bad context digest (${parsed.error.issues[0]?.message})`, { retryable: false });
  }
  return parsed.data;
};

/**
 * Offline advisor: a deterministic trend follower over the digest embedded in the prompt.
 * Answers in the same JSON shape a real model is asked for.
 */
export class StubAdvisorClient implements AdvisorClient {
  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new ProviderError('Stub advisor: request aborted', { retryable: true, cause: signal.reason });
    }
    const d = readDigest(prompt);
    if (d.price === null) {
      throw new ProviderError(`Stub advisor: no price for ${d.ticker}`, { retryable: false });
    }
    const price = d.price;
    const factors = [
      `SMA20 ${d.sma20?.toFixed(2) ?? 'n/a'} vs SMA50 ${d.sma50?.toFixed(2) ?? 'n/a'}`,
      `MACD ${d.macd?.toFixed(3) ?? 'n/a'} vs signal ${d.macdSignal?.toFixed(3) ?? 'n/a'}`,
      `RSI14 ${d.rsi14?.toFixed(1) ?? 'n/a'}`
    ];
    const hold = (reasoning: string) =>
      JSON.stringify({
        action: 'HOLD',
        quantity: 0,
        price,
        stop_loss: null,
        take_profit: null,
        reasoning,
        risk_level: 'LOW',
        confidence: 55,
        time_horizon: 'days',
        key_factors: factors
      });

    if (d.sma20 === null || d.sma50 === null || d.macd === null || d.macdSignal === null || d.rsi14 === null) {
      return hold('Not enough indicator history to judge the trend.');
    }
    const uptrend = d.sma20 > d.sma50 && d.macd > d.macdSignal;
    const downtrend = d.sma20 < d.sma50 && d.macd < d.macdSignal;

    if (uptrend && d.rsi14 < 70) {
      const bySize = Math.floor((ENTRY_FRACTION * d.maxPositionSizePct * d.totalValue) / price);
      const byCash = Math.floor(d.cash / (price * 1.001));
      const quantity = Math.min(bySize, byCash);
      if (quantity < 1) return hold('Uptrend, but no capacity for another share.');
      const levels = longProtectiveLevels(price, d);
      return JSON.stringify({
        action: 'BUY',
        quantity,
        price,
        stop_loss: levels.stopLoss,
        take_profit: levels.takeProfit,
        reasoning: `SMA20 above SMA50 with MACD above its signal; RSI ${d.rsi14.toFixed(1)} leaves room to run.`,
        risk_level: 'MEDIUM',
        confidence: 70,
        time_horizon: '1-2 weeks',
        key_factors: factors
      });
    }

    if (downtrend && d.sharesHeld > 0) {
      return JSON.stringify({
        action: 'SELL',
        quantity: Math.ceil(d.sharesHeld / 2),
        price,
        stop_loss: null,
        take_profit: null,
        reasoning: 'SMA20 below SMA50 with MACD below its signal; trimming the position.',
        risk_level: 'MEDIUM',
        confidence: 65,
        time_horizon: 'days',
        key_factors: factors
      });
    }

    return hold('No clear trend.');
  }
}
