import { PriceBar, TechnicalIndicators } from './marketData.types';

export const RSI_PERIOD = 14;
export const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL = 9;
const VOLUME_WINDOW = 20;

// Trailing mean over the last `window` values; shorter series use what they have.
export const sma = (values: number[], window: number): number | undefined => {
  if (!values.length || window <= 0) return undefined;
  const tail = values.slice(-window);
  return tail.reduce((a, b) => a + b, 0) / tail.length;
};

// Recursive EMA seeded with the first value (no bias adjustment).
export const emaSeries = (values: number[], alpha: number): number[] => {
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
};

const spanAlpha = (span: number) => 2 / (span + 1);

/**
 * Wilder RSI: gains and losses smoothed with alpha = 1/period.
 * Needs at least `period` price changes; a flat loss side reads 100, a flat gain side 0.
 */
export const rsi = (closes: number[], period = RSI_PERIOD): number | undefined => {
  if (closes.length < period + 1) return undefined;
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    gains.push(Math.max(0, delta));
    losses.push(Math.max(0, -delta));
  }
  const avgGain = emaSeries(gains, 1 / period).at(-1) ?? 0;
  const avgLoss = emaSeries(losses, 1 / period).at(-1) ?? 0;
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  if (avgGain === 0) return 0;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};

export const macd = (
  closes: number[],
  fast = MACD_FAST,
  slow = MACD_SLOW,
  signal = MACD_SIGNAL
): { macd: number; signal: number; histogram: number } | undefined => {
  if (!closes.length) return undefined;
  const fastLine = emaSeries(closes, spanAlpha(fast));
  const slowLine = emaSeries(closes, spanAlpha(slow));
  const line = fastLine.map((v, i) => v - slowLine[i]);
  const signalLine = emaSeries(line, spanAlpha(signal));
  const last = line[line.length - 1];
  const lastSignal = signalLine[signalLine.length - 1];
  return { macd: last, signal: lastSignal, histogram: last - lastSignal };
};

export const computeIndicators = (bars: PriceBar[]): TechnicalIndicators | undefined => {
  const sorted = [...bars].sort((a, b) => (a.date < b.date ? -1 : 1));
  const closes = sorted.map((b) => b.close);
  const rsi14 = rsi(closes);
  const macdResult = macd(closes);
  const sma20 = sma(closes, 20);
  const sma50 = sma(closes, 50);
  const sma200 = sma(closes, 200);
  const volumeAvg = sma(
    sorted.map((b) => b.volume),
    VOLUME_WINDOW
  );
  if (
    rsi14 === undefined ||
    macdResult === undefined ||
    sma20 === undefined ||
    sma50 === undefined ||
    sma200 === undefined ||
    volumeAvg === undefined
  ) {
    return undefined;
  }
  return {
    rsi14,
    macd: macdResult.macd,
    macdSignal: macdResult.signal,
    sma20,
    sma50,
    sma200,
    volumeAvg
  };
};
