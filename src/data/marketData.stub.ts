import { MarketDataProvider, PriceBar, TechnicalIndicators } from './marketData.types';
import { computeIndicators } from './indicators';
import { formatISODate } from '../core/time';
import { hashString, mulberry32 } from '../core/utils';

// Static anchors keep stub runs repeatable and in a realistic range.
const priceOverrides: Record<string, number> = {
  GAZP: 170,
  SBER: 290,
  LKOH: 7000,
  ROSN: 560
};

const HISTORY_DAYS = 260;

const basePriceForSymbol = (symbol: string): number => {
  if (priceOverrides[symbol] !== undefined) return priceOverrides[symbol];
  const rng = mulberry32(hashString(symbol));
  return 50 + rng() * 150;
};

export interface StubMarketDataOptions {
  now?: () => Date;
  historyDays?: number;
}

/**
 * Seeded random walk per ticker and calendar day: the same ticker on the same day
 * always yields the same bars, so recommendations are reproducible offline.
 */
export class StubMarketDataProvider implements MarketDataProvider {
  private readonly now: () => Date;
  private readonly historyDays: number;

  constructor(options: StubMarketDataOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.historyDays = options.historyDays ?? HISTORY_DAYS;
  }

  async currentPrice(ticker: string): Promise<number> {
    const bars = this.generateBars(ticker);
    return bars[bars.length - 1].close;
  }

  async dailyOHLCV(ticker: string, lookbackDays: number): Promise<PriceBar[]> {
    return this.generateBars(ticker).slice(-Math.max(1, lookbackDays));
  }

  async technicalIndicators(ticker: string): Promise<TechnicalIndicators> {
    const indicators = computeIndicators(this.generateBars(ticker));
    if (!indicators) {
      throw new Error(`Not enough history to compute indicators for ${ticker}`);
    }
    return indicators;
  }

  private generateBars(ticker: string): PriceBar[] {
    const end = this.now();
    const endDay = formatISODate(end);
    const rng = mulberry32(hashString(`${ticker}-${endDay}`));
    const bars: PriceBar[] = [];
    let close = basePriceForSymbol(ticker);
    for (let i = this.historyDays - 1; i >= 0; i--) {
      const date = new Date(end);
      date.setUTCDate(date.getUTCDate() - i);
      const open = close;
      const change = (rng() - 0.5) * 0.04; // +/-2% daily move
      close = Math.max(1, open * (1 + change));
      const high = Math.max(open, close) * (1 + rng() * 0.01);
      const low = Math.min(open, close) * (1 - rng() * 0.01);
      const volume = Math.round(10_000_000 + rng() * 20_000_000);
      bars.push({
        date: formatISODate(date),
        open: Number(open.toFixed(2)),
        high: Number(high.toFixed(2)),
        low: Number(low.toFixed(2)),
        close: Number(close.toFixed(2)),
        volume
      });
    }
    return bars;
  }
}
