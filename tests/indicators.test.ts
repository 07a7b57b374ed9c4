import { computeIndicators, macd, rsi, sma } from '../src/data/indicators';
import { StubMarketDataProvider } from '../src/data/marketData.stub';
import { PriceBar } from '../src/core/types';
import { SESSION_NOW } from './helpers';

const barsFrom = (closes: number[]): PriceBar[] =>
  closes.map((close, i) => ({
    date: new Date(Date.UTC(2026, 0, 1 + i)).toISOString().slice(0, 10),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000 + i
  }));

describe('technical indicators', () => {
  it('averages the trailing window', () => {
    expect(sma([1, 2, 3, 4], 2)).toBe(3.5);
    expect(sma([2, 4], 20)).toBe(3);
    expect(sma([], 3)).toBeUndefined();
  });

  it('needs period + 1 closes for RSI', () => {
    expect(rsi(new Array(14).fill(100))).toBeUndefined();
  });

  it('reads 100 for a straight rally, 0 for a straight decline and 50 for a flat tape', () => {
    const rally = Array.from({ length: 15 }, (_, i) => 100 + i);
    const decline = Array.from({ length: 15 }, (_, i) => 100 - i);
    expect(rsi(rally)).toBe(100);
    expect(rsi(decline)).toBe(0);
    expect(rsi(new Array(15).fill(100))).toBe(50);
  });

  it('gives a zero MACD on a constant series', () => {
    expect(macd(new Array(40).fill(10))).toEqual({ macd: 0, signal: 0, histogram: 0 });
  });

  it('computes the full indicator set from bars regardless of their order', () => {
    const bars = barsFrom(new Array(30).fill(50)).reverse();
    const ind = computeIndicators(bars);
    expect(ind).toEqual({
      rsi14: 50,
      macd: 0,
      macdSignal: 0,
      sma20: 50,
      sma50: 50,
      sma200: 50,
      volumeAvg: 1019.5
    });
    expect(computeIndicators(barsFrom([1, 2, 3]))).toBeUndefined();
  });
});

describe('StubMarketDataProvider', () => {
  it('is deterministic for a ticker and day', async () => {
    const a = new StubMarketDataProvider({ now: () => SESSION_NOW });
    const b = new StubMarketDataProvider({ now: () => SESSION_NOW });
    const price = await a.currentPrice('GAZP');
    expect(await b.currentPrice('GAZP')).toBe(price);
    const bars = await a.dailyOHLCV('GAZP', 30);
    expect(bars).toHaveLength(30);
    expect(bars[29].close).toBe(price);
    expect(bars[29].date).toBe('2026-10-14');
  });

  it('derives indicators from its own history', async () => {
    const md = new StubMarketDataProvider({ now: () => SESSION_NOW });
    const ind = await md.technicalIndicators('SBER');
    expect(ind.rsi14).toBeGreaterThanOrEqual(0);
    expect(ind.rsi14).toBeLessThanOrEqual(100);
  });
});
