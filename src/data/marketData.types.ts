export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface TechnicalIndicators {
  rsi14: number;
  macd: number;
  macdSignal: number;
  sma20: number;
  sma50: number;
  sma200: number;
  volumeAvg: number;
}

export interface MarketDataProvider {
  currentPrice(ticker: string): Promise<number>;
  dailyOHLCV(ticker: string, lookbackDays: number): Promise<PriceBar[]>;
  technicalIndicators(ticker: string): Promise<TechnicalIndicators>;
}
