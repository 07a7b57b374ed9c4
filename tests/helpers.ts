import path from 'path';
import { loadConfig } from '../src/core/config';
import {
  EngineConfig,
  PortfolioSnapshot,
  PositionView,
  PriceBar,
  SessionClock,
  TechnicalIndicators,
  UserSettings
} from '../src/core/types';
import { MarketDataProvider } from '../src/data/marketData.types';
import { AdvisorClient } from '../src/strategy/advisor.types';
import { MemoryStore } from '../src/ledger/memoryStore';
import { BuildEngineOptions, Engine, buildEngine } from '../src/engine';
import { silentLogger } from '../src/core/logger';

// Wednesday, 12:00 in Moscow: two hours into the session.
export const SESSION_NOW = new Date('2026-10-14T09:00:00Z');

export const OPEN_SESSION: SessionClock = { isTradingDay: true, minutesSinceOpen: 120, minutesUntilClose: 405 };

export const testConfig = (): EngineConfig => {
  const base = loadConfig(path.resolve(__dirname, '../src/config/default.json'), {});
  return {
    ...base,
    advisor: { ...base.advisor, baseDelayMs: 1, capDelayMs: 4, attemptTimeoutMs: 1000, deadlineMs: 2000 },
    execution: { ...base.execution, persistenceRetryDelayMs: 0 }
  };
};

export const manualClock = (start: Date = SESSION_NOW) => {
  let t = start.getTime();
  return {
    now: () => new Date(t),
    advance: (ms: number) => {
      t += ms;
    }
  };
};

export const moderateSettings = (overrides: Partial<UserSettings> = {}): UserSettings => ({
  userId: 'u1',
  riskProfile: 'moderate',
  maxPositionSizePct: 0.3,
  stopLossPct: 0.05,
  takeProfitPct: 0.1,
  minRiskRewardRatio: 2,
  autoConfirm: false,
  updatedAt: SESSION_NOW.toISOString(),
  ...overrides
});

export const snapshot = (cash: number, positions: PositionView[] = []): PortfolioSnapshot => {
  const marketValue = positions.reduce((acc, p) => acc + p.marketValue, 0);
  return {
    userId: 'u1',
    portfolioId: 'pf_1',
    cash,
    initialCapital: 100000,
    positions,
    totalValue: cash + marketValue,
    unrealizedPnl: positions.reduce((acc, p) => acc + p.unrealizedPnl, 0)
  };
};

export const neutralIndicators = (overrides: Partial<TechnicalIndicators> = {}): TechnicalIndicators => ({
  rsi14: 50,
  macd: 0.5,
  macdSignal: 0.4,
  sma20: 168,
  sma50: 165,
  sma200: 160,
  volumeAvg: 20_000_000,
  ...overrides
});

export class FakeMarketData implements MarketDataProvider {
  price: number | Error;
  indicators: TechnicalIndicators | Error;
  bars: PriceBar[] = [];
  priceCalls = 0;

  constructor(price: number | Error = 170, indicators: TechnicalIndicators | Error = neutralIndicators()) {
    this.price = price;
    this.indicators = indicators;
  }

  async currentPrice(_ticker: string): Promise<number> {
    this.priceCalls += 1;
    if (this.price instanceof Error) throw this.price;
    return this.price;
  }

  async dailyOHLCV(_ticker: string, _lookbackDays: number): Promise<PriceBar[]> {
    return this.bars;
  }

  async technicalIndicators(_ticker: string): Promise<TechnicalIndicators> {
    if (this.indicators instanceof Error) throw this.indicators;
    return this.indicators;
  }
}

type Scripted = string | Error | ((signal?: AbortSignal) => Promise<string>);

/** Plays back responses in order; the last one repeats once the script runs out. */
export class ScriptedAdvisor implements AdvisorClient {
  calls = 0;
  prompts: string[] = [];
  private readonly script: Scripted[];

  constructor(...script: Scripted[]) {
    this.script = script;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    this.calls += 1;
    this.prompts.push(prompt);
    const step = this.script[Math.min(this.calls - 1, this.script.length - 1)];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(signal);
    return step;
  }
}

export const advisorJson = (fields: Record<string, unknown>): string =>
  JSON.stringify({
    action: 'HOLD',
    quantity: 0,
    price: 170,
    stop_loss: null,
    take_profit: null,
    reasoning: 'test',
    risk_level: 'MEDIUM',
    confidence: 70,
    time_horizon: 'days',
    key_factors: [],
    ...fields
  });

// 150 x 170 = 25,500: inside the 30% size limit with valid protective levels.
export const ACCEPTABLE_BUY = advisorJson({
  action: 'BUY',
  quantity: 150,
  price: 170,
  stop_loss: 161.5,
  take_profit: 187,
  reasoning: 'Trend intact'
});

export const testEngine = (options: BuildEngineOptions = {}): Engine =>
  buildEngine({
    config: testConfig(),
    store: new MemoryStore(),
    marketData: new FakeMarketData(),
    advisor: new ScriptedAdvisor(ACCEPTABLE_BUY),
    now: () => SESSION_NOW,
    sleep: async () => undefined,
    logger: silentLogger(),
    ...options
  });
