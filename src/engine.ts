import { EngineConfig } from './core/types';
import { loadConfig } from './core/config';
import { Logger, createLogger } from './core/logger';
import { errorMessage } from './core/utils';
import { MarketDataProvider } from './data/marketData.types';
import { StubMarketDataProvider } from './data/marketData.stub';
import { EmptyNewsProvider, NewsProvider } from './data/news.types';
import { TradingStore } from './ledger/store.types';
import { JsonFileStore } from './ledger/storage';
import { PortfolioLedger, PortfolioSummary } from './ledger/portfolioLedger';
import { ContextBuilder } from './context/contextBuilder';
import { AdvisorClient } from './strategy/advisor.types';
import { StubAdvisorClient } from './strategy/advisor.stub';
import { getAdvisorClient } from './strategy/openaiClient';
import { RecommendationProvider } from './strategy/recommendationProvider';
import { TradeExecutor } from './execution/tradeExecutor';
import { PerformanceSummary, summarizePerformance } from './analytics/performance';

export interface Engine {
  config: EngineConfig;
  logger: Logger;
  store: TradingStore;
  marketData: MarketDataProvider;
  ledger: PortfolioLedger;
  provider: RecommendationProvider;
  executor: TradeExecutor;
}

export interface BuildEngineOptions {
  config?: EngineConfig;
  store?: TradingStore;
  marketData?: MarketDataProvider;
  news?: NewsProvider;
  advisor?: AdvisorClient;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/** Wires every component explicitly; nothing here is a module-level singleton. */
export const buildEngine = (options: BuildEngineOptions = {}): Engine => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger();
  const now = options.now ?? (() => new Date());
  const store = options.store ?? new JsonFileStore();
  const marketData = options.marketData ?? new StubMarketDataProvider({ now });
  const advisor = options.advisor ?? getAdvisorClient(config.advisor) ?? new StubAdvisorClient();

  const ledger = new PortfolioLedger(
    store,
    { initialCapital: config.initialCapital, risk: config.risk },
    { now, logger: logger.child({ component: 'ledger' }) }
  );
  const contextBuilder = new ContextBuilder({
    ledger,
    marketData,
    news: options.news ?? new EmptyNewsProvider(),
    config,
    now,
    logger: logger.child({ component: 'context' })
  });
  const provider = new RecommendationProvider({
    store,
    ledger,
    contextBuilder,
    advisor,
    config,
    now,
    sleep: options.sleep,
    logger: logger.child({ component: 'provider' })
  });
  const executor = new TradeExecutor({
    store,
    ledger,
    config,
    now,
    sleep: options.sleep,
    logger: logger.child({ component: 'executor' })
  });

  return { config, logger, store, marketData, ledger, provider, executor };
};

export interface PortfolioReport {
  summary: PortfolioSummary;
  performance: PerformanceSummary;
}

/** Portfolio summary priced at current quotes, plus realized performance. */
export const buildPortfolioReport = async (engine: Engine, userId: string): Promise<PortfolioReport> => {
  const snapshot = await engine.ledger.getSnapshot(userId, {});
  const tickers = new Set([engine.config.defaultTicker, ...snapshot.positions.map((p) => p.ticker)]);
  const prices: Record<string, number> = {};
  for (const ticker of tickers) {
    try {
      prices[ticker] = await engine.marketData.currentPrice(ticker);
    } catch (err) {
      engine.logger.warn({ ticker, err: errorMessage(err) }, 'No quote; valuing at cost');
    }
  }
  const summary = await engine.ledger.getSummary(userId, prices);
  const transactions = await engine.ledger.getTransactionHistory(userId);
  return { summary, performance: summarizePerformance(transactions, summary.initialCapital) };
};

export * from './core/types';
export { ValidationError, ProviderError, ParseError, PersistenceError, DeadlineExceededError } from './core/errors';
export { MemoryStore } from './ledger/memoryStore';
export { JsonFileStore } from './ledger/storage';
export { RecommendationCache } from './cache/recommendationCache';
export { validateRisk, applyRiskDowngrade } from './risk/riskEngine';
export { parseAdvisorResponse } from './strategy/responseValidator';
export type { ExecutionResult, ExecutionError } from './execution/tradeExecutor';
