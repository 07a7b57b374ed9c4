import { AnalysisContext, ContextIssue, EngineConfig, NewsItem, PriceBar, TechnicalIndicators } from '../core/types';
import { MarketDataProvider } from '../data/marketData.types';
import { NewsProvider } from '../data/news.types';
import { PortfolioLedger } from '../ledger/portfolioLedger';
import { computeSessionClock } from '../core/time';
import { Logger, silentLogger } from '../core/logger';
import { errorMessage, untilAborted } from '../core/utils';

export interface ContextBuilderDeps {
  ledger: PortfolioLedger;
  marketData: MarketDataProvider;
  news: NewsProvider;
  config: Pick<EngineConfig, 'session' | 'context'>;
  now?: () => Date;
  logger?: Logger;
}

type Fetched<T> = { ok: true; value: T } | { ok: false; message: string };

const attempt = async <T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<Fetched<T>> => {
  try {
    return { ok: true, value: await (signal ? untilAborted(fn(), signal) : fn()) };
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }
};

/**
 * Gathers everything the advisor sees for one user and ticker. Missing market inputs
 * become issues on the context rather than errors; only an unknown user fails.
 * A feed still outstanding when `signal` aborts is reported the same way.
 */
export class ContextBuilder {
  private readonly deps: ContextBuilderDeps;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: ContextBuilderDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? silentLogger();
  }

  async build(userId: string, ticker: string, signal?: AbortSignal): Promise<AnalysisContext> {
    const { marketData, news, ledger, config } = this.deps;
    const asOf = this.now();
    const settings = await ledger.getSettings(userId);

    const [price, bars, indicators, headlines] = await Promise.all([
      attempt(() => marketData.currentPrice(ticker), signal),
      attempt(() => marketData.dailyOHLCV(ticker, config.context.barsLookbackDays), signal),
      attempt(() => marketData.technicalIndicators(ticker), signal),
      attempt(() => news.recentNews(ticker, config.context.newsLimit), signal)
    ]);

    const issues: ContextIssue[] = [];
    let currentPrice: number | undefined;
    if (price.ok && Number.isFinite(price.value) && price.value > 0) {
      currentPrice = price.value;
    } else {
      issues.push({
        code: 'PRICE_UNAVAILABLE',
        severity: 'error',
        message: price.ok ? `Invalid price ${price.value}` : price.message
      });
    }
    let priceBars: PriceBar[] = [];
    if (bars.ok) {
      priceBars = bars.value;
      if (!priceBars.length) {
        issues.push({ code: 'BARS_EMPTY', severity: 'warn', message: `No daily bars for ${ticker}` });
      }
    } else {
      issues.push({ code: 'BARS_UNAVAILABLE', severity: 'warn', message: bars.message });
    }
    let techs: TechnicalIndicators | undefined;
    if (indicators.ok) {
      techs = indicators.value;
    } else {
      issues.push({ code: 'INDICATORS_UNAVAILABLE', severity: 'warn', message: indicators.message });
    }
    let newsItems: NewsItem[] = [];
    if (headlines.ok) {
      newsItems = headlines.value;
    } else {
      issues.push({ code: 'NEWS_UNAVAILABLE', severity: 'warn', message: headlines.message });
    }

    const portfolio = await ledger.getSnapshot(userId, currentPrice !== undefined ? { [ticker]: currentPrice } : {});
    if (issues.length) {
      this.logger.warn({ userId, ticker, issues: issues.map((i) => i.code) }, 'Context built with gaps');
    }

    return {
      userId,
      ticker,
      asOf: asOf.toISOString(),
      portfolio,
      settings,
      currentPrice,
      bars: priceBars,
      indicators: techs,
      news: newsItems,
      session: computeSessionClock(asOf, config.session),
      issues
    };
  }
}
