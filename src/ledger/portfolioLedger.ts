import {
  EngineConfig,
  Portfolio,
  PortfolioSnapshot,
  Position,
  PositionView,
  TradeAction,
  Transaction,
  User,
  UserSettings
} from '../core/types';
import { ValidationError } from '../core/errors';
import { KeyedMutex } from '../core/keyedMutex';
import { Logger, silentLogger } from '../core/logger';
import { newId, sum } from '../core/utils';
import { SettingsUpdate, applySettingsUpdate } from '../core/schema';
import { TradingStore } from './store.types';

export interface TradeRequest {
  userId: string;
  action: TradeAction;
  ticker: string;
  shares: number;
  price: number;
  commission: number;
  slippage: number;
}

export type TradeError = 'INSUFFICIENT_FUNDS' | 'INSUFFICIENT_SHARES';

export type TradeResult =
  | { ok: true; transaction: Transaction; portfolio: Portfolio; positions: Position[] }
  | { ok: false; error: TradeError; message: string };

/**
 * Receives the finished Transaction and the write that persists it together with the
 * new portfolio state. Whatever the hook does, nothing is saved unless it calls `write`
 * and that call resolves.
 */
export type CommitHook = (transaction: Transaction, write: () => Promise<void>) => Promise<void>;

export interface ApplyTradeOptions {
  recommendationId?: string | null;
  commit?: CommitHook;
}

export interface PortfolioSummary extends PortfolioSnapshot {
  realizedPnl: number;
  pnl: number;
  pnlPct: number;
  transactionCount: number;
}

export interface AccountDefaults {
  initialCapital: number;
  risk: EngineConfig['risk'];
}

export interface OpenAccountResult {
  created: boolean;
  user: User;
  portfolio: Portfolio;
  settings: UserSettings;
}

/** Handle for work already holding a user's ledger lock. */
export interface LedgerSession {
  readonly userId: string;
  applyTrade(request: Omit<TradeRequest, 'userId'>, options?: ApplyTradeOptions): Promise<TradeResult>;
}

export const computeUnrealizedPnL = (position: Pick<Position, 'shares' | 'avgPurchasePrice'>, price: number): number =>
  position.shares * (price - position.avgPurchasePrice);

export const computeTotalValue = (
  cash: number,
  positions: Array<Pick<PositionView, 'shares' | 'currentPrice'>>
): number => cash + sum(positions.map((p) => p.shares * p.currentPrice));

const assertTradeInput = (request: Omit<TradeRequest, 'userId'>) => {
  if (!Number.isInteger(request.shares) || request.shares <= 0) {
    throw new ValidationError(`shares must be a positive integer, got ${request.shares}`, 'shares');
  }
  if (!Number.isFinite(request.price) || request.price <= 0) {
    throw new ValidationError(`price must be positive, got ${request.price}`, 'price');
  }
  if (!(request.commission >= 0) || !(request.slippage >= 0)) {
    throw new ValidationError('commission and slippage must be non-negative', 'commission');
  }
};

/**
 * Owns cash and positions. Every mutation for one user runs under that user's lock,
 * so concurrent trades for the same user apply one after another against fresh state.
 */
export class PortfolioLedger {
  private readonly locks = new KeyedMutex();
  private readonly store: TradingStore;
  private readonly defaults: AccountDefaults;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    store: TradingStore,
    defaults: AccountDefaults,
    options: { now?: () => Date; logger?: Logger } = {}
  ) {
    this.store = store;
    this.defaults = defaults;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger();
  }

  withUserLock<T>(userId: string, fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.locks.runExclusive(userId, () =>
      fn({
        userId,
        applyTrade: (request, options) => this.applyTradeLocked({ ...request, userId }, options)
      })
    );
  }

  applyTrade(request: TradeRequest, options: ApplyTradeOptions = {}): Promise<TradeResult> {
    return this.locks.runExclusive(request.userId, () => this.applyTradeLocked(request, options));
  }

  private async applyTradeLocked(request: TradeRequest, options: ApplyTradeOptions = {}): Promise<TradeResult> {
    assertTradeInput(request);
    const portfolio = await this.requirePortfolio(request.userId);
    const positions = await this.store.listPositions(portfolio.id);
    const timestamp = this.now().toISOString();
    const existing = positions.find((p) => p.ticker === request.ticker);
    const others = positions.filter((p) => p.ticker !== request.ticker);
    const notional = request.shares * request.price;
    const costs = request.commission + request.slippage;

    let cash: number;
    let nextPositions: Position[];
    let totalAmount: number;
    let realizedPnl: number;

    if (request.action === 'BUY') {
      const required = notional + costs;
      if (portfolio.cash < required) {
        return {
          ok: false,
          error: 'INSUFFICIENT_FUNDS',
          message: `Need ${required.toFixed(2)} to buy ${request.shares} ${request.ticker}, have ${portfolio.cash.toFixed(2)}`
        };
      }
      const oldShares = existing?.shares ?? 0;
      const oldAvg = existing?.avgPurchasePrice ?? 0;
      const shares = oldShares + request.shares;
      const updated: Position = {
        portfolioId: portfolio.id,
        ticker: request.ticker,
        shares,
        avgPurchasePrice: (oldShares * oldAvg + notional) / shares,
        openedAt: existing?.openedAt ?? timestamp,
        updatedAt: timestamp
      };
      cash = portfolio.cash - required;
      nextPositions = [...others, updated];
      totalAmount = required;
      realizedPnl = -costs;
    } else {
      const held = existing?.shares ?? 0;
      if (!existing || request.shares > held) {
        return {
          ok: false,
          error: 'INSUFFICIENT_SHARES',
          message: `Cannot sell ${request.shares} ${request.ticker}, holding ${held}`
        };
      }
      const remaining = existing.shares - request.shares;
      const proceeds = notional - costs;
      cash = portfolio.cash + proceeds;
      nextPositions = remaining > 0 ? [...others, { ...existing, shares: remaining, updatedAt: timestamp }] : others;
      totalAmount = proceeds;
      realizedPnl = request.shares * (request.price - existing.avgPurchasePrice) - costs;
    }

    const nextPortfolio: Portfolio = { ...portfolio, cash, updatedAt: timestamp };
    const transaction: Transaction = {
      id: newId('txn'),
      portfolioId: portfolio.id,
      action: request.action,
      ticker: request.ticker,
      shares: request.shares,
      price: request.price,
      commission: request.commission,
      slippage: request.slippage,
      totalAmount,
      realizedPnl,
      recommendationId: options.recommendationId ?? null,
      timestamp
    };

    const write = () => this.store.recordTrade(nextPortfolio, nextPositions, transaction);
    if (options.commit) {
      await options.commit(transaction, write);
    } else {
      await write();
    }

    this.logger.info(
      { userId: request.userId, action: request.action, ticker: request.ticker, shares: request.shares, price: request.price, cash },
      'Trade applied'
    );
    return { ok: true, transaction, portfolio: nextPortfolio, positions: nextPositions };
  }

  /** Creates user, portfolio and default settings; an existing account is returned untouched. */
  async openAccount(
    userId: string,
    options: { initialCapital?: number; username?: string } = {}
  ): Promise<OpenAccountResult> {
    return this.locks.runExclusive(userId, async () => {
      const timestamp = this.now().toISOString();
      const existingUser = await this.store.getUser(userId);
      const existingPortfolio = await this.store.getPortfolioByUser(userId);
      const existingSettings = await this.store.getSettings(userId);
      if (existingUser && existingPortfolio && existingSettings) {
        const touched: User = { ...existingUser, lastActiveAt: timestamp };
        await this.store.saveUser(touched);
        return { created: false, user: touched, portfolio: existingPortfolio, settings: existingSettings };
      }

      const initialCapital = options.initialCapital ?? this.defaults.initialCapital;
      if (!(initialCapital > 0)) {
        throw new ValidationError('initialCapital must be positive', 'initialCapital');
      }
      const user: User = existingUser ?? {
        id: userId,
        username: options.username,
        createdAt: timestamp,
        lastActiveAt: timestamp
      };
      const portfolio: Portfolio = existingPortfolio ?? {
        id: newId('pf'),
        userId,
        cash: initialCapital,
        initialCapital,
        createdAt: timestamp,
        updatedAt: timestamp
      };
      const { riskProfile, maxPositionSizePct, stopLossPct, takeProfitPct, minRiskRewardRatio, autoConfirm } =
        this.defaults.risk;
      const settings: UserSettings = existingSettings ?? {
        userId,
        riskProfile,
        maxPositionSizePct,
        stopLossPct,
        takeProfitPct,
        minRiskRewardRatio,
        autoConfirm,
        updatedAt: timestamp
      };

      await this.store.saveUser(user);
      if (!existingPortfolio) await this.store.savePortfolioState(portfolio, []);
      if (!existingSettings) await this.store.saveSettings(settings);
      this.logger.info({ userId, initialCapital: portfolio.initialCapital }, 'Account opened');
      return { created: true, user, portfolio, settings };
    });
  }

  async hasAccount(userId: string): Promise<boolean> {
    return (await this.store.getPortfolioByUser(userId)) !== undefined;
  }

  async getSettings(userId: string): Promise<UserSettings> {
    const settings = await this.store.getSettings(userId);
    if (!settings) {
      throw new ValidationError(`Unknown user ${userId}`, 'userId');
    }
    return settings;
  }

  async updateSettings(userId: string, update: SettingsUpdate): Promise<UserSettings> {
    return this.locks.runExclusive(userId, async () => {
      const current = await this.getSettings(userId);
      const next = applySettingsUpdate(current, update, this.now());
      await this.store.saveSettings(next);
      this.logger.info({ userId, riskProfile: next.riskProfile }, 'Settings updated');
      return next;
    });
  }

  /** Positions without a quoted price are valued at their average purchase price. */
  async getSnapshot(userId: string, prices: Record<string, number>): Promise<PortfolioSnapshot> {
    const portfolio = await this.requirePortfolio(userId);
    const positions = await this.store.listPositions(portfolio.id);
    const views: PositionView[] = positions
      .slice()
      .sort((a, b) => a.ticker.localeCompare(b.ticker))
      .map((p) => {
        const currentPrice = prices[p.ticker] ?? p.avgPurchasePrice;
        return {
          ticker: p.ticker,
          shares: p.shares,
          avgPurchasePrice: p.avgPurchasePrice,
          currentPrice,
          marketValue: p.shares * currentPrice,
          unrealizedPnl: computeUnrealizedPnL(p, currentPrice)
        };
      });
    return {
      userId,
      portfolioId: portfolio.id,
      cash: portfolio.cash,
      initialCapital: portfolio.initialCapital,
      positions: views,
      totalValue: computeTotalValue(portfolio.cash, views),
      unrealizedPnl: sum(views.map((v) => v.unrealizedPnl))
    };
  }

  async getSummary(userId: string, prices: Record<string, number>): Promise<PortfolioSummary> {
    const snapshot = await this.getSnapshot(userId, prices);
    const transactions = await this.store.listTransactions(snapshot.portfolioId);
    const pnl = snapshot.totalValue - snapshot.initialCapital;
    return {
      ...snapshot,
      realizedPnl: sum(transactions.map((t) => t.realizedPnl)),
      pnl,
      pnlPct: (pnl / snapshot.initialCapital) * 100,
      transactionCount: transactions.length
    };
  }

  async getTransactionHistory(userId: string, limit?: number): Promise<Transaction[]> {
    const portfolio = await this.requirePortfolio(userId);
    return this.store.listTransactions(portfolio.id, limit);
  }

  private async requirePortfolio(userId: string): Promise<Portfolio> {
    const portfolio = await this.store.getPortfolioByUser(userId);
    if (!portfolio) {
      throw new ValidationError(`No portfolio for user ${userId}`, 'userId');
    }
    return portfolio;
  }
}
