import {
  Portfolio,
  Position,
  Recommendation,
  RecommendationStatus,
  Transaction,
  User,
  UserSettings
} from '../core/types';
import { PersistenceError } from '../core/errors';
import { TradingStore } from './store.types';

export interface StoreState {
  users: User[];
  portfolios: Portfolio[];
  positions: Position[];
  transactions: Transaction[];
  recommendations: Recommendation[];
  settings: UserSettings[];
}

export const emptyStoreState = (): StoreState => ({
  users: [],
  portfolios: [],
  positions: [],
  transactions: [],
  recommendations: [],
  settings: []
});

const byTimestampDesc = <T>(rows: T[], key: (row: T) => string): T[] =>
  rows.slice().sort((a, b) => (key(a) < key(b) ? 1 : key(a) > key(b) ? -1 : 0));

/**
 * In-process store. Every read hands out copies so callers can never mutate stored
 * rows behind the store's back. Subclasses persist by overriding `commit`.
 */
export class MemoryStore implements TradingStore {
  protected state: StoreState;

  constructor(initial: StoreState = emptyStoreState()) {
    this.state = structuredClone(initial);
  }

  protected commit(): void {
    // in-memory only
  }

  // Applies a change and flushes it; a failed flush rolls the change back.
  protected mutate(apply: (state: StoreState) => void): void {
    const before = structuredClone(this.state);
    apply(this.state);
    try {
      this.commit();
    } catch (err) {
      this.state = before;
      throw new PersistenceError('Store write failed', err);
    }
  }

  async getUser(userId: string): Promise<User | undefined> {
    const user = this.state.users.find((u) => u.id === userId);
    return user ? structuredClone(user) : undefined;
  }

  async saveUser(user: User): Promise<void> {
    this.mutate((state) => {
      state.users = state.users.filter((u) => u.id !== user.id).concat(structuredClone(user));
    });
  }

  async getPortfolioByUser(userId: string): Promise<Portfolio | undefined> {
    const portfolio = this.state.portfolios.find((p) => p.userId === userId);
    return portfolio ? structuredClone(portfolio) : undefined;
  }

  async listPositions(portfolioId: string): Promise<Position[]> {
    return structuredClone(this.state.positions.filter((p) => p.portfolioId === portfolioId));
  }

  private checkPositions(portfolio: Portfolio, positions: Position[]) {
    const tickers = new Set<string>();
    for (const position of positions) {
      if (position.portfolioId !== portfolio.id) {
        throw new Error(`Position ${position.ticker} belongs to portfolio ${position.portfolioId}, not ${portfolio.id}`);
      }
      if (tickers.has(position.ticker)) {
        throw new Error(`Duplicate position for ${position.ticker} in portfolio ${portfolio.id}`);
      }
      tickers.add(position.ticker);
    }
  }

  private checkNewTransaction(transaction: Transaction) {
    if (this.state.transactions.some((t) => t.id === transaction.id)) {
      throw new Error(`Transaction ${transaction.id} already exists`);
    }
  }

  private static replacePortfolio(state: StoreState, portfolio: Portfolio, positions: Position[]) {
    state.portfolios = state.portfolios.filter((p) => p.id !== portfolio.id).concat(structuredClone(portfolio));
    state.positions = state.positions.filter((p) => p.portfolioId !== portfolio.id).concat(structuredClone(positions));
  }

  async savePortfolioState(portfolio: Portfolio, positions: Position[]): Promise<void> {
    this.checkPositions(portfolio, positions);
    this.mutate((state) => MemoryStore.replacePortfolio(state, portfolio, positions));
  }

  async recordTrade(portfolio: Portfolio, positions: Position[], transaction: Transaction): Promise<void> {
    this.checkPositions(portfolio, positions);
    this.checkNewTransaction(transaction);
    this.mutate((state) => {
      MemoryStore.replacePortfolio(state, portfolio, positions);
      state.transactions.push(structuredClone(transaction));
    });
  }

  async listTransactions(portfolioId: string, limit?: number): Promise<Transaction[]> {
    const rows = byTimestampDesc(
      this.state.transactions.filter((t) => t.portfolioId === portfolioId),
      (t) => t.timestamp
    );
    return structuredClone(limit === undefined ? rows : rows.slice(0, limit));
  }

  async insertRecommendation(recommendation: Recommendation): Promise<void> {
    if (this.state.recommendations.some((r) => r.id === recommendation.id)) {
      throw new Error(`Recommendation ${recommendation.id} already exists`);
    }
    this.mutate((state) => {
      state.recommendations.push(structuredClone(recommendation));
    });
  }

  async getRecommendation(id: string): Promise<Recommendation | undefined> {
    const rec = this.state.recommendations.find((r) => r.id === id);
    return rec ? structuredClone(rec) : undefined;
  }

  async transitionRecommendation(
    id: string,
    from: RecommendationStatus,
    to: RecommendationStatus,
    at: string
  ): Promise<boolean> {
    const current = this.state.recommendations.find((r) => r.id === id);
    if (!current || current.status !== from) return false;
    this.mutate((state) => {
      const rec = state.recommendations.find((r) => r.id === id);
      if (!rec) return;
      rec.status = to;
      if (to === 'pending') {
        delete rec.resolvedAt;
      } else {
        rec.resolvedAt = at;
      }
    });
    return true;
  }

  async listRecommendations(userId: string, limit?: number): Promise<Recommendation[]> {
    const rows = byTimestampDesc(
      this.state.recommendations.filter((r) => r.userId === userId),
      (r) => r.createdAt
    );
    return structuredClone(limit === undefined ? rows : rows.slice(0, limit));
  }

  async listPendingRecommendations(): Promise<Recommendation[]> {
    return structuredClone(this.state.recommendations.filter((r) => r.status === 'pending'));
  }

  async getSettings(userId: string): Promise<UserSettings | undefined> {
    const settings = this.state.settings.find((s) => s.userId === userId);
    return settings ? structuredClone(settings) : undefined;
  }

  async saveSettings(settings: UserSettings): Promise<void> {
    this.mutate((state) => {
      state.settings = state.settings.filter((s) => s.userId !== settings.userId).concat(structuredClone(settings));
    });
  }
}
