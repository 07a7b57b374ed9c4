import {
  Portfolio,
  Position,
  Recommendation,
  RecommendationStatus,
  Transaction,
  User,
  UserSettings
} from '../core/types';

/**
 * Persistence collaborator. Records reference each other by id only:
 * Portfolio -> User, Position -> Portfolio (unique per ticker),
 * Transaction -> Portfolio and optionally -> Recommendation, Recommendation -> User.
 */
export interface TradingStore {
  getUser(userId: string): Promise<User | undefined>;
  saveUser(user: User): Promise<void>;

  getPortfolioByUser(userId: string): Promise<Portfolio | undefined>;
  listPositions(portfolioId: string): Promise<Position[]>;
  /** Replaces the portfolio row and the full set of its positions in one write. */
  savePortfolioState(portfolio: Portfolio, positions: Position[]): Promise<void>;

  /** Persists a trade in one write: the portfolio row, all its positions and the Transaction. */
  recordTrade(portfolio: Portfolio, positions: Position[], transaction: Transaction): Promise<void>;
  /** Newest first. */
  listTransactions(portfolioId: string, limit?: number): Promise<Transaction[]>;

  insertRecommendation(recommendation: Recommendation): Promise<void>;
  getRecommendation(id: string): Promise<Recommendation | undefined>;
  /**
   * Compare-and-swap on status: succeeds only when the stored status equals `from`.
   * Leaving `pending` stamps resolvedAt with `at`; returning to `pending` clears it.
   */
  transitionRecommendation(
    id: string,
    from: RecommendationStatus,
    to: RecommendationStatus,
    at: string
  ): Promise<boolean>;
  /** Newest first. */
  listRecommendations(userId: string, limit?: number): Promise<Recommendation[]>;
  listPendingRecommendations(): Promise<Recommendation[]>;

  getSettings(userId: string): Promise<UserSettings | undefined>;
  saveSettings(settings: UserSettings): Promise<void>;
}
