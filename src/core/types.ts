import { PriceBar, TechnicalIndicators } from '../data/marketData.types';

export { PriceBar, TechnicalIndicators };

export type TradeAction = 'BUY' | 'SELL';
export type RecommendationAction = TradeAction | 'HOLD';
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type RecommendationStatus = 'pending' | 'confirmed' | 'rejected' | 'expired';
export type RecommendationSource = 'advisor' | 'heuristic' | 'default';
export type RiskProfile = 'conservative' | 'moderate' | 'aggressive';

export interface User {
  id: string;
  username?: string;
  createdAt: string;
  lastActiveAt: string;
}

export interface Portfolio {
  id: string;
  userId: string;
  cash: number;
  initialCapital: number;
  createdAt: string;
  updatedAt: string;
}

export interface Position {
  portfolioId: string;
  ticker: string;
  shares: number;
  avgPurchasePrice: number;
  openedAt: string;
  updatedAt: string;
}

export interface Transaction {
  id: string;
  portfolioId: string;
  action: TradeAction;
  ticker: string;
  shares: number;
  price: number;
  commission: number;
  slippage: number;
  totalAmount: number; // cash moved, sign-free
  realizedPnl: number;
  recommendationId: string | null;
  timestamp: string;
}

export interface Recommendation {
  id: string;
  userId: string;
  ticker: string;
  action: RecommendationAction;
  quantity: number;
  price: number;
  stopLoss: number | null;
  takeProfit: number | null;
  reasoning: string;
  riskLevel: RiskLevel;
  confidence: number;
  timeHorizon?: string;
  keyFactors: string[];
  status: RecommendationStatus;
  source: RecommendationSource;
  violations: RiskViolationCode[];
  createdAt: string;
  expiresAt: string;
  resolvedAt?: string;
}

export interface UserSettings {
  userId: string;
  riskProfile: RiskProfile;
  maxPositionSizePct: number;
  stopLossPct: number;
  takeProfitPct: number;
  minRiskRewardRatio: number;
  autoConfirm: boolean;
  updatedAt: string;
}

export type RiskLimits = Pick<
  UserSettings,
  'maxPositionSizePct' | 'stopLossPct' | 'takeProfitPct' | 'minRiskRewardRatio'
>;

export interface PositionView {
  ticker: string;
  shares: number;
  avgPurchasePrice: number;
  currentPrice: number;
  marketValue: number;
  unrealizedPnl: number;
}

export interface PortfolioSnapshot {
  userId: string;
  portfolioId: string;
  cash: number;
  initialCapital: number;
  positions: PositionView[];
  totalValue: number;
  unrealizedPnl: number;
}

export interface SessionClock {
  isTradingDay: boolean;
  minutesSinceOpen: number;
  minutesUntilClose: number;
}

export type RiskViolationCode =
  | 'POSITION_SIZE'
  | 'STOP_LOSS_TOO_TIGHT'
  | 'TAKE_PROFIT_TOO_LOW'
  | 'RISK_REWARD'
  | 'SESSION_BLACKOUT'
  | 'INSUFFICIENT_INVENTORY';

export interface RiskViolation {
  code: RiskViolationCode;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  violations: RiskViolation[];
}

/**
 * A trade idea before it becomes a persisted Recommendation: what the advisor,
 * the heuristic or the conservative default produced.
 */
export interface ProposalDraft {
  action: RecommendationAction;
  quantity: number;
  price: number;
  stopLoss: number | null;
  takeProfit: number | null;
  reasoning: string;
  riskLevel: RiskLevel;
  confidence: number;
  timeHorizon?: string;
  keyFactors: string[];
}

export interface NewsItem {
  title: string;
  publishedAt: string;
  source?: string;
  sentiment?: number; // -1..1, pre-computed upstream
}

export type ContextIssueSeverity = 'warn' | 'error';

export interface ContextIssue {
  code: string;
  severity: ContextIssueSeverity;
  message: string;
}

export interface AnalysisContext {
  userId: string;
  ticker: string;
  asOf: string;
  portfolio: PortfolioSnapshot;
  settings: UserSettings;
  currentPrice?: number;
  bars: PriceBar[];
  indicators?: TechnicalIndicators;
  news: NewsItem[];
  session: SessionClock;
  issues: ContextIssue[];
}

export interface EngineConfig {
  defaultTicker: string;
  initialCapital: number;
  risk: RiskLimits & { riskProfile: RiskProfile; autoConfirm: boolean };
  session: {
    timezone: string;
    open: string; // HH:mm
    close: string; // HH:mm
    tradingDays: number[]; // 0 = Sunday
    blackoutMinutes: number;
  };
  execution: {
    commissionRate: number;
    slippageBps: number;
    persistenceRetries: number;
    persistenceRetryDelayMs: number;
  };
  advisor: {
    maxAttempts: number;
    baseDelayMs: number;
    capDelayMs: number;
    attemptTimeoutMs: number;
    deadlineMs: number;
    // advisor prices further than this fraction from the quote are discarded
    maxPriceDeviationPct: number;
    model: string;
    baseUrl: string;
    temperature: number;
    maxTokens: number;
  };
  cache: {
    ttlMinutes: number;
  };
  recommendations: {
    ttlMinutes: number;
    sweepIntervalSeconds: number;
    historyLimit: number;
  };
  context: {
    barsLookbackDays: number;
    newsLimit: number;
  };
  api: {
    port: number;
    bind: string;
  };
}
