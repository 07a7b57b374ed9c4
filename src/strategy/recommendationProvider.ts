import {
  AnalysisContext,
  EngineConfig,
  ProposalDraft,
  Recommendation,
  RecommendationSource
} from '../core/types';
import { DeadlineExceededError, ParseError, ValidationError } from '../core/errors';
import { Logger, silentLogger } from '../core/logger';
import { tickerSchema, userIdSchema } from '../core/schema';
import { addMinutes } from '../core/time';
import { errorMessage, linkedTimeoutSignal, newId, sleep as defaultSleep, untilAborted } from '../core/utils';
import { RecommendationCache, cacheKey } from '../cache/recommendationCache';
import { ContextBuilder } from '../context/contextBuilder';
import { PortfolioLedger } from '../ledger/portfolioLedger';
import { TradingStore } from '../ledger/store.types';
import { applyRiskDowngrade, validateRisk } from '../risk/riskEngine';
import { AdvisorClient } from './advisor.types';
import { defaultProposal, heuristicProposal } from './heuristic';
import { buildAdvisorPrompt } from './llmPrompt';
import { parseAdvisorResponse } from './responseValidator';
import { RetryPolicy, retryPolicyFromConfig, withRetry } from './retryPolicy';

export interface RecommendationProviderDeps {
  store: TradingStore;
  ledger: PortfolioLedger;
  contextBuilder: ContextBuilder;
  advisor: AdvisorClient;
  config: EngineConfig;
  cache?: RecommendationCache<Recommendation>;
  retryPolicy?: RetryPolicy;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export type RejectResult =
  | { ok: true; recommendation: Recommendation }
  | { ok: false; error: 'NOT_FOUND' | 'EXPIRED' | 'ALREADY_RESOLVED'; message: string };

const parseInput = (userId: string, ticker: string): { userId: string; ticker: string } => {
  const user = userIdSchema.safeParse(userId);
  if (!user.success) {
    throw new ValidationError(`Invalid userId: ${user.error.issues[0]?.message}`, 'userId');
  }
  const symbol = tickerSchema.safeParse(ticker);
  if (!symbol.success) {
    throw new ValidationError(`Invalid ticker: ${symbol.error.issues[0]?.message}`, 'ticker');
  }
  return { userId: user.data, ticker: symbol.data };
};

/**
 * Produces one recommendation per call: advisor with retries, then the RSI heuristic,
 * then a conservative HOLD. Whatever comes out passes the risk engine and is persisted
 * as `pending` before it is returned.
 */
export class RecommendationProvider {
  private readonly deps: RecommendationProviderDeps;
  private readonly cache: RecommendationCache<Recommendation>;
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(deps: RecommendationProviderDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.cache = deps.cache ?? new RecommendationCache<Recommendation>({ now: () => this.now().getTime() });
    this.retryPolicy = deps.retryPolicy ?? retryPolicyFromConfig(deps.config.advisor);
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? silentLogger();
  }

  async getRecommendation(userIdInput: string, tickerInput: string): Promise<Recommendation> {
    const { userId, ticker } = parseInput(userIdInput, tickerInput);
    if (!(await this.deps.ledger.hasAccount(userId))) {
      throw new ValidationError(`Unknown user ${userId}`, 'userId');
    }

    const key = cacheKey(userId, ticker);
    const hit = this.cache.get(key);
    if (hit) {
      const current = await this.getById(hit.id);
      if (current?.status === 'pending') {
        this.logger.debug({ userId, ticker, recommendationId: current.id }, 'Recommendation served from cache');
        return current;
      }
      this.cache.invalidate(key);
    }

    const deadline = new AbortController();
    const { deadlineMs } = this.deps.config.advisor;
    const timer = setTimeout(
      () => deadline.abort(new DeadlineExceededError(`Recommendation deadline of ${deadlineMs}ms exceeded`)),
      deadlineMs
    );
    try {
      const context = await this.deps.contextBuilder.build(userId, ticker, deadline.signal);
      const { currentPrice } = context;
      if (currentPrice === undefined) {
        this.logger.warn({ userId, ticker, stage: 'default' }, 'No current price; skipping advisor');
        return await this.fallback(context, 'no current price');
      }
      if (deadline.signal.aborted) {
        return await this.fallback(context, errorMessage(deadline.signal.reason));
      }
      const ttlMs = this.deps.config.cache.ttlMinutes * 60_000;
      const serve = () =>
        untilAborted(
          this.cache.getOrCompute(key, ttlMs, () => this.computeFromAdvisor(context, currentPrice, deadline.signal)),
          deadline.signal
        );
      try {
        const served = await serve();
        const current = await this.getById(served.id);
        if (current?.status === 'pending') return current;
        // resolved while this caller was building its context
        if (this.cache.get(key)?.id === served.id) this.cache.invalidate(key);
        this.logger.debug({ userId, ticker, recommendationId: served.id }, 'Cached recommendation no longer pending');
        return await serve();
      } catch (err) {
        return await this.fallback(context, errorMessage(err));
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async computeFromAdvisor(
    context: AnalysisContext,
    marketPrice: number,
    deadline: AbortSignal
  ): Promise<Recommendation> {
    const prompt = buildAdvisorPrompt(context);
    const { attemptTimeoutMs } = this.deps.config.advisor;
    const raw = await withRetry(
      async () => {
        const attempt = linkedTimeoutSignal(deadline, attemptTimeoutMs);
        try {
          return await this.deps.advisor.complete(prompt, attempt.signal);
        } finally {
          attempt.dispose();
        }
      },
      this.retryPolicy,
      { signal: deadline, sleep: this.sleep, logger: this.logger, label: 'Advisor call' }
    );
    const parsed = parseAdvisorResponse(raw);
    if (!parsed.ok) {
      throw parsed.error;
    }
    const { maxPriceDeviationPct } = this.deps.config.advisor;
    const deviation = Math.abs(parsed.value.price - marketPrice) / marketPrice;
    if (deviation > maxPriceDeviationPct) {
      throw new ParseError(
        'price',
        `${parsed.value.price} is ${(deviation * 100).toFixed(1)}% away from the market price ${marketPrice} (limit ${(maxPriceDeviationPct * 100).toFixed(1)}%)`
      );
    }
    return this.finalize(context, parsed.value, 'advisor');
  }

  private async fallback(context: AnalysisContext, reason: string): Promise<Recommendation> {
    const { commissionRate, slippageBps } = this.deps.config.execution;
    const heuristic = heuristicProposal(context, commissionRate + slippageBps / 10_000);
    const source: RecommendationSource = heuristic ? 'heuristic' : 'default';
    this.logger.warn({ userId: context.userId, ticker: context.ticker, stage: source, reason }, 'Advisor unavailable, falling back');
    const recommendation = this.assess(context, heuristic ?? defaultProposal(context), source);
    try {
      await this.persist(recommendation);
    } catch (err) {
      // still returned, but it cannot be confirmed later
      this.logger.error(
        { userId: context.userId, ticker: context.ticker, err: errorMessage(err) },
        'Could not persist fallback recommendation'
      );
    }
    return recommendation;
  }

  private async finalize(context: AnalysisContext, draft: ProposalDraft, source: RecommendationSource): Promise<Recommendation> {
    const recommendation = this.assess(context, draft, source);
    await this.persist(recommendation);
    return recommendation;
  }

  private assess(context: AnalysisContext, draft: ProposalDraft, source: RecommendationSource): Recommendation {
    const risk = validateRisk(
      { ticker: context.ticker, ...draft },
      context.portfolio,
      context.settings,
      context.session,
      this.deps.config.session.blackoutMinutes
    );
    if (!risk.ok) {
      this.logger.info(
        { userId: context.userId, ticker: context.ticker, source, violations: risk.violations.map((v) => v.code) },
        'Risk check downgraded recommendation to HOLD'
      );
    }
    return this.toRecommendation(
      context,
      applyRiskDowngrade(draft, risk),
      source,
      risk.violations.map((v) => v.code)
    );
  }

  private async persist(recommendation: Recommendation): Promise<void> {
    await this.deps.store.insertRecommendation(recommendation);
    this.logger.info(
      {
        userId: recommendation.userId,
        ticker: recommendation.ticker,
        recommendationId: recommendation.id,
        action: recommendation.action,
        source: recommendation.source
      },
      'Recommendation created'
    );
  }

  private toRecommendation(
    context: AnalysisContext,
    draft: ProposalDraft,
    source: RecommendationSource,
    violations: Recommendation['violations']
  ): Recommendation {
    const createdAt = this.now();
    return {
      id: newId('rec'),
      userId: context.userId,
      ticker: context.ticker,
      ...draft,
      status: 'pending',
      source,
      violations,
      createdAt: createdAt.toISOString(),
      expiresAt: addMinutes(createdAt, this.deps.config.recommendations.ttlMinutes).toISOString()
    };
  }

  /** Reads a recommendation, expiring it first if its time is up. */
  async getById(id: string): Promise<Recommendation | undefined> {
    const rec = await this.deps.store.getRecommendation(id);
    if (!rec) return undefined;
    return this.expireIfDue(rec);
  }

  private async expireIfDue(rec: Recommendation): Promise<Recommendation> {
    const now = this.now();
    if (rec.status !== 'pending' || now.getTime() <= Date.parse(rec.expiresAt)) return rec;
    await this.deps.store.transitionRecommendation(rec.id, 'pending', 'expired', now.toISOString());
    const fresh = await this.deps.store.getRecommendation(rec.id);
    return fresh ?? rec;
  }

  /** Runs under the user's ledger lock, so an execution in progress settles first. */
  reject(recommendationId: string, userId: string): Promise<RejectResult> {
    return this.deps.ledger.withUserLock(userId, () => this.rejectLocked(recommendationId, userId));
  }

  private async rejectLocked(recommendationId: string, userId: string): Promise<RejectResult> {
    const rec = await this.getById(recommendationId);
    if (!rec || rec.userId !== userId) {
      return { ok: false, error: 'NOT_FOUND', message: `Recommendation ${recommendationId} not found` };
    }
    if (rec.status === 'expired') {
      return { ok: false, error: 'EXPIRED', message: `Recommendation ${recommendationId} has expired` };
    }
    const swapped =
      rec.status === 'pending' &&
      (await this.deps.store.transitionRecommendation(rec.id, 'pending', 'rejected', this.now().toISOString()));
    if (!swapped) {
      return { ok: false, error: 'ALREADY_RESOLVED', message: `Recommendation ${recommendationId} is already resolved` };
    }
    this.cache.invalidate(cacheKey(rec.userId, rec.ticker));
    const updated: Recommendation = (await this.deps.store.getRecommendation(rec.id)) ?? { ...rec, status: 'rejected' };
    this.logger.info({ userId, recommendationId }, 'Recommendation rejected');
    return { ok: true, recommendation: updated };
  }

  async listHistory(userId: string, limit = this.deps.config.recommendations.historyLimit): Promise<Recommendation[]> {
    const rows = await this.deps.store.listRecommendations(userId, limit);
    return Promise.all(rows.map((r) => this.expireIfDue(r)));
  }

  /** Expires every overdue pending recommendation; returns how many were expired. */
  async sweepExpired(): Promise<number> {
    const now = this.now();
    const pending = await this.deps.store.listPendingRecommendations();
    let expired = 0;
    for (const rec of pending) {
      if (now.getTime() > Date.parse(rec.expiresAt)) {
        if (await this.deps.store.transitionRecommendation(rec.id, 'pending', 'expired', now.toISOString())) {
          expired += 1;
        }
      }
    }
    const purged = this.cache.purgeExpired();
    if (expired || purged) {
      this.logger.info({ expired, purgedCacheEntries: purged }, 'Expiry sweep');
    }
    return expired;
  }

  startExpirySweep(intervalMs = this.deps.config.recommendations.sweepIntervalSeconds * 1000): () => void {
    const timer = setInterval(() => {
      this.sweepExpired().catch((err) => this.logger.error({ err: errorMessage(err) }, 'Expiry sweep failed'));
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
