import { EngineConfig, Recommendation, Transaction } from '../core/types';
import { PersistenceError } from '../core/errors';
import { Logger, silentLogger } from '../core/logger';
import { errorMessage, roundCents, sleep as defaultSleep } from '../core/utils';
import { LedgerSession, PortfolioLedger, TradeError } from '../ledger/portfolioLedger';
import { TradingStore } from '../ledger/store.types';

export type ExecutionError =
  | 'NOT_FOUND'
  | 'NOT_ACTIONABLE'
  | 'EXPIRED'
  | 'ALREADY_RESOLVED'
  | TradeError
  | 'PERSISTENCE_FAILED';

export type ExecutionResult =
  | { ok: true; transaction: Transaction; recommendation: Recommendation }
  | { ok: false; error: ExecutionError; message: string };

export interface TradeExecutorDeps {
  store: TradingStore;
  ledger: PortfolioLedger;
  config: Pick<EngineConfig, 'execution'>;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const tradeCosts = (
  notional: number,
  execution: EngineConfig['execution']
): { commission: number; slippage: number } => ({
  commission: roundCents(notional * execution.commissionRate),
  slippage: roundCents((notional * execution.slippageBps) / 10_000)
});

const fail = (error: ExecutionError, message: string): ExecutionResult => ({ ok: false, error, message });

/**
 * Turns a pending recommendation into a Transaction. The claim, the ledger update and the
 * Transaction write all happen under the user's ledger lock; a failed trade or write puts
 * the recommendation back to `pending`.
 */
export class TradeExecutor {
  private readonly deps: TradeExecutorDeps;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(deps: TradeExecutorDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? ((ms) => defaultSleep(ms));
    this.logger = deps.logger ?? silentLogger();
  }

  execute(recommendationId: string, userId: string): Promise<ExecutionResult> {
    return this.deps.ledger.withUserLock(userId, (session) => this.executeLocked(session, recommendationId));
  }

  private async executeLocked(session: LedgerSession, recommendationId: string): Promise<ExecutionResult> {
    const { store } = this.deps;
    const rec = await store.getRecommendation(recommendationId);
    if (!rec || rec.userId !== session.userId) {
      return fail('NOT_FOUND', `Recommendation ${recommendationId} not found`);
    }
    if (rec.status === 'expired') {
      return fail('EXPIRED', `Recommendation ${rec.id} has expired`);
    }
    if (rec.status !== 'pending') {
      return fail('ALREADY_RESOLVED', `Recommendation ${rec.id} is already ${rec.status}`);
    }
    const now = this.now();
    if (now.getTime() > Date.parse(rec.expiresAt)) {
      await store.transitionRecommendation(rec.id, 'pending', 'expired', now.toISOString());
      return fail('EXPIRED', `Recommendation ${rec.id} expired at ${rec.expiresAt}`);
    }
    if (rec.action === 'HOLD' || rec.quantity <= 0) {
      return fail('NOT_ACTIONABLE', `Recommendation ${rec.id} is a HOLD; nothing to execute`);
    }
    if (!(await store.transitionRecommendation(rec.id, 'pending', 'confirmed', now.toISOString()))) {
      return fail('ALREADY_RESOLVED', `Recommendation ${rec.id} was resolved concurrently`);
    }

    const costs = tradeCosts(rec.quantity * rec.price, this.deps.config.execution);
    try {
      const result = await session.applyTrade(
        { action: rec.action, ticker: rec.ticker, shares: rec.quantity, price: rec.price, ...costs },
        { recommendationId: rec.id, commit: (_transaction, write) => this.writeWithRetry(rec.id, write) }
      );
      if (!result.ok) {
        await this.release(rec.id);
        return fail(result.error, result.message);
      }
      const confirmed: Recommendation = (await store.getRecommendation(rec.id)) ?? {
        ...rec,
        status: 'confirmed',
        resolvedAt: now.toISOString()
      };
      this.logger.info(
        { userId: session.userId, recommendationId: rec.id, transactionId: result.transaction.id, ...costs },
        'Recommendation executed'
      );
      return { ok: true, transaction: result.transaction, recommendation: confirmed };
    } catch (err) {
      await this.release(rec.id);
      if (err instanceof PersistenceError) {
        return fail('PERSISTENCE_FAILED', err.message);
      }
      throw err;
    }
  }

  private async writeWithRetry(recommendationId: string, write: () => Promise<void>): Promise<void> {
    const { persistenceRetries, persistenceRetryDelayMs } = this.deps.config.execution;
    let lastError: unknown;
    for (let attempt = 1; attempt <= persistenceRetries; attempt++) {
      try {
        await write();
        return;
      } catch (err) {
        lastError = err;
        this.logger.warn({ recommendationId, attempt, err: errorMessage(err) }, 'Transaction write failed');
        if (attempt < persistenceRetries) {
          await this.sleep(persistenceRetryDelayMs);
        }
      }
    }
    throw new PersistenceError(
      `Transaction write failed after ${persistenceRetries} attempt(s): ${errorMessage(lastError)}`,
      lastError
    );
  }

  // Undo the claim so the recommendation can be confirmed again.
  private async release(recommendationId: string) {
    const reverted = await this.deps.store.transitionRecommendation(
      recommendationId,
      'confirmed',
      'pending',
      this.now().toISOString()
    );
    if (!reverted) {
      this.logger.error({ recommendationId }, 'Could not return recommendation to pending');
    }
  }
}
