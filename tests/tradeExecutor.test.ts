import { tradeCosts } from '../src/execution/tradeExecutor';
import { MemoryStore } from '../src/ledger/memoryStore';
import { PersistenceError } from '../src/core/errors';
import { Portfolio, Position, Recommendation, Transaction } from '../src/core/types';
import { Engine } from '../src/engine';
import { ScriptedAdvisor, advisorJson, manualClock, testConfig, testEngine } from './helpers';

class FlakyStore extends MemoryStore {
  tradeFailures = 0;
  tradeWrites = 0;

  async recordTrade(portfolio: Portfolio, positions: Position[], transaction: Transaction): Promise<void> {
    this.tradeWrites += 1;
    if (this.tradeFailures > 0) {
      this.tradeFailures -= 1;
      throw new PersistenceError('disk full');
    }
    return super.recordTrade(portfolio, positions, transaction);
  }
}

// First trade write waits for release, then every write fails.
class StallingStore extends MemoryStore {
  private open: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.open = resolve;
  });
  private markEntered: () => void = () => undefined;
  readonly entered = new Promise<void>((resolve) => {
    this.markEntered = resolve;
  });

  release() {
    this.open();
  }

  async recordTrade(_portfolio: Portfolio, _positions: Position[], _transaction: Transaction): Promise<void> {
    this.markEntered();
    await this.gate;
    throw new PersistenceError('disk full');
  }
}

const openEngine = async (...args: Parameters<typeof testEngine>) => {
  const engine = testEngine(...args);
  await engine.ledger.openAccount('u1');
  return engine;
};

const seedRecommendation = async (engine: Engine, overrides: Partial<Recommendation>): Promise<Recommendation> => {
  const rec: Recommendation = {
    id: 'rec_seeded',
    userId: 'u1',
    ticker: 'GAZP',
    action: 'BUY',
    quantity: 10,
    price: 170,
    stopLoss: 161.5,
    takeProfit: 187,
    reasoning: 'seeded',
    riskLevel: 'MEDIUM',
    confidence: 60,
    keyFactors: [],
    status: 'pending',
    source: 'advisor',
    violations: [],
    createdAt: '2026-10-14T09:00:00.000Z',
    expiresAt: '2026-10-14T09:15:00.000Z',
    ...overrides
  };
  await engine.store.insertRecommendation(rec);
  return rec;
};

describe('TradeExecutor', () => {
  it('charges commission and slippage in cents', () => {
    expect(tradeCosts(25500, testConfig().execution)).toEqual({ commission: 7.65, slippage: 12.75 });
  });

  it('executes a pending BUY at the recommended price', async () => {
    const engine = await openEngine();
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    const result = await engine.executor.execute(rec.id, 'u1');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.transaction).toMatchObject({
      action: 'BUY',
      ticker: 'GAZP',
      shares: 150,
      price: 170,
      commission: 7.65,
      slippage: 12.75,
      recommendationId: rec.id
    });
    expect(result.transaction.totalAmount).toBeCloseTo(25520.4, 6);
    expect(result.recommendation).toMatchObject({ status: 'confirmed', resolvedAt: '2026-10-14T09:00:00.000Z' });

    const snapshot = await engine.ledger.getSnapshot('u1', { GAZP: 170 });
    expect(snapshot.cash).toBeCloseTo(74479.6, 6);
    expect(snapshot.positions).toEqual([
      { ticker: 'GAZP', shares: 150, avgPurchasePrice: 170, currentPrice: 170, marketValue: 25500, unrealizedPnl: 0 }
    ]);
  });

  it('executes a recommendation only once under concurrent confirms', async () => {
    const engine = await openEngine();
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    const results = await Promise.all([engine.executor.execute(rec.id, 'u1'), engine.executor.execute(rec.id, 'u1')]);
    expect(results.map((r) => r.ok)).toEqual([true, false]);
    expect(results[1]).toEqual({
      ok: false,
      error: 'ALREADY_RESOLVED',
      message: `Recommendation ${rec.id} is already confirmed`
    });
    expect(await engine.ledger.getTransactionHistory('u1')).toHaveLength(1);
  });

  it('has nothing to do for a HOLD', async () => {
    const engine = await openEngine({ advisor: new ScriptedAdvisor(advisorJson({})) });
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    expect(await engine.executor.execute(rec.id, 'u1')).toEqual({
      ok: false,
      error: 'NOT_ACTIONABLE',
      message: `Recommendation ${rec.id} is a HOLD; nothing to execute`
    });
    expect((await engine.store.getRecommendation(rec.id))?.status).toBe('pending');
  });

  it('refuses and expires an overdue recommendation', async () => {
    const clock = manualClock();
    const engine = await openEngine({ now: clock.now });
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    clock.advance(16 * 60_000);
    expect(await engine.executor.execute(rec.id, 'u1')).toEqual({
      ok: false,
      error: 'EXPIRED',
      message: `Recommendation ${rec.id} expired at 2026-10-14T09:15:00.000Z`
    });
    expect(await engine.executor.execute(rec.id, 'u1')).toMatchObject({ ok: false, error: 'EXPIRED' });
    expect(await engine.ledger.getTransactionHistory('u1')).toEqual([]);
  });

  it('does not execute another user\'s recommendation', async () => {
    const engine = await openEngine();
    await engine.ledger.openAccount('u2');
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    expect(await engine.executor.execute(rec.id, 'u2')).toMatchObject({ ok: false, error: 'NOT_FOUND' });
    expect(await engine.executor.execute('rec_missing', 'u1')).toEqual({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Recommendation rec_missing not found'
    });
  });

  it('returns the recommendation to pending when the ledger refuses the trade', async () => {
    const engine = await openEngine();
    const sell = await seedRecommendation(engine, { action: 'SELL', quantity: 50, stopLoss: null, takeProfit: null });
    expect(await engine.executor.execute(sell.id, 'u1')).toEqual({
      ok: false,
      error: 'INSUFFICIENT_SHARES',
      message: 'Cannot sell 50 GAZP, holding 0'
    });
    const after = await engine.store.getRecommendation(sell.id);
    expect(after?.status).toBe('pending');
    expect(after?.resolvedAt).toBeUndefined();

    const big = await seedRecommendation(engine, { id: 'rec_big', quantity: 1000 });
    expect(await engine.executor.execute(big.id, 'u1')).toMatchObject({ ok: false, error: 'INSUFFICIENT_FUNDS' });
    expect((await engine.store.getRecommendation(big.id))?.status).toBe('pending');
  });

  it('retries a failed transaction write', async () => {
    const store = new FlakyStore();
    const engine = await openEngine({ store });
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    store.tradeFailures = 2;
    const result = await engine.executor.execute(rec.id, 'u1');
    expect(result.ok).toBe(true);
    expect(store.tradeWrites).toBe(3);
    expect(await engine.ledger.getTransactionHistory('u1')).toHaveLength(1);
  });

  it('gives up after the configured writes and leaves the portfolio untouched', async () => {
    const store = new FlakyStore();
    const engine = await openEngine({ store });
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    store.tradeFailures = 5;
    expect(await engine.executor.execute(rec.id, 'u1')).toEqual({
      ok: false,
      error: 'PERSISTENCE_FAILED',
      message: 'Transaction write failed after 3 attempt(s): disk full'
    });
    expect(store.tradeWrites).toBe(3);
    expect((await engine.store.getRecommendation(rec.id))?.status).toBe('pending');
    expect((await engine.ledger.getSnapshot('u1', {})).cash).toBe(100000);
    expect(await engine.ledger.getTransactionHistory('u1')).toEqual([]);

    store.tradeFailures = 0;
    expect((await engine.executor.execute(rec.id, 'u1')).ok).toBe(true);
  });

  it('lets a reject issued mid-execution wait for the claim to be reverted', async () => {
    const store = new StallingStore();
    const engine = await openEngine({ store });
    const rec = await engine.provider.getRecommendation('u1', 'GAZP');
    const execution = engine.executor.execute(rec.id, 'u1');
    await store.entered;
    const rejection = engine.provider.reject(rec.id, 'u1');
    store.release();
    expect(await execution).toEqual({
      ok: false,
      error: 'PERSISTENCE_FAILED',
      message: 'Transaction write failed after 3 attempt(s): disk full'
    });
    expect(await rejection).toMatchObject({ ok: true, recommendation: { status: 'rejected' } });
  });
});
