import express from 'express';
import { createHandlers, registerRoutes } from '../src/api/routes';
import { ValidationError } from '../src/core/errors';
import { Recommendation } from '../src/core/types';
import { ScriptedAdvisor, advisorJson, testEngine } from './helpers';

const setup = async () => {
  const engine = testEngine();
  const handlers = createHandlers(engine);
  await handlers.openAccount({ userId: 'u1' });
  return { engine, handlers };
};

const recommendationOf = (body: unknown): Recommendation => {
  const { recommendation } = body as { recommendation: Recommendation };
  return recommendation;
};

describe('API handlers', () => {
  it('opens an account once', async () => {
    const handlers = createHandlers(testEngine());
    const first = await handlers.openAccount({ userId: 'u1', initialCapital: 50000 });
    expect(first.status).toBe(201);
    expect(first.body).toMatchObject({ created: true, portfolio: { cash: 50000 } });
    expect((await handlers.openAccount({ userId: 'u1' })).status).toBe(200);
  });

  it('recommends for the default ticker and confirms once', async () => {
    const { handlers } = await setup();
    const res = await handlers.recommend('u1', undefined);
    expect(res.status).toBe(200);
    const rec = recommendationOf(res.body);
    expect(rec).toMatchObject({ ticker: 'GAZP', action: 'BUY', status: 'pending' });

    const confirmed = await handlers.confirm(rec.id, { userId: 'u1' });
    expect(confirmed.status).toBe(200);
    expect(confirmed.body).toMatchObject({ transaction: { shares: 150 }, recommendation: { status: 'confirmed' } });

    expect(await handlers.confirm(rec.id, { userId: 'u1' })).toEqual({
      status: 409,
      body: { error: 'ALREADY_RESOLVED', message: `Recommendation ${rec.id} is already confirmed` }
    });

    const portfolio = await handlers.portfolio('u1');
    expect(portfolio.body).toMatchObject({
      summary: { positions: [{ ticker: 'GAZP', shares: 150 }], transactionCount: 1 },
      performance: { trades: 1, buys: 1 }
    });
    expect(((await handlers.transactions('u1', '10')).body as unknown[]).length).toBe(1);
  });

  it('maps execution failures to status codes', async () => {
    const engine = testEngine({ advisor: new ScriptedAdvisor(advisorJson({})) });
    const handlers = createHandlers(engine);
    await handlers.openAccount({ userId: 'u1' });
    const rec = recommendationOf((await handlers.recommend('u1', 'GAZP')).body);
    expect((await handlers.confirm(rec.id, { userId: 'u1' })).status).toBe(422);
    expect((await handlers.confirm('rec_missing', { userId: 'u1' })).status).toBe(404);
    expect((await handlers.reject(rec.id, { userId: 'u1' })).status).toBe(200);
    expect((await handlers.reject(rec.id, { userId: 'u1' })).status).toBe(409);
    expect((await handlers.getRecommendation(rec.id)).body).toMatchObject({ status: 'rejected' });
    expect((await handlers.getRecommendation('rec_missing')).status).toBe(404);
  });

  it('executes immediately when auto-confirm is on', async () => {
    const { handlers } = await setup();
    const updated = await handlers.updateSettings('u1', { autoConfirm: true });
    expect(updated.body).toMatchObject({ autoConfirm: true });
    const res = await handlers.recommend('u1', 'GAZP');
    expect(res.body).toMatchObject({
      recommendation: { status: 'confirmed' },
      execution: { ok: true, transaction: { shares: 150 } }
    });
  });

  it('validates parameters', async () => {
    const { handlers } = await setup();
    await expect(handlers.transactions('u1', 'abc')).rejects.toMatchObject({ field: 'limit' });
    await expect(handlers.updateSettings('u1', { stopLossPct: 2 })).rejects.toThrow(ValidationError);
    await expect(handlers.recommend('u1', 'no such ticker')).rejects.toThrow(ValidationError);
    await expect(handlers.getSettings('ghost')).rejects.toThrow('Unknown user ghost');
  });
});

describe('API routes', () => {
  const callRoute = async (app: express.Application, method: string, routePath: string, req: any) => {
    const layer = (app as any)._router.stack.find(
      (l: any) => l.route && l.route.path === routePath && l.route.methods[method]
    );
    expect(layer).toBeDefined();
    const handler = layer.route.stack[0].handle;
    let statusCode = 200;
    let body: any;
    const res: any = {
      status(code: number) {
        statusCode = code;
        return this;
      },
      json(payload: any) {
        body = payload;
        return this;
      }
    };
    await handler(req, res);
    return { statusCode, body };
  };

  it('answers through the registered route without binding a port', async () => {
    const app = express();
    registerRoutes(app, testEngine());
    const created = await callRoute(app, 'post', '/accounts', { body: { userId: 'u9' }, params: {}, query: {} });
    expect(created.statusCode).toBe(201);
    expect(created.body.created).toBe(true);

    const invalid = await callRoute(app, 'post', '/accounts', { body: {}, params: {}, query: {} });
    expect(invalid).toEqual({
      statusCode: 400,
      body: { error: 'VALIDATION', message: 'userId: Required', field: 'userId' }
    });
  });
});
