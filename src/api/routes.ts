import express from 'express';
import { z } from 'zod';
import { Recommendation } from '../core/types';
import { ValidationError } from '../core/errors';
import { errorMessage } from '../core/utils';
import { executeRequestSchema, openAccountSchema, settingsUpdateSchema, tickerSchema, userIdSchema } from '../core/schema';
import { Engine, buildPortfolioReport } from '../engine';
import { ExecutionError, ExecutionResult } from '../execution/tradeExecutor';

export interface ApiResponse {
  status: number;
  body: unknown;
}

const executionStatus: Record<ExecutionError, number> = {
  NOT_FOUND: 404,
  NOT_ACTIONABLE: 422,
  EXPIRED: 410,
  ALREADY_RESOLVED: 409,
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_SHARES: 422,
  PERSISTENCE_FAILED: 503
};

const limitSchema = z.coerce.number().int().positive().max(500).optional();

const parse = <S extends z.ZodTypeAny>(schema: S, input: unknown, field: string): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.length ? issue.path.join('.') : field;
    throw new ValidationError(`${path}: ${issue?.message ?? 'invalid'}`, path);
  }
  return result.data;
};

const executionResponse = (result: ExecutionResult): ApiResponse =>
  result.ok
    ? { status: 200, body: { transaction: result.transaction, recommendation: result.recommendation } }
    : { status: executionStatus[result.error], body: { error: result.error, message: result.message } };

const isActionable = (rec: Recommendation) => rec.status === 'pending' && rec.action !== 'HOLD' && rec.quantity > 0;

/**
 * Route handlers as plain functions of already-extracted request parts, so they can be
 * exercised without an HTTP server.
 */
export const createHandlers = (engine: Engine) => ({
  async openAccount(body: unknown): Promise<ApiResponse> {
    const input = parse(openAccountSchema, body, 'body');
    const result = await engine.ledger.openAccount(input.userId, {
      initialCapital: input.initialCapital,
      username: input.username
    });
    return { status: result.created ? 201 : 200, body: result };
  },

  async recommend(userId: unknown, ticker: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    const symbol = parse(tickerSchema, ticker ?? engine.config.defaultTicker, 'ticker');
    const recommendation = await engine.provider.getRecommendation(user, symbol);
    const settings = await engine.ledger.getSettings(user);
    if (settings.autoConfirm && isActionable(recommendation)) {
      const execution = await engine.executor.execute(recommendation.id, user);
      return { status: 200, body: { recommendation: execution.ok ? execution.recommendation : recommendation, execution } };
    }
    return { status: 200, body: { recommendation } };
  },

  async confirm(recommendationId: string, body: unknown): Promise<ApiResponse> {
    const { userId } = parse(executeRequestSchema, body, 'body');
    return executionResponse(await engine.executor.execute(recommendationId, userId));
  },

  async reject(recommendationId: string, body: unknown): Promise<ApiResponse> {
    const { userId } = parse(executeRequestSchema, body, 'body');
    const result = await engine.provider.reject(recommendationId, userId);
    if (result.ok) return { status: 200, body: { recommendation: result.recommendation } };
    return { status: executionStatus[result.error], body: { error: result.error, message: result.message } };
  },

  async getRecommendation(recommendationId: string): Promise<ApiResponse> {
    const rec = await engine.provider.getById(recommendationId);
    if (!rec) return { status: 404, body: { error: 'NOT_FOUND', message: `Recommendation ${recommendationId} not found` } };
    return { status: 200, body: rec };
  },

  async portfolio(userId: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    return { status: 200, body: await buildPortfolioReport(engine, user) };
  },

  async transactions(userId: unknown, limit: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    const max = parse(limitSchema, limit, 'limit');
    return { status: 200, body: await engine.ledger.getTransactionHistory(user, max) };
  },

  async recommendations(userId: unknown, limit: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    const max = parse(limitSchema, limit, 'limit');
    return { status: 200, body: await engine.provider.listHistory(user, max) };
  },

  async getSettings(userId: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    return { status: 200, body: await engine.ledger.getSettings(user) };
  },

  async updateSettings(userId: unknown, body: unknown): Promise<ApiResponse> {
    const user = parse(userIdSchema, userId, 'userId');
    const update = parse(settingsUpdateSchema, body, 'body');
    return { status: 200, body: await engine.ledger.updateSettings(user, update) };
  }
});

export type Handlers = ReturnType<typeof createHandlers>;

const toErrorResponse = (err: unknown): ApiResponse => {
  if (err instanceof ValidationError) {
    return { status: 400, body: { error: 'VALIDATION', message: err.message, field: err.field } };
  }
  return { status: 500, body: { error: 'INTERNAL', message: errorMessage(err) } };
};

export const registerRoutes = (app: express.Application, engine: Engine) => {
  const handlers = createHandlers(engine);
  const send = (res: express.Response, work: () => Promise<ApiResponse>) =>
    work()
      .catch((err: unknown) => {
        const response = toErrorResponse(err);
        if (response.status >= 500) engine.logger.error({ err: errorMessage(err) }, 'Request failed');
        return response;
      })
      .then((response) => {
        res.status(response.status).json(response.body);
      });

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/accounts', (req, res) => send(res, () => handlers.openAccount(req.body)));

  app.get('/users/:userId/recommendation', (req, res) =>
    send(res, () => handlers.recommend(req.params.userId, req.query.ticker))
  );

  app.get('/users/:userId/recommendations', (req, res) =>
    send(res, () => handlers.recommendations(req.params.userId, req.query.limit))
  );

  app.get('/users/:userId/portfolio', (req, res) => send(res, () => handlers.portfolio(req.params.userId)));

  app.get('/users/:userId/transactions', (req, res) =>
    send(res, () => handlers.transactions(req.params.userId, req.query.limit))
  );

  app.get('/users/:userId/settings', (req, res) => send(res, () => handlers.getSettings(req.params.userId)));

  app.patch('/users/:userId/settings', (req, res) =>
    send(res, () => handlers.updateSettings(req.params.userId, req.body))
  );

  app.get('/recommendations/:id', (req, res) => send(res, () => handlers.getRecommendation(req.params.id)));

  app.post('/recommendations/:id/confirm', (req, res) => send(res, () => handlers.confirm(req.params.id, req.body)));

  app.post('/recommendations/:id/reject', (req, res) => send(res, () => handlers.reject(req.params.id, req.body)));
};
