import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { riskProfileSchema } from '../core/schema';
import { writeJSONFile } from '../core/utils';
import { PersistenceError } from '../core/errors';
import { MemoryStore, StoreState, emptyStoreState } from './memoryStore';

const configuredPath = process.env.STORE_FILE ? path.resolve(process.env.STORE_FILE) : undefined;
const defaultStoreFile = configuredPath ?? path.join(path.resolve(process.cwd(), 'data'), 'store.json');

const riskViolationCode = z.enum([
  'POSITION_SIZE',
  'STOP_LOSS_TOO_TIGHT',
  'TAKE_PROFIT_TOO_LOW',
  'RISK_REWARD',
  'SESSION_BLACKOUT',
  'INSUFFICIENT_INVENTORY'
]);

const storeStateSchema: z.ZodType<StoreState> = z.object({
  users: z.array(
    z.object({
      id: z.string(),
      username: z.string().optional(),
      createdAt: z.string(),
      lastActiveAt: z.string()
    })
  ),
  portfolios: z.array(
    z.object({
      id: z.string(),
      userId: z.string(),
      cash: z.number(),
      initialCapital: z.number(),
      createdAt: z.string(),
      updatedAt: z.string()
    })
  ),
  positions: z.array(
    z.object({
      portfolioId: z.string(),
      ticker: z.string(),
      shares: z.number().int(),
      avgPurchasePrice: z.number(),
      openedAt: z.string(),
      updatedAt: z.string()
    })
  ),
  transactions: z.array(
    z.object({
      id: z.string(),
      portfolioId: z.string(),
      action: z.enum(['BUY', 'SELL']),
      ticker: z.string(),
      shares: z.number().int(),
      price: z.number(),
      commission: z.number(),
      slippage: z.number(),
      totalAmount: z.number(),
      realizedPnl: z.number(),
      recommendationId: z.string().nullable(),
      timestamp: z.string()
    })
  ),
  recommendations: z.array(
    z.object({
      id: z.string(),
      userId: z.string(),
      ticker: z.string(),
      action: z.enum(['BUY', 'SELL', 'HOLD']),
      quantity: z.number().int(),
      price: z.number(),
      stopLoss: z.number().nullable(),
      takeProfit: z.number().nullable(),
      reasoning: z.string(),
      riskLevel: z.enum(['LOW', 'MEDIUM', 'HIGH']),
      confidence: z.number(),
      timeHorizon: z.string().optional(),
      keyFactors: z.array(z.string()),
      status: z.enum(['pending', 'confirmed', 'rejected', 'expired']),
      source: z.enum(['advisor', 'heuristic', 'default']),
      violations: z.array(riskViolationCode),
      createdAt: z.string(),
      expiresAt: z.string(),
      resolvedAt: z.string().optional()
    })
  ),
  settings: z.array(
    z.object({
      userId: z.string(),
      riskProfile: riskProfileSchema,
      maxPositionSizePct: z.number(),
      stopLossPct: z.number(),
      takeProfitPct: z.number(),
      minRiskRewardRatio: z.number(),
      autoConfirm: z.boolean(),
      updatedAt: z.string()
    })
  )
});

export const readStoreFile = (filePath: string): StoreState => {
  if (!fs.existsSync(filePath)) return emptyStoreState();
  const content = fs.readFileSync(filePath, 'utf-8');
  if (!content.trim().length) return emptyStoreState();
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new PersistenceError(`Store file ${filePath} is not valid JSON`, err);
  }
  const parsed = storeStateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new PersistenceError(`Store file ${filePath} failed validation: ${issues}`);
  }
  return parsed.data;
};

/**
 * Single-document JSON store for CLI and API runs. Writes are synchronous, so a
 * mutation and its flush complete before any other request gets the event loop.
 */
export class JsonFileStore extends MemoryStore {
  readonly filePath: string;

  constructor(filePath: string = defaultStoreFile) {
    super(readStoreFile(filePath));
    this.filePath = filePath;
  }

  protected commit(): void {
    writeJSONFile(this.filePath, this.state);
  }
}
