import { z } from 'zod';
import { EngineConfig, RiskProfile, UserSettings } from './types';

const hhmm = z.string().regex(/^\d{1,2}:\d{2}$/, 'must be HH:mm');
const fraction = z.number().gt(0).lt(1);

export const riskProfileSchema = z.enum(['conservative', 'moderate', 'aggressive']);

export const engineConfigSchema: z.ZodType<EngineConfig> = z.object({
  defaultTicker: z.string().min(1),
  initialCapital: z.number().positive(),
  risk: z.object({
    riskProfile: riskProfileSchema,
    maxPositionSizePct: fraction,
    stopLossPct: fraction,
    takeProfitPct: z.number().positive(),
    minRiskRewardRatio: z.number().positive(),
    autoConfirm: z.boolean()
  }),
  session: z.object({
    timezone: z.string().min(1),
    open: hhmm,
    close: hhmm,
    tradingDays: z.array(z.number().int().min(0).max(6)).nonempty(),
    blackoutMinutes: z.number().min(0)
  }),
  execution: z.object({
    commissionRate: z.number().min(0).lt(1),
    slippageBps: z.number().min(0),
    persistenceRetries: z.number().int().min(1),
    persistenceRetryDelayMs: z.number().min(0)
  }),
  advisor: z.object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().min(0),
    capDelayMs: z.number().min(0),
    attemptTimeoutMs: z.number().positive(),
    deadlineMs: z.number().positive(),
    maxPriceDeviationPct: z.number().positive().max(1),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive()
  }),
  cache: z.object({
    ttlMinutes: z.number().positive()
  }),
  recommendations: z.object({
    ttlMinutes: z.number().positive(),
    sweepIntervalSeconds: z.number().positive(),
    historyLimit: z.number().int().positive()
  }),
  context: z.object({
    barsLookbackDays: z.number().int().positive(),
    newsLimit: z.number().int().min(0)
  }),
  api: z.object({
    port: z.number().int().min(0).max(65535),
    bind: z.string().min(1)
  })
});

export const validateEngineConfig = (
  raw: unknown
): { success: true; value: EngineConfig } | { success: false; errors: string[] } => {
  const result = engineConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  return { success: false, errors };
};

export const TICKER_PATTERN = /^[A-Z][A-Z0-9.]{0,11}$/;

export const userIdSchema = z.string().trim().min(1).max(64);
export const tickerSchema = z
  .string()
  .trim()
  .transform((v) => v.toUpperCase())
  .pipe(z.string().regex(TICKER_PATTERN, 'ticker must be 1-12 letters or digits'));

export const settingsUpdateSchema = z
  .object({
    riskProfile: riskProfileSchema,
    maxPositionSizePct: fraction,
    stopLossPct: fraction,
    takeProfitPct: z.number().positive(),
    minRiskRewardRatio: z.number().positive(),
    autoConfirm: z.boolean()
  })
  .partial()
  .strict();

export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;

export const openAccountSchema = z.object({
  userId: userIdSchema,
  username: z.string().max(255).optional(),
  initialCapital: z.number().positive().optional()
});

export const executeRequestSchema = z.object({
  userId: userIdSchema
});

export const RISK_PROFILE_PRESETS: Record<RiskProfile, Omit<SettingsUpdate, 'riskProfile' | 'autoConfirm'>> = {
  conservative: { maxPositionSizePct: 0.15, stopLossPct: 0.05, takeProfitPct: 0.1, minRiskRewardRatio: 2.5 },
  moderate: { maxPositionSizePct: 0.3, stopLossPct: 0.05, takeProfitPct: 0.1, minRiskRewardRatio: 2 },
  aggressive: { maxPositionSizePct: 0.5, stopLossPct: 0.07, takeProfitPct: 0.15, minRiskRewardRatio: 1.5 }
};

export const applySettingsUpdate = (current: UserSettings, update: SettingsUpdate, now: Date): UserSettings => {
  const preset = update.riskProfile && update.riskProfile !== current.riskProfile ? RISK_PROFILE_PRESETS[update.riskProfile] : {};
  return {
    ...current,
    ...preset,
    ...update,
    updatedAt: now.toISOString()
  };
};
