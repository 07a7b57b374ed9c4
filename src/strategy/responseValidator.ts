import { z } from 'zod';
import { ProposalDraft } from '../core/types';
import { ParseError } from '../core/errors';
import { errorMessage } from '../core/utils';

export type ParseResult = { ok: true; value: ProposalDraft } | { ok: false; error: ParseError };

const numeric = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
    return v;
  }, schema);

const upper = (v: unknown) => (typeof v === 'string' ? v.trim().toUpperCase() : v);

const level = numeric(z.number().positive()).nullish();

const proposalSchema = z
  .object({
    action: z.preprocess(upper, z.enum(['BUY', 'SELL', 'HOLD'])),
    quantity: numeric(z.number().int().nonnegative()).nullish(),
    price: numeric(z.number().positive()),
    stop_loss: level,
    take_profit: level,
    reasoning: z.string(),
    risk_level: z.preprocess(upper, z.enum(['LOW', 'MEDIUM', 'HIGH'])),
    confidence: numeric(z.number().int().min(0).max(100)),
    time_horizon: z.string().nullish(),
    key_factors: z.array(z.string()).nullish()
  })
  .superRefine((p, ctx) => {
    if (p.action !== 'HOLD' && !(typeof p.quantity === 'number' && p.quantity > 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['quantity'], message: `must be a positive integer for ${p.action}` });
    }
    if (p.action === 'BUY') {
      if (typeof p.stop_loss !== 'number') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stop_loss'], message: 'is required for BUY' });
      } else if (!(p.stop_loss < p.price)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stop_loss'], message: 'must be below price for BUY' });
      }
      if (typeof p.take_profit !== 'number') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['take_profit'], message: 'is required for BUY' });
      } else if (!(p.take_profit > p.price)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['take_profit'], message: 'must be above price for BUY' });
      }
    }
  });

const stripFences = (raw: string): string => {
  const trimmed = raw.trim();
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch && fenceMatch[1]) {
    return fenceMatch[1].trim();
  }
  return trimmed;
};

/** First balanced `{...}` in `text`, skipping braces inside JSON strings. */
export const extractJsonObject = (text: string): string | undefined => {
  const start = text.indexOf('{');
  if (start < 0) return undefined;
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
};

const tryJson = (text: string): { ok: true; value: unknown } | { ok: false; message: string } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }
};

// Strict parse first, then the first object found after stripping code fences.
const decode = (raw: string): { ok: true; value: unknown } | { ok: false; error: ParseError } => {
  const strict = tryJson(raw.trim());
  if (strict.ok) return strict;
  const candidate = extractJsonObject(stripFences(raw));
  if (candidate === undefined) {
    return { ok: false, error: new ParseError('response', 'no JSON object found') };
  }
  const embedded = tryJson(candidate);
  if (!embedded.ok) {
    return { ok: false, error: new ParseError('response', `invalid JSON: ${embedded.message}`) };
  }
  return embedded;
};

export const parseAdvisorResponse = (raw: string): ParseResult => {
  const decoded = decode(raw);
  if (!decoded.ok) return decoded;
  if (typeof decoded.value !== 'object' || decoded.value === null || Array.isArray(decoded.value)) {
    return { ok: false, error: new ParseError('response', 'expected a JSON object') };
  }

  const parsed = proposalSchema.safeParse(decoded.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length ? issue.path.join('.') : 'response';
    return { ok: false, error: new ParseError(field, issue.message) };
  }

  const p = parsed.data;
  const isHold = p.action === 'HOLD';
  return {
    ok: true,
    value: {
      action: p.action,
      quantity: isHold ? 0 : p.quantity ?? 0,
      price: p.price,
      stopLoss: isHold ? null : p.stop_loss ?? null,
      takeProfit: isHold ? null : p.take_profit ?? null,
      reasoning: p.reasoning,
      riskLevel: p.risk_level,
      confidence: p.confidence,
      timeHorizon: p.time_horizon ?? undefined,
      keyFactors: p.key_factors ?? []
    }
  };
};
