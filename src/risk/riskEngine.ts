import { PortfolioSnapshot, ProposalDraft, RiskLimits, RiskViolation, SessionClock, ValidationResult } from '../core/types';
import {
  RiskCandidate,
  checkInventory,
  checkPositionSize,
  checkRiskReward,
  checkSessionBlackout,
  checkStopLoss,
  checkTakeProfit
} from './riskRules';

export const DEFAULT_BLACKOUT_MINUTES = 15;

/**
 * Checks a proposed trade against the hard limits. Reports, never throws.
 * HOLD proposes no trade and passes every rule.
 */
export const validateRisk = (
  candidate: RiskCandidate,
  portfolio: PortfolioSnapshot,
  limits: RiskLimits,
  session: SessionClock,
  blackoutMinutes = DEFAULT_BLACKOUT_MINUTES
): ValidationResult => {
  if (candidate.action === 'HOLD') {
    return { ok: true, violations: [] };
  }

  const checks: Array<RiskViolation | undefined> = [];
  if (candidate.action === 'BUY') {
    checks.push(checkPositionSize(candidate, portfolio, limits));
    checks.push(checkStopLoss(candidate, limits));
    checks.push(checkTakeProfit(candidate, limits));
    checks.push(checkRiskReward(candidate, limits));
  } else {
    checks.push(checkInventory(candidate, portfolio));
  }
  checks.push(checkSessionBlackout(session, blackoutMinutes));

  const violations = checks.filter((v): v is RiskViolation => v !== undefined);
  return { ok: violations.length === 0, violations };
};

export const describeViolations = (violations: RiskViolation[]): string =>
  violations.map((v) => `[${v.code}] ${v.message}`).join('; ');

/** A rejected proposal becomes a low-risk HOLD that explains why. */
export const applyRiskDowngrade = (draft: ProposalDraft, result: ValidationResult): ProposalDraft => {
  if (result.ok) return draft;
  const original = draft.action === 'HOLD' ? '' : ` (was ${draft.action} ${draft.quantity})`;
  return {
    ...draft,
    action: 'HOLD',
    quantity: 0,
    stopLoss: null,
    takeProfit: null,
    riskLevel: 'LOW',
    reasoning: `${draft.reasoning}\nRisk check downgraded to HOLD${original}: ${describeViolations(result.violations)}`
  };
};
