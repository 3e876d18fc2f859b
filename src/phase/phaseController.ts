import crypto from 'crypto';
import { EngineConfig, MilestoneCriterion, OPERATING_PHASES, OperatingPhase } from '../core/types';
import { RiskLedger } from '../ledger/riskLedger';
import { PhaseMetrics, computePhaseMetrics, unmetCriteria } from './milestones';

export type AuthorizationScope = 'ADVANCE' | 'DOWNGRADE';

export interface Authorizer {
  authorize(scope: AuthorizationScope, token: string | undefined): boolean;
}

const safeEqual = (a: string, b: string): boolean => {
  const ha = crypto.createHash('sha256').update(a).digest();
  const hb = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(ha, hb);
};

// Secrets come from the environment; an unset secret authorizes nothing.
export const createSecretAuthorizer = (secrets: Partial<Record<AuthorizationScope, string>>): Authorizer => ({
  authorize: (scope, token) => {
    const secret = secrets[scope];
    if (!secret || !token) return false;
    return safeEqual(secret, token);
  }
});

export const envAuthorizer = (): Authorizer =>
  createSecretAuthorizer({ ADVANCE: process.env.PHASE_AUTH_TOKEN, DOWNGRADE: process.env.ADMIN_OVERRIDE_TOKEN });

export const phaseIndex = (phase: OperatingPhase): number => OPERATING_PHASES.indexOf(phase);

export const nextPhase = (phase: OperatingPhase): OperatingPhase | undefined => OPERATING_PHASES[phaseIndex(phase) + 1];

export interface AdvancementReport {
  phase: OperatingPhase;
  nextPhase?: OperatingPhase;
  eligible: boolean;
  unmetCriteria: MilestoneCriterion[];
  metrics: PhaseMetrics;
  phaseEnteredAt: string;
  evaluatedAt: string;
}

export type AdvanceResult =
  | { ok: true; from: OperatingPhase; to: OperatingPhase }
  | { ok: false; error: 'UNAUTHORIZED' }
  | { ok: false; error: 'NOT_ELIGIBLE'; unmetCriteria: MilestoneCriterion[] };

export type DowngradeResult =
  | { ok: true; from: OperatingPhase; to: OperatingPhase }
  | { ok: false; error: 'UNAUTHORIZED' | 'INVALID_TARGET' };

export class PhaseController {
  private config: EngineConfig;
  private ledger: RiskLedger;
  private authorizer: Authorizer;

  constructor(config: EngineConfig, ledger: RiskLedger, authorizer: Authorizer) {
    this.config = config;
    this.ledger = ledger;
    this.authorizer = authorizer;
  }

  currentPhase(): OperatingPhase {
    return this.ledger.getPhase();
  }

  evaluateAdvancement(now: Date = new Date()): AdvancementReport {
    const phase = this.ledger.getPhase();
    const enteredAt = this.ledger.getPhaseEnteredAt();
    const metrics = computePhaseMetrics(this.ledger.outcomesSince(enteredAt), enteredAt, now);
    const base = {
      phase,
      nextPhase: nextPhase(phase),
      metrics,
      phaseEnteredAt: enteredAt.toISOString(),
      evaluatedAt: now.toISOString()
    };
    if (phase === 'FULL_LIVE') {
      return { ...base, eligible: false, unmetCriteria: ['FINAL_PHASE'] };
    }
    const unmet = unmetCriteria(metrics, this.config.milestones[phase]);
    return { ...base, eligible: unmet.length === 0, unmetCriteria: unmet };
  }

  advance(token: string | undefined, now: Date = new Date()): AdvanceResult {
    if (!this.authorizer.authorize('ADVANCE', token)) {
      console.warn('Phase advance refused: authorization failed');
      return { ok: false, error: 'UNAUTHORIZED' };
    }
    const report = this.evaluateAdvancement(now);
    if (!report.eligible || !report.nextPhase) {
      return { ok: false, error: 'NOT_ELIGIBLE', unmetCriteria: report.unmetCriteria };
    }
    this.ledger.recordPhaseChange(report.phase, report.nextPhase, now);
    console.log(`Phase advanced ${report.phase} -> ${report.nextPhase}`);
    return { ok: true, from: report.phase, to: report.nextPhase };
  }

  // Administrative override, separate from normal advancement (e.g. after sustained drawdown).
  forceDowngrade(target: OperatingPhase, adminToken: string | undefined, reason: string, now: Date = new Date()): DowngradeResult {
    if (!this.authorizer.authorize('DOWNGRADE', adminToken)) {
      console.warn('Phase downgrade refused: authorization failed');
      return { ok: false, error: 'UNAUTHORIZED' };
    }
    const from = this.ledger.getPhase();
    if (phaseIndex(target) < 0 || phaseIndex(target) >= phaseIndex(from)) {
      return { ok: false, error: 'INVALID_TARGET' };
    }
    this.ledger.recordPhaseChange(from, target, now, reason);
    console.warn(`Phase downgraded ${from} -> ${target}: ${reason}`);
    return { ok: true, from, to: target };
  }
}
