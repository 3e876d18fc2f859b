import { pushReason } from '../core/utils';
import {
  AdmissionDecision,
  EngineConfig,
  OperatingPhase,
  ReasonCode,
  RejectedDecision,
  RejectionCategory
} from '../core/types';
import { RecordOutcomeResult, RiskLedger } from '../ledger/riskLedger';
import { BlackoutCalculator } from '../session/blackoutCalculator';
import { SessionOracle } from '../session/sessionOracle';
import { isTradable } from '../session/tradability';
import { sizePosition } from './positionSizer';
import {
  breachesDailyLoss,
  breachesWeeklyLoss,
  violatesDailyTradeCap,
  violatesOpenPositions,
  violatesWeeklyTradeCap
} from './riskRules';
import { validateSetup } from './setupValidator';

export interface RiskGateDeps {
  config: EngineConfig;
  ledger: RiskLedger;
  oracle: SessionOracle;
  blackout: BlackoutCalculator;
}

export const isLivePhase = (phase: OperatingPhase): boolean => phase === 'MICRO_LIVE' || phase === 'FULL_LIVE';

export class RiskGate {
  private config: EngineConfig;
  private ledger: RiskLedger;
  private oracle: SessionOracle;
  private blackout: BlackoutCalculator;

  constructor(deps: RiskGateDeps) {
    this.config = deps.config;
    this.ledger = deps.ledger;
    this.oracle = deps.oracle;
    this.blackout = deps.blackout;
  }

  private reject(
    now: Date,
    category: RejectionCategory,
    reasonCodes: ReasonCode[],
    extra: Pick<RejectedDecision, 'correlationId' | 'resumesAt' | 'issues'> = {}
  ): RejectedDecision {
    if (category === 'GATE') {
      this.ledger.recordRejection(extra.correlationId, category, reasonCodes, now);
      console.log(`Gate rejected ${extra.correlationId ?? 'candidate'}: ${reasonCodes.join(', ')}`);
    }
    return { status: 'REJECTED', category, reasonCodes, decidedAt: now.toISOString(), ...extra };
  }

  evaluate(input: unknown, now: Date = new Date()): AdmissionDecision {
    const validation = validateSetup(input, this.config.setupFilters);
    if (!validation.pass) {
      if (validation.reasonCodes.includes('MALFORMED_INPUT')) {
        console.error(`Malformed setup candidate from analysis feed: ${(validation.issues ?? []).join('; ')}`);
        return this.reject(now, 'MALFORMED', validation.reasonCodes, { issues: validation.issues });
      }
      return this.reject(now, 'VALIDATION', validation.reasonCodes, {
        correlationId: validation.candidate?.correlationId
      });
    }
    const candidate = validation.candidate;
    const correlationId = candidate.correlationId;

    if (this.ledger.hasAdmitted(correlationId)) {
      return this.reject(now, 'GATE', ['DUPLICATE_CANDIDATE'], { correlationId });
    }

    // Setups only hold for the session day they were produced in.
    if (this.oracle.dayKey(new Date(candidate.timestamp)) !== this.oracle.dayKey(now)) {
      return this.reject(now, 'GATE', ['STALE_SETUP'], { correlationId });
    }

    const tradable = isTradable(now, this.oracle, this.blackout);
    if (!tradable.ok) {
      return this.reject(now, 'GATE', tradable.reasonCodes, { correlationId, resumesAt: tradable.resumesAt });
    }

    this.ledger.rollover(now);
    // Keyed by `now`: a ledger already rolled past it must not hide this period's losses.
    const state = this.ledger.getTotals(now);
    const { limits } = this.config;
    const phase = this.ledger.getPhase();
    const limitCodes: ReasonCode[] = [];

    if (this.ledger.isLatched('DAY', now) || breachesDailyLoss(state, limits)) {
      this.ledger.latchLimit('DAY', state.dailyPnl, now);
      pushReason(limitCodes, 'DAILY_LIMIT_BREACHED');
    }
    if (this.ledger.isLatched('WEEK', now) || breachesWeeklyLoss(state, limits)) {
      this.ledger.latchLimit('WEEK', state.weeklyPnl, now);
      pushReason(limitCodes, 'WEEKLY_LIMIT_BREACHED');
    }
    if (violatesDailyTradeCap(state, limits)) pushReason(limitCodes, 'DAILY_TRADE_CAP_REACHED');
    if (violatesWeeklyTradeCap(state, limits)) pushReason(limitCodes, 'WEEKLY_TRADE_CAP_REACHED');
    if (isLivePhase(phase) && violatesOpenPositions(state, limits)) pushReason(limitCodes, 'MAX_OPEN_POSITIONS');
    if (limitCodes.length) {
      return this.reject(now, 'GATE', limitCodes, { correlationId });
    }

    if (isLivePhase(phase) && !this.config.liveTradingEnabled) {
      return this.reject(now, 'GATE', ['LIVE_TRADING_DISABLED'], { correlationId });
    }

    const sizing = sizePosition(phase, this.ledger.getEquity(), candidate.stopDistance, this.config.sizing);
    if (isLivePhase(phase) && sizing.size === 0) {
      return this.reject(now, 'GATE', pushReason([...sizing.reasonCodes], 'ZERO_SIZE'), { correlationId });
    }
    const reasonCodes = isLivePhase(phase) ? sizing.reasonCodes : pushReason([...sizing.reasonCodes], 'PAPER_ONLY');

    this.ledger.recordAdmission(candidate, sizing.size, phase, reasonCodes, now);
    console.log(`Admitted ${correlationId} in ${phase} with size ${sizing.size}`);
    return {
      status: 'ADMITTED',
      correlationId,
      phase,
      size: sizing.size,
      reasonCodes,
      decidedAt: now.toISOString()
    };
  }

  reportOutcome(input: unknown, now: Date = new Date()): RecordOutcomeResult {
    const result = this.ledger.recordOutcome(input, now);
    if (result.ok) return result;
    if (result.error === 'MALFORMED_INPUT') {
      console.error(`Malformed trade outcome from execution feed: ${result.issues.join('; ')}`);
    } else {
      console.warn(`Duplicate outcome for ${result.correlationId} rejected`);
    }
    return result;
  }
}
