export const OPERATING_PHASES = ['OBSERVATION', 'PAPER_TRADING', 'MICRO_LIVE', 'FULL_LIVE'] as const;

export type OperatingPhase = (typeof OPERATING_PHASES)[number];

export type Direction = 'LONG' | 'SHORT';

export interface SetupCandidate {
  timestamp: string; // ISO
  direction: Direction;
  confidence: number; // 0..1
  rewardRisk: number;
  stopDistance: number; // points
  setupType: string;
  correlationId: string;
}

export interface TradeOutcome {
  correlationId: string;
  pnlFraction: number; // realized P&L / account equity
  rMultiple: number;
  closedAt: string; // ISO
}

export type ReasonCode =
  | 'MALFORMED_INPUT'
  | 'LOW_CONFIDENCE'
  | 'LOW_REWARD_RISK'
  | 'EXCLUDED_SETUP_TYPE'
  | 'DUPLICATE_CANDIDATE'
  | 'STALE_SETUP'
  | 'WEEKEND'
  | 'HOLIDAY'
  | 'OUTSIDE_SESSION'
  | 'NEWS_BLACKOUT'
  | 'DAILY_LIMIT_BREACHED'
  | 'WEEKLY_LIMIT_BREACHED'
  | 'DAILY_TRADE_CAP_REACHED'
  | 'WEEKLY_TRADE_CAP_REACHED'
  | 'MAX_OPEN_POSITIONS'
  | 'LIVE_TRADING_DISABLED'
  | 'INVALID_STOP'
  | 'ZERO_SIZE'
  | 'SIZE_CAPPED'
  | 'PAPER_ONLY';

export type RejectionCategory = 'MALFORMED' | 'VALIDATION' | 'GATE';

export interface AdmittedDecision {
  status: 'ADMITTED';
  correlationId: string;
  phase: OperatingPhase;
  size: number;
  reasonCodes: ReasonCode[];
  decidedAt: string;
}

export interface RejectedDecision {
  status: 'REJECTED';
  correlationId?: string;
  category: RejectionCategory;
  reasonCodes: ReasonCode[];
  decidedAt: string;
  resumesAt?: string;
  issues?: string[];
}

export type AdmissionDecision = AdmittedDecision | RejectedDecision;

export interface CheckResult {
  ok: boolean;
  reasonCodes: ReasonCode[];
}

export interface MilestoneCriteria {
  minSampleSize: number;
  minAccuracy: number; // 0..1
  maxDrawdown: number; // fraction of equity, positive
  minAvgRMultiple: number;
  minElapsedDays: number;
}

export type MilestoneCriterion = 'SAMPLE_SIZE' | 'ACCURACY' | 'DRAWDOWN' | 'R_MULTIPLE' | 'ELAPSED_TIME' | 'FINAL_PHASE';

export interface SessionConfig {
  timezone: string;
  tradingWindow: { start: string; end: string }; // HH:mm exchange time, end exclusive
  holidays: string[]; // YYYY-MM-DD exchange dates
}

export interface BlackoutConfig {
  preBufferMinutes: number;
  postBufferMinutes: number;
}

export interface SizingConfig {
  microLiveContracts: number;
  riskFraction: number;
  contractRiskPerUnit: number;
  maxContracts: number;
}

export interface LimitsConfig {
  dailyLossLimitPct: number;
  weeklyLossLimitPct: number;
  maxTradesPerDay: number;
  maxTradesPerWeek: number;
  maxOpenPositions: number;
}

export interface SetupFilterConfig {
  minConfidence: number;
  minRewardRisk: number;
  excludedSetupTypes: string[];
}

export interface EngineConfig {
  account: { startingEquity: number };
  liveTradingEnabled: boolean;
  session: SessionConfig;
  blackout: BlackoutConfig;
  calendarFile?: string;
  setupFilters: SetupFilterConfig;
  limits: LimitsConfig;
  sizing: SizingConfig;
  milestones: Record<Exclude<OperatingPhase, 'FULL_LIVE'>, MilestoneCriteria>;
  ledger: { windowDays: number };
  uiPort?: number;
  uiBind?: string;
}

export type EventImpact = 'high' | 'medium' | 'low';

export interface CalendarEvent {
  title: string;
  at: string; // ISO instant
  impact?: EventImpact;
  currency?: string;
}

export interface PeriodSummary {
  kind: 'DAY' | 'WEEK';
  key: string;
  realizedPnl: number;
  trades: number;
  outcomes: number;
}

export interface OpenPosition {
  correlationId: string;
  size: number;
  admittedAt: string;
}

export interface RiskLedgerState {
  dayKey: string;
  weekKey: string;
  dailyPnl: number;
  weeklyPnl: number;
  tradesToday: number;
  tradesThisWeek: number;
  window: TradeOutcome[];
  periods: PeriodSummary[];
  openPositions: OpenPosition[];
}

export type LedgerTotals = Omit<RiskLedgerState, 'window' | 'periods'>;

export type LimitScope = 'DAY' | 'WEEK';

interface LedgerEventBase {
  seq: number;
  id: string;
  timestamp: string;
}

export type LedgerEvent = LedgerEventBase &
  (
    | { type: 'ENGINE_INITIALIZED'; details: { phase: OperatingPhase; equity: number; dayKey: string; weekKey: string } }
    | { type: 'CANDIDATE_ADMITTED'; details: { candidate: SetupCandidate; size: number; phase: OperatingPhase; reasonCodes: ReasonCode[] } }
    | { type: 'CANDIDATE_REJECTED'; details: { correlationId?: string; reasonCodes: ReasonCode[]; category: RejectionCategory } }
    | { type: 'OUTCOME_RECORDED'; details: { outcome: TradeOutcome } }
    | { type: 'PERIOD_ROLLED_OVER'; details: { dayKey: string; weekKey: string; archived: PeriodSummary[] } }
    | { type: 'LIMIT_LATCHED'; details: { scope: LimitScope; key: string; pnl: number } }
    | { type: 'PHASE_ADVANCED'; details: { from: OperatingPhase; to: OperatingPhase } }
    | { type: 'PHASE_DOWNGRADED'; details: { from: OperatingPhase; to: OperatingPhase; reason: string } }
    | { type: 'EQUITY_UPDATED'; details: { from: number; to: number } }
  );

type DistributiveOmit<T, K extends keyof LedgerEventBase> = T extends unknown ? Omit<T, K> : never;

export type NewLedgerEvent = DistributiveOmit<LedgerEvent, keyof LedgerEventBase>;
