import { MilestoneCriterion, ReasonCode } from '../core/types';
import { AdvancementReport } from '../phase/phaseController';

const criterionTexts: Record<MilestoneCriterion, string> = {
  SAMPLE_SIZE: 'Not enough recorded outcomes in this phase.',
  ACCURACY: 'Win rate is below the milestone minimum.',
  DRAWDOWN: 'Peak-to-trough drawdown exceeds the milestone maximum.',
  R_MULTIPLE: 'Average R-multiple is below the milestone minimum.',
  ELAPSED_TIME: 'Minimum time in phase has not elapsed.',
  FINAL_PHASE: 'Already in the final phase.'
};

const reasonTexts: Partial<Record<ReasonCode, string>> = {
  MALFORMED_INPUT: 'Candidate failed basic sanity checks.',
  LOW_CONFIDENCE: 'Confidence below configured minimum.',
  LOW_REWARD_RISK: 'Reward:risk below configured minimum.',
  EXCLUDED_SETUP_TYPE: 'Setup type is excluded.',
  DUPLICATE_CANDIDATE: 'Candidate already admitted.',
  STALE_SETUP: 'Setup belongs to a different session day.',
  WEEKEND: 'Market closed (weekend).',
  HOLIDAY: 'Market holiday.',
  OUTSIDE_SESSION: 'Outside the trading window.',
  NEWS_BLACKOUT: 'High-impact news blackout.',
  DAILY_LIMIT_BREACHED: 'Daily loss limit reached; trading halted for the day.',
  WEEKLY_LIMIT_BREACHED: 'Weekly loss limit reached; trading halted for the week.',
  DAILY_TRADE_CAP_REACHED: 'Maximum trades for today reached.',
  WEEKLY_TRADE_CAP_REACHED: 'Maximum trades for this week reached.',
  MAX_OPEN_POSITIONS: 'Maximum simultaneous positions open.',
  LIVE_TRADING_DISABLED: 'Live trading switch is off.',
  INVALID_STOP: 'Stop distance is zero or invalid.',
  ZERO_SIZE: 'Computed position size is zero.'
};

export const describeCriteria = (codes: MilestoneCriterion[]): string[] => codes.map((c) => criterionTexts[c]);

export const describeReasons = (codes: ReasonCode[]): string[] => codes.map((c) => reasonTexts[c] ?? c);

export interface ApprovalRequest {
  eligible: boolean;
  summary: string;
  details: string[];
  report: AdvancementReport;
}

// Payload handed to the notification/approval collaborator.
export const buildApprovalRequest = (report: AdvancementReport): ApprovalRequest => {
  const pct = (v: number) => `${(v * 100).toFixed(1)}%`;
  const m = report.metrics;
  const summary = report.eligible
    ? `${report.phase} milestones met; approve advance to ${report.nextPhase}.`
    : `${report.phase} not yet eligible (${report.unmetCriteria.join(', ')}).`;
  return {
    eligible: report.eligible,
    summary,
    details: [
      `Samples: ${m.sampleSize}`,
      `Accuracy: ${pct(m.accuracy)}`,
      `Max drawdown: ${pct(m.maxDrawdown)}`,
      `Avg R: ${m.avgRMultiple.toFixed(2)}`,
      `Days in phase: ${m.elapsedDays.toFixed(1)}`,
      ...describeCriteria(report.unmetCriteria)
    ],
    report
  };
};
