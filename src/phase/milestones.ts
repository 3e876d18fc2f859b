import { average } from '../core/utils';
import { MilestoneCriteria, MilestoneCriterion, TradeOutcome } from '../core/types';

export interface PhaseMetrics {
  sampleSize: number;
  accuracy: number;
  maxDrawdown: number;
  avgRMultiple: number;
  elapsedDays: number;
}

// Peak-to-trough decline of cumulative P&L (fraction of equity), measured from a flat start.
export const maxDrawdown = (outcomes: TradeOutcome[]): number => {
  let equity = 0;
  let peak = 0;
  let worst = 0;
  for (const o of outcomes) {
    equity += o.pnlFraction;
    peak = Math.max(peak, equity);
    worst = Math.max(worst, peak - equity);
  }
  return worst;
};

export const computePhaseMetrics = (outcomes: TradeOutcome[], enteredAt: Date, now: Date): PhaseMetrics => {
  const wins = outcomes.filter((o) => o.pnlFraction > 0).length;
  return {
    sampleSize: outcomes.length,
    accuracy: outcomes.length ? wins / outcomes.length : 0,
    maxDrawdown: maxDrawdown(outcomes),
    avgRMultiple: average(outcomes.map((o) => o.rMultiple)),
    elapsedDays: Math.max(0, (now.getTime() - enteredAt.getTime()) / 86400000)
  };
};

export const unmetCriteria = (metrics: PhaseMetrics, criteria: MilestoneCriteria): MilestoneCriterion[] => {
  const unmet: MilestoneCriterion[] = [];
  if (metrics.sampleSize < criteria.minSampleSize) unmet.push('SAMPLE_SIZE');
  if (metrics.accuracy < criteria.minAccuracy) unmet.push('ACCURACY');
  if (metrics.maxDrawdown > criteria.maxDrawdown) unmet.push('DRAWDOWN');
  if (metrics.avgRMultiple < criteria.minAvgRMultiple) unmet.push('R_MULTIPLE');
  if (metrics.elapsedDays < criteria.minElapsedDays) unmet.push('ELAPSED_TIME');
  return unmet;
};
