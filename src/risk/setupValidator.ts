import { parseSetupCandidate } from '../core/schema';
import { ReasonCode, SetupCandidate, SetupFilterConfig } from '../core/types';

export type SetupValidation =
  | { pass: true; reasonCodes: []; candidate: SetupCandidate }
  | { pass: false; reasonCodes: ReasonCode[]; candidate?: SetupCandidate; issues?: string[] };

export const validateSetup = (input: unknown, filters: SetupFilterConfig): SetupValidation => {
  const parsed = parseSetupCandidate(input);
  if (!parsed.success) {
    return { pass: false, reasonCodes: ['MALFORMED_INPUT'], issues: parsed.errors };
  }
  const candidate = parsed.value;
  const reasonCodes: ReasonCode[] = [];

  if (candidate.confidence < filters.minConfidence) reasonCodes.push('LOW_CONFIDENCE');
  if (candidate.rewardRisk < filters.minRewardRisk) reasonCodes.push('LOW_REWARD_RISK');

  const excluded = new Set(filters.excludedSetupTypes.map((t) => t.toLowerCase()));
  if (excluded.has(candidate.setupType.toLowerCase())) reasonCodes.push('EXCLUDED_SETUP_TYPE');

  if (reasonCodes.length) return { pass: false, reasonCodes, candidate };
  return { pass: true, reasonCodes: [], candidate };
};
