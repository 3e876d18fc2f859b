import { OperatingPhase, ReasonCode, SizingConfig } from '../core/types';

export interface SizingResult {
  size: number;
  reasonCodes: ReasonCode[];
}

export const sizePosition = (
  phase: OperatingPhase,
  equity: number,
  stopDistance: number,
  sizing: SizingConfig
): SizingResult => {
  switch (phase) {
    case 'OBSERVATION':
    case 'PAPER_TRADING':
      return { size: 0, reasonCodes: [] };
    case 'MICRO_LIVE':
      return { size: sizing.microLiveContracts, reasonCodes: [] };
    case 'FULL_LIVE': {
      if (!Number.isFinite(stopDistance) || stopDistance <= 0) {
        return { size: 0, reasonCodes: ['INVALID_STOP'] };
      }
      const riskBudget = equity * sizing.riskFraction;
      const raw = Math.floor(riskBudget / (stopDistance * sizing.contractRiskPerUnit));
      if (!Number.isFinite(raw) || raw <= 0) return { size: 0, reasonCodes: [] };
      if (raw > sizing.maxContracts) return { size: sizing.maxContracts, reasonCodes: ['SIZE_CAPPED'] };
      return { size: raw, reasonCodes: [] };
    }
  }
};
