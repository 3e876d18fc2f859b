export * from './core/types';
export { ConfigurationError, PersistenceFailure } from './core/errors';
export { loadConfig, validateConfig, loadCalendar } from './core/utils';
export { openEngine, Engine, EngineOptions, EngineStatus } from './core/engine';
export { validateSetup, SetupValidation } from './risk/setupValidator';
export { sizePosition, SizingResult } from './risk/positionSizer';
export { RiskGate, isLivePhase } from './risk/riskGate';
export { RiskLedger, RecordOutcomeResult } from './ledger/riskLedger';
export { JsonlLedgerStore, LedgerStore } from './ledger/storage';
export { createSessionOracle, SessionOracle } from './session/sessionOracle';
export { BlackoutCalculator, classifyEventImpact, mergeWindows } from './session/blackoutCalculator';
export { isTradable } from './session/tradability';
export {
  PhaseController,
  Authorizer,
  AdvanceResult,
  AdvancementReport,
  DowngradeResult,
  createSecretAuthorizer,
  envAuthorizer
} from './phase/phaseController';
export { computePhaseMetrics, maxDrawdown, unmetCriteria, PhaseMetrics } from './phase/milestones';
