import fs from 'fs';
import os from 'os';
import path from 'path';
import { Engine, openEngine } from '../src/core/engine';
import { PersistenceFailure } from '../src/core/errors';
import { CalendarEvent, EngineConfig, LedgerEvent, OperatingPhase, SetupCandidate, TradeOutcome } from '../src/core/types';
import { JsonlLedgerStore, LedgerStore } from '../src/ledger/storage';
import { Authorizer, createSecretAuthorizer } from '../src/phase/phaseController';

// Tuesday 2026-01-13; New York is UTC-5, so 10:00 local is 15:00Z.
export const TUESDAY_OPEN = new Date('2026-01-13T14:00:00Z');
export const TUESDAY_10AM = new Date('2026-01-13T15:00:00Z');

export const testAuthorizer: Authorizer = createSecretAuthorizer({ ADVANCE: 'test-secret', DOWNGRADE: 'test-admin' });

export const makeConfig = (overrides: Partial<EngineConfig> = {}): EngineConfig => ({
  account: { startingEquity: 10000 },
  liveTradingEnabled: true,
  session: {
    timezone: 'America/New_York',
    tradingWindow: { start: '09:30', end: '11:30' },
    holidays: ['2026-01-19']
  },
  blackout: { preBufferMinutes: 15, postBufferMinutes: 30 },
  setupFilters: { minConfidence: 0.65, minRewardRisk: 1.5, excludedSetupTypes: ['counter_trend'] },
  limits: {
    dailyLossLimitPct: 0.03,
    weeklyLossLimitPct: 0.06,
    maxTradesPerDay: 3,
    maxTradesPerWeek: 12,
    maxOpenPositions: 3
  },
  sizing: { microLiveContracts: 2, riskFraction: 0.01, contractRiskPerUnit: 2, maxContracts: 10 },
  milestones: {
    OBSERVATION: { minSampleSize: 3, minAccuracy: 0.5, maxDrawdown: 0.05, minAvgRMultiple: 0.5, minElapsedDays: 7 },
    PAPER_TRADING: { minSampleSize: 3, minAccuracy: 0.5, maxDrawdown: 0.05, minAvgRMultiple: 0.5, minElapsedDays: 7 },
    MICRO_LIVE: { minSampleSize: 3, minAccuracy: 0.5, maxDrawdown: 0.05, minAvgRMultiple: 0.5, minElapsedDays: 7 }
  },
  ledger: { windowDays: 84 },
  ...overrides
});

export const makeCandidate = (overrides: Partial<SetupCandidate> = {}): SetupCandidate => ({
  timestamp: TUESDAY_10AM.toISOString(),
  direction: 'LONG',
  confidence: 0.8,
  rewardRisk: 2,
  stopDistance: 50,
  setupType: 'opening_range_breakout',
  correlationId: 'setup-1',
  ...overrides
});

export const makeOutcome = (overrides: Partial<TradeOutcome> = {}): TradeOutcome => ({
  correlationId: 'setup-1',
  pnlFraction: -0.012,
  rMultiple: -1,
  closedAt: TUESDAY_10AM.toISOString(),
  ...overrides
});

export const tmpLedgerDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'risk-ledger-'));

export class MemoryStore implements LedgerStore {
  events: LedgerEvent[];
  failAppends = false;

  constructor(seed: LedgerEvent[] = []) {
    this.events = [...seed];
  }

  readAll() {
    return [...this.events];
  }

  append(event: LedgerEvent) {
    if (this.failAppends) throw new PersistenceFailure(`disk full writing seq ${event.seq}`);
    this.events.push(event);
  }

  close() {}
}

export const seededStore = (phase: OperatingPhase, at: Date = TUESDAY_OPEN) =>
  new MemoryStore([
    {
      seq: 1,
      id: 'seed',
      timestamp: at.toISOString(),
      type: 'ENGINE_INITIALIZED',
      details: { phase, equity: 10000, dayKey: '2026-01-13', weekKey: '2026-W03' }
    }
  ]);

export const openTestEngine = (
  opts: { config?: EngineConfig; store?: LedgerStore; dir?: string; events?: CalendarEvent[]; now?: Date } = {}
): Engine =>
  openEngine({
    config: opts.config ?? makeConfig(),
    store: opts.store ?? new JsonlLedgerStore(opts.dir ?? tmpLedgerDir()),
    events: opts.events ?? [],
    authorizer: testAuthorizer,
    now: opts.now ?? TUESDAY_OPEN
  });

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
