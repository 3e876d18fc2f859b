import path from 'path';
import { RiskLedger } from '../ledger/riskLedger';
import { JsonlLedgerStore, LedgerStore } from '../ledger/storage';
import { Authorizer, PhaseController, envAuthorizer } from '../phase/phaseController';
import { RiskGate, isLivePhase } from '../risk/riskGate';
import {
  breachesDailyLoss,
  breachesWeeklyLoss,
  limitUsedPct,
  violatesDailyTradeCap,
  violatesWeeklyTradeCap
} from '../risk/riskRules';
import { BlackoutCalculator } from '../session/blackoutCalculator';
import { SessionOracle, createSessionOracle } from '../session/sessionOracle';
import { isTradable } from '../session/tradability';
import { CalendarEvent, EngineConfig, LedgerTotals, OperatingPhase } from './types';
import { defaultConfigPath, loadCalendar, loadConfig } from './utils';

export interface EngineOptions {
  config?: EngineConfig;
  store?: LedgerStore;
  events?: CalendarEvent[];
  authorizer?: Authorizer;
  now?: Date;
}

export interface EngineStatus {
  asOf: string;
  phase: OperatingPhase;
  phaseEnteredAt: string;
  equity: number;
  ledger: LedgerTotals;
  dailyLimitUsedPct: number;
  weeklyLimitUsedPct: number;
  dailyLatched: boolean;
  weeklyLatched: boolean;
  tradableNow: boolean;
  canTrade: boolean;
  liveTradingEnabled: boolean;
}

export interface Engine {
  config: EngineConfig;
  ledger: RiskLedger;
  oracle: SessionOracle;
  blackout: BlackoutCalculator;
  gate: RiskGate;
  phases: PhaseController;
  // Read-only view for the day and week of `now`; nothing is written.
  status(now?: Date): EngineStatus;
  close(): void;
}

// One engine per account; the store's lock keeps a second writer out.
export const openEngine = (opts: EngineOptions = {}): Engine => {
  const config = opts.config ?? loadConfig(defaultConfigPath());
  const events =
    opts.events ?? (config.calendarFile ? loadCalendar(path.resolve(process.cwd(), config.calendarFile)) : []);
  const store = opts.store ?? new JsonlLedgerStore();
  let ledger: RiskLedger;
  try {
    ledger = new RiskLedger(store, {
      timezone: config.session.timezone,
      windowDays: config.ledger.windowDays,
      startingEquity: config.account.startingEquity,
      now: opts.now
    });
  } catch (err) {
    store.close();
    throw err;
  }
  const oracle = createSessionOracle(config.session);
  const blackout = new BlackoutCalculator(config.blackout, events);
  const gate = new RiskGate({ config, ledger, oracle, blackout });
  const phases = new PhaseController(config, ledger, opts.authorizer ?? envAuthorizer());

  const status = (now: Date = new Date()): EngineStatus => {
    const state = ledger.getTotals(now);
    const phase = ledger.getPhase();
    const dailyLatched = ledger.isLatched('DAY', now) || breachesDailyLoss(state, config.limits);
    const weeklyLatched = ledger.isLatched('WEEK', now) || breachesWeeklyLoss(state, config.limits);
    const tradableNow = isTradable(now, oracle, blackout).ok;
    const liveBlocked = isLivePhase(phase) && !config.liveTradingEnabled;
    return {
      asOf: now.toISOString(),
      phase,
      phaseEnteredAt: ledger.getPhaseEnteredAt().toISOString(),
      equity: ledger.getEquity(),
      ledger: state,
      dailyLimitUsedPct: limitUsedPct(state.dailyPnl, config.limits.dailyLossLimitPct),
      weeklyLimitUsedPct: limitUsedPct(state.weeklyPnl, config.limits.weeklyLossLimitPct),
      dailyLatched,
      weeklyLatched,
      tradableNow,
      canTrade:
        tradableNow &&
        !dailyLatched &&
        !weeklyLatched &&
        !violatesDailyTradeCap(state, config.limits) &&
        !violatesWeeklyTradeCap(state, config.limits) &&
        !liveBlocked,
      liveTradingEnabled: config.liveTradingEnabled
    };
  };

  return {
    config,
    ledger,
    oracle,
    blackout,
    gate,
    phases,
    status,
    close: () => ledger.close()
  };
};
