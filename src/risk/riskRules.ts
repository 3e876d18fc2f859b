import { LedgerTotals, LimitsConfig } from '../core/types';

export const breachesDailyLoss = (state: LedgerTotals, limits: LimitsConfig): boolean =>
  state.dailyPnl <= -limits.dailyLossLimitPct;

export const breachesWeeklyLoss = (state: LedgerTotals, limits: LimitsConfig): boolean =>
  state.weeklyPnl <= -limits.weeklyLossLimitPct;

export const violatesDailyTradeCap = (state: LedgerTotals, limits: LimitsConfig): boolean =>
  state.tradesToday >= limits.maxTradesPerDay;

export const violatesWeeklyTradeCap = (state: LedgerTotals, limits: LimitsConfig): boolean =>
  state.tradesThisWeek >= limits.maxTradesPerWeek;

export const violatesOpenPositions = (state: LedgerTotals, limits: LimitsConfig): boolean =>
  state.openPositions.length >= limits.maxOpenPositions;

// Share of a loss limit already consumed, as a percentage; gains consume nothing.
export const limitUsedPct = (pnl: number, limitPct: number): number =>
  pnl < 0 ? Math.round((Math.abs(pnl) / limitPct) * 1000) / 10 : 0;
