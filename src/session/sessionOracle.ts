import { minutesOfDay, parseClock, sessionDayKey, weekdayIndex } from '../core/time';
import { CheckResult, ReasonCode, SessionConfig } from '../core/types';

export interface SessionOracle {
  check(ts: Date): CheckResult;
  dayKey(ts: Date): string;
}

export const createSessionOracle = (cfg: SessionConfig): SessionOracle => {
  const holidays = new Set(cfg.holidays);
  const windowStart = parseClock(cfg.tradingWindow.start);
  const windowEnd = parseClock(cfg.tradingWindow.end);

  return {
    dayKey: (ts) => sessionDayKey(ts, cfg.timezone),
    check: (ts) => {
      const reasonCodes: ReasonCode[] = [];
      const weekday = weekdayIndex(ts, cfg.timezone);
      if (weekday === 0 || weekday === 6) reasonCodes.push('WEEKEND');
      if (holidays.has(sessionDayKey(ts, cfg.timezone))) reasonCodes.push('HOLIDAY');
      const minute = minutesOfDay(ts, cfg.timezone);
      if (minute < windowStart || minute >= windowEnd) reasonCodes.push('OUTSIDE_SESSION');
      return { ok: reasonCodes.length === 0, reasonCodes };
    }
  };
};
