import { CheckResult } from '../core/types';
import { BlackoutCalculator } from './blackoutCalculator';
import { SessionOracle } from './sessionOracle';

export interface TradabilityResult extends CheckResult {
  resumesAt?: string;
  blackoutEvents?: string[];
}

export const isTradable = (ts: Date, oracle: SessionOracle, blackout: BlackoutCalculator): TradabilityResult => {
  const session = oracle.check(ts);
  const reasonCodes = [...session.reasonCodes];
  const news = blackout.check(ts);
  if (news.blackedOut && news.window) {
    reasonCodes.push('NEWS_BLACKOUT');
    return {
      ok: false,
      reasonCodes,
      resumesAt: news.window.end.toISOString(),
      blackoutEvents: news.window.events
    };
  }
  return { ok: reasonCodes.length === 0, reasonCodes };
};
