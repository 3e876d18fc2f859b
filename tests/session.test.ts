import { BlackoutCalculator, classifyEventImpact, mergeWindows } from '../src/session/blackoutCalculator';
import { createSessionOracle } from '../src/session/sessionOracle';
import { isTradable } from '../src/session/tradability';
import { sessionDayKey, sessionWeekKey } from '../src/core/time';
import { makeConfig } from './fixtures';

const config = makeConfig();
const oracle = createSessionOracle(config.session);

describe('session oracle', () => {
  it('allows a weekday inside the trading window', () => {
    expect(oracle.check(new Date('2026-01-13T15:00:00Z'))).toEqual({ ok: true, reasonCodes: [] });
  });

  it('rejects weekends', () => {
    expect(oracle.check(new Date('2026-01-17T15:00:00Z')).reasonCodes).toEqual(['WEEKEND']);
  });

  it('rejects configured holidays', () => {
    expect(oracle.check(new Date('2026-01-19T15:00:00Z')).reasonCodes).toEqual(['HOLIDAY']);
  });

  it('treats the window as start-inclusive and end-exclusive', () => {
    expect(oracle.check(new Date('2026-01-13T14:29:00Z')).reasonCodes).toEqual(['OUTSIDE_SESSION']);
    expect(oracle.check(new Date('2026-01-13T14:30:00Z')).ok).toBe(true);
    expect(oracle.check(new Date('2026-01-13T16:29:00Z')).ok).toBe(true);
    expect(oracle.check(new Date('2026-01-13T16:30:00Z')).reasonCodes).toEqual(['OUTSIDE_SESSION']);
  });

  it('follows daylight saving time in the exchange timezone', () => {
    // 14:00Z is 09:00 EST in January but 10:00 EDT in March
    expect(oracle.check(new Date('2026-01-13T14:00:00Z')).ok).toBe(false);
    expect(oracle.check(new Date('2026-03-10T14:00:00Z')).ok).toBe(true);
  });

  it('keys days and weeks by exchange-local date', () => {
    // 03:00Z Wednesday is still Tuesday evening in New York
    expect(sessionDayKey(new Date('2026-01-14T03:00:00Z'), 'America/New_York')).toBe('2026-01-13');
    expect(sessionWeekKey(new Date('2026-01-13T15:00:00Z'), 'America/New_York')).toBe('2026-W03');
    expect(sessionWeekKey(new Date('2026-01-18T15:00:00Z'), 'America/New_York')).toBe('2026-W03');
    expect(sessionWeekKey(new Date('2026-01-19T15:00:00Z'), 'America/New_York')).toBe('2026-W04');
  });
});

describe('blackout calculator', () => {
  it('classifies events by title keyword before reported impact', () => {
    expect(classifyEventImpact({ title: 'FOMC Statement', at: '2026-01-13T19:00:00Z' })).toBe('high');
    expect(classifyEventImpact({ title: 'Core CPI m/m', at: '2026-01-13T13:30:00Z', impact: 'low' })).toBe('high');
    expect(classifyEventImpact({ title: 'Crude Oil Inventories', at: '2026-01-13T15:30:00Z', impact: 'medium' })).toBe(
      'medium'
    );
    expect(classifyEventImpact({ title: 'Consumer Confidence', at: '2026-01-13T15:00:00Z' })).toBe('low');
  });

  it('blacks out the buffered interval around a high-impact event', () => {
    const calc = new BlackoutCalculator(
      { preBufferMinutes: 15, postBufferMinutes: 15 },
      [{ title: 'Fed Chair Testimony', at: '2026-01-13T15:00:00Z' }]
    );
    expect(calc.check(new Date('2026-01-13T14:44:00Z')).blackedOut).toBe(false);
    expect(calc.check(new Date('2026-01-13T14:45:00Z')).blackedOut).toBe(true);
    expect(calc.check(new Date('2026-01-13T14:50:00Z')).window?.end.toISOString()).toBe('2026-01-13T15:15:00.000Z');
    expect(calc.check(new Date('2026-01-13T15:15:00Z')).blackedOut).toBe(true);
    expect(calc.check(new Date('2026-01-13T15:16:00Z')).blackedOut).toBe(false);
  });

  it('ignores events that are not high impact', () => {
    const calc = new BlackoutCalculator(config.blackout, [
      { title: 'Crude Oil Inventories', at: '2026-01-13T15:30:00Z', impact: 'medium' }
    ]);
    expect(calc.getWindows()).toEqual([]);
  });

  it('merges overlapping windows into their union', () => {
    const calc = new BlackoutCalculator(config.blackout, [
      { title: 'GDP q/q', at: '2026-01-13T15:20:00Z' },
      { title: 'Retail Sales m/m', at: '2026-01-13T15:00:00Z' }
    ]);
    const windows = calc.getWindows();
    expect(windows).toHaveLength(1);
    expect(windows[0].start.toISOString()).toBe('2026-01-13T14:45:00.000Z');
    expect(windows[0].end.toISOString()).toBe('2026-01-13T15:50:00.000Z');
    expect(windows[0].events).toEqual(['Retail Sales m/m', 'GDP q/q']);
  });

  it('keeps separate windows apart', () => {
    const merged = mergeWindows([
      { start: new Date('2026-01-13T14:00:00Z'), end: new Date('2026-01-13T14:30:00Z'), events: ['a'] },
      { start: new Date('2026-01-13T15:00:00Z'), end: new Date('2026-01-13T15:30:00Z'), events: ['b'] },
      { start: new Date('2026-01-13T14:30:00Z'), end: new Date('2026-01-13T14:40:00Z'), events: ['c'] }
    ]);
    expect(merged.map((w) => w.events)).toEqual([['a', 'c'], ['b']]);
    expect(merged[0].end.toISOString()).toBe('2026-01-13T14:40:00.000Z');
  });
});

describe('isTradable', () => {
  const blackout = new BlackoutCalculator(
    { preBufferMinutes: 15, postBufferMinutes: 15 },
    [{ title: 'Non-Farm Payrolls', at: '2026-01-13T15:00:00Z' }]
  );

  it('rejects inside a blackout with the time trading resumes', () => {
    const result = isTradable(new Date('2026-01-13T14:50:00Z'), oracle, blackout);
    expect(result).toEqual({
      ok: false,
      reasonCodes: ['NEWS_BLACKOUT'],
      resumesAt: '2026-01-13T15:15:00.000Z',
      blackoutEvents: ['Non-Farm Payrolls']
    });
  });

  it('reports session reasons ahead of the blackout', () => {
    const early = new BlackoutCalculator(config.blackout, [{ title: 'CPI y/y', at: '2026-01-13T14:20:00Z' }]);
    const result = isTradable(new Date('2026-01-13T14:25:00Z'), oracle, early);
    expect(result.reasonCodes).toEqual(['OUTSIDE_SESSION', 'NEWS_BLACKOUT']);
  });

  it('allows trading once the window has passed', () => {
    expect(isTradable(new Date('2026-01-13T15:20:00Z'), oracle, blackout)).toEqual({ ok: true, reasonCodes: [] });
  });
});
