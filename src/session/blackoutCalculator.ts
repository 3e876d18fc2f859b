import { addMinutes } from '../core/time';
import { BlackoutConfig, CalendarEvent, EventImpact } from '../core/types';

export interface BlackoutWindow {
  start: Date;
  end: Date;
  events: string[];
}

export interface BlackoutCheck {
  blackedOut: boolean;
  window?: BlackoutWindow;
}

// Titles that mark an event high-impact regardless of what the feed reports.
const HIGH_IMPACT_KEYWORDS = [
  'FOMC',
  'Federal Reserve',
  'Non-Farm Payrolls',
  'NFP',
  'CPI',
  'Inflation',
  'GDP',
  'Fed Chair',
  'Interest Rate',
  'Unemployment',
  'Retail Sales',
  'ISM Manufacturing',
  'ISM Services'
];

export const classifyEventImpact = (event: CalendarEvent): EventImpact => {
  const title = event.title.toLowerCase();
  if (HIGH_IMPACT_KEYWORDS.some((k) => title.includes(k.toLowerCase()))) return 'high';
  return event.impact ?? 'low';
};

// Overlapping or touching windows collapse into one interval.
export const mergeWindows = (windows: BlackoutWindow[]): BlackoutWindow[] => {
  const sorted = windows.slice().sort((a, b) => a.start.getTime() - b.start.getTime());
  const merged: BlackoutWindow[] = [];
  for (const w of sorted) {
    const last = merged[merged.length - 1];
    if (last && w.start.getTime() <= last.end.getTime()) {
      if (w.end.getTime() > last.end.getTime()) last.end = w.end;
      last.events.push(...w.events);
    } else {
      merged.push({ start: w.start, end: w.end, events: [...w.events] });
    }
  }
  return merged;
};

export class BlackoutCalculator {
  private cfg: BlackoutConfig;
  private windows: BlackoutWindow[] = [];

  constructor(cfg: BlackoutConfig, events: CalendarEvent[] = []) {
    this.cfg = cfg;
    this.setEvents(events);
  }

  setEvents(events: CalendarEvent[]) {
    const raw = events
      .filter((e) => classifyEventImpact(e) === 'high')
      .map((e) => {
        const at = new Date(e.at);
        return {
          start: addMinutes(at, -this.cfg.preBufferMinutes),
          end: addMinutes(at, this.cfg.postBufferMinutes),
          events: [e.title]
        };
      });
    this.windows = mergeWindows(raw);
  }

  getWindows(): BlackoutWindow[] {
    return this.windows.map((w) => ({ ...w, events: [...w.events] }));
  }

  check(ts: Date): BlackoutCheck {
    const t = ts.getTime();
    const window = this.windows.find((w) => w.start.getTime() <= t && t <= w.end.getTime());
    return window ? { blackedOut: true, window: { ...window, events: [...window.events] } } : { blackedOut: false };
  }
}
