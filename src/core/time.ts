export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseInstant = (value: string): Date => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parsed;
};

export const parseNow = (value?: string): Date => (value ? parseInstant(value) : new Date());

// Wall-clock time in `tz`, carried in the UTC fields of the returned Date.
export const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

export const sessionDayKey = (date: Date, tz: string): string => formatISODate(tzDate(date, tz));

// ISO-8601 week (Monday start) of the exchange-local date, e.g. 2026-W03.
export const sessionWeekKey = (date: Date, tz: string): string => {
  const local = tzDate(date, tz);
  const day = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate());
  const thursday = new Date(day);
  const isoDay = local.getUTCDay() || 7;
  thursday.setUTCDate(thursday.getUTCDate() + 4 - isoDay);
  const year = thursday.getUTCFullYear();
  const week = Math.ceil(((thursday.getTime() - Date.UTC(year, 0, 1)) / 86400000 + 1) / 7);
  return `${year}-W${String(week).padStart(2, '0')}`;
};

export const minutesOfDay = (date: Date, tz: string): number => {
  const local = tzDate(date, tz);
  return local.getUTCHours() * 60 + local.getUTCMinutes();
};

export const weekdayIndex = (date: Date, tz: string): number => tzDate(date, tz).getUTCDay();

export const parseClock = (hhmm: string): number => {
  const match = /^(\d{2}):(\d{2})$/.exec(hhmm);
  if (!match) throw new Error(`Invalid clock time: ${hhmm}`);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) throw new Error(`Invalid clock time: ${hhmm}`);
  return hours * 60 + minutes;
};

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * 60000);
