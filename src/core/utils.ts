import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { engineConfigSchema, formatIssues } from './schema';
import { CalendarEvent, EngineConfig } from './types';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const defaultConfigPath = () =>
  path.resolve(process.cwd(), process.env.ENGINE_CONFIG || 'src/config/default.json');

export const validateConfig = (raw: unknown): EngineConfig => {
  const result = engineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', formatIssues(result.error));
  }
  return result.data;
};

export const loadConfig = (configPath: string): EngineConfig => {
  let raw: unknown;
  try {
    raw = readJSONFile(configPath);
  } catch (err) {
    throw new ConfigurationError(`Unable to read config ${configPath}`, [err instanceof Error ? err.message : String(err)]);
  }
  return validateConfig(raw);
};

const calendarSchema = z.array(
  z.object({
    title: z.string(),
    at: z.string().refine((val) => !Number.isNaN(Date.parse(val)), { message: 'must be an ISO timestamp' }),
    impact: z.enum(['high', 'medium', 'low']).optional(),
    currency: z.string().optional()
  })
);

export const loadCalendar = (calendarPath: string): CalendarEvent[] => {
  if (!fs.existsSync(calendarPath)) {
    console.warn(`Calendar file ${calendarPath} not found; no blackout windows loaded.`);
    return [];
  }
  let raw: unknown;
  try {
    raw = readJSONFile(calendarPath);
  } catch (err) {
    throw new ConfigurationError(`Unable to read calendar ${calendarPath}`, [err instanceof Error ? err.message : String(err)]);
  }
  const result = calendarSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid calendar ${calendarPath}`, formatIssues(result.error));
  }
  return result.data;
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: number[]): number => (arr.length ? sum(arr) / arr.length : 0);

// Ordered set append: keeps first-fired order, drops repeats.
export const pushReason = <T>(list: T[], ...codes: T[]): T[] => {
  for (const code of codes) {
    if (!list.includes(code)) list.push(code);
  }
  return list;
};
