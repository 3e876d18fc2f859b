import { z } from 'zod';
import { parseClock } from './time';
import { EngineConfig, LedgerEvent, OPERATING_PHASES, SetupCandidate, TradeOutcome } from './types';

const isoInstant = z.string().refine((val) => !Number.isNaN(Date.parse(val)), {
  message: 'must be an ISO timestamp'
});

const finite = () => z.number().finite();

export const setupCandidateSchema: z.ZodType<SetupCandidate> = z.object({
  timestamp: isoInstant,
  direction: z.enum(['LONG', 'SHORT']),
  confidence: finite().min(0).max(1),
  rewardRisk: finite(),
  stopDistance: finite(),
  setupType: z.string(),
  correlationId: z.string().min(1)
});

export const tradeOutcomeSchema: z.ZodType<TradeOutcome> = z.object({
  correlationId: z.string().min(1),
  pnlFraction: finite(),
  rMultiple: finite(),
  closedAt: isoInstant
});

const phaseSchema = z.enum(OPERATING_PHASES);

const clock = z.string().refine(
  (val) => {
    try {
      parseClock(val);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'must be HH:mm' }
);

const fraction = () => finite().min(0).max(1);

const milestoneSchema = z.object({
  minSampleSize: z.number().int().min(0),
  minAccuracy: fraction(),
  maxDrawdown: finite().positive(),
  minAvgRMultiple: finite(),
  minElapsedDays: finite().min(0)
});

const isValidTimeZone = (tz: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
};

export const engineConfigSchema: z.ZodType<EngineConfig> = z
  .object({
    account: z.object({ startingEquity: finite().positive() }),
    liveTradingEnabled: z.boolean(),
    session: z.object({
      timezone: z.string().refine(isValidTimeZone, { message: 'unknown IANA timezone' }),
      tradingWindow: z.object({ start: clock, end: clock }),
      holidays: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'holiday must be YYYY-MM-DD'))
    }),
    blackout: z.object({
      preBufferMinutes: finite().min(0),
      postBufferMinutes: finite().min(0)
    }),
    calendarFile: z.string().optional(),
    setupFilters: z.object({
      minConfidence: fraction(),
      minRewardRisk: finite().min(0),
      excludedSetupTypes: z.array(z.string())
    }),
    limits: z.object({
      dailyLossLimitPct: finite().positive().max(1),
      weeklyLossLimitPct: finite().positive().max(1),
      maxTradesPerDay: z.number().int().positive(),
      maxTradesPerWeek: z.number().int().positive(),
      maxOpenPositions: z.number().int().positive()
    }),
    sizing: z.object({
      microLiveContracts: z.number().int().positive(),
      riskFraction: finite().positive().max(1),
      contractRiskPerUnit: finite().positive(),
      maxContracts: z.number().int().positive()
    }),
    milestones: z.object({
      OBSERVATION: milestoneSchema,
      PAPER_TRADING: milestoneSchema,
      MICRO_LIVE: milestoneSchema
    }),
    ledger: z.object({ windowDays: z.number().int().positive() }),
    uiPort: z.number().int().min(0).max(65535).optional(),
    uiBind: z.string().optional()
  })
  .superRefine((cfg, ctx) => {
    const { start, end } = cfg.session.tradingWindow;
    const startOk = clock.safeParse(start).success;
    const endOk = clock.safeParse(end).success;
    if (startOk && endOk && parseClock(start) >= parseClock(end)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['session', 'tradingWindow'],
        message: 'start must be before end'
      });
    }
    if (cfg.limits.weeklyLossLimitPct < cfg.limits.dailyLossLimitPct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['limits', 'weeklyLossLimitPct'],
        message: 'weekly loss limit must not be tighter than the daily limit'
      });
    }
    if (cfg.limits.maxTradesPerWeek < cfg.limits.maxTradesPerDay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['limits', 'maxTradesPerWeek'],
        message: 'weekly trade cap must be at least the daily cap'
      });
    }
    const longestLookback = Math.max(...Object.values(cfg.milestones).map((m) => m.minElapsedDays));
    if (cfg.ledger.windowDays < longestLookback) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ledger', 'windowDays'],
        message: `window must cover the longest milestone lookback (${longestLookback} days)`
      });
    }
  });

const periodSummarySchema = z.object({
  kind: z.enum(['DAY', 'WEEK']),
  key: z.string(),
  realizedPnl: finite(),
  trades: z.number().int().min(0),
  outcomes: z.number().int().min(0)
});

const reasonCodeSchema = z.enum([
  'MALFORMED_INPUT',
  'LOW_CONFIDENCE',
  'LOW_REWARD_RISK',
  'EXCLUDED_SETUP_TYPE',
  'DUPLICATE_CANDIDATE',
  'STALE_SETUP',
  'WEEKEND',
  'HOLIDAY',
  'OUTSIDE_SESSION',
  'NEWS_BLACKOUT',
  'DAILY_LIMIT_BREACHED',
  'WEEKLY_LIMIT_BREACHED',
  'DAILY_TRADE_CAP_REACHED',
  'WEEKLY_TRADE_CAP_REACHED',
  'MAX_OPEN_POSITIONS',
  'LIVE_TRADING_DISABLED',
  'INVALID_STOP',
  'ZERO_SIZE',
  'SIZE_CAPPED',
  'PAPER_ONLY'
]);

const eventBase = {
  seq: z.number().int().positive(),
  id: z.string(),
  timestamp: isoInstant
};

export const ledgerEventSchema: z.ZodType<LedgerEvent> = z.discriminatedUnion('type', [
  z.object({
    ...eventBase,
    type: z.literal('ENGINE_INITIALIZED'),
    details: z.object({ phase: phaseSchema, equity: finite(), dayKey: z.string(), weekKey: z.string() })
  }),
  z.object({
    ...eventBase,
    type: z.literal('CANDIDATE_ADMITTED'),
    details: z.object({
      candidate: setupCandidateSchema,
      size: z.number().int().min(0),
      phase: phaseSchema,
      reasonCodes: z.array(reasonCodeSchema)
    })
  }),
  z.object({
    ...eventBase,
    type: z.literal('CANDIDATE_REJECTED'),
    details: z.object({
      correlationId: z.string().optional(),
      reasonCodes: z.array(reasonCodeSchema),
      category: z.enum(['MALFORMED', 'VALIDATION', 'GATE'])
    })
  }),
  z.object({ ...eventBase, type: z.literal('OUTCOME_RECORDED'), details: z.object({ outcome: tradeOutcomeSchema }) }),
  z.object({
    ...eventBase,
    type: z.literal('PERIOD_ROLLED_OVER'),
    details: z.object({ dayKey: z.string(), weekKey: z.string(), archived: z.array(periodSummarySchema) })
  }),
  z.object({
    ...eventBase,
    type: z.literal('LIMIT_LATCHED'),
    details: z.object({ scope: z.enum(['DAY', 'WEEK']), key: z.string(), pnl: finite() })
  }),
  z.object({
    ...eventBase,
    type: z.literal('PHASE_ADVANCED'),
    details: z.object({ from: phaseSchema, to: phaseSchema })
  }),
  z.object({
    ...eventBase,
    type: z.literal('PHASE_DOWNGRADED'),
    details: z.object({ from: phaseSchema, to: phaseSchema, reason: z.string() })
  }),
  z.object({
    ...eventBase,
    type: z.literal('EQUITY_UPDATED'),
    details: z.object({ from: finite(), to: finite() })
  })
]);

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));

export const parseSetupCandidate = (
  input: unknown
): { success: true; value: SetupCandidate } | { success: false; errors: string[] } => {
  const result = setupCandidateSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: Object.freeze({ ...result.data }) };
  }
  return { success: false, errors: formatIssues(result.error) };
};

export const parseTradeOutcome = (
  input: unknown
): { success: true; value: TradeOutcome } | { success: false; errors: string[] } => {
  const result = tradeOutcomeSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: Object.freeze({ ...result.data }) };
  }
  return { success: false, errors: formatIssues(result.error) };
};
