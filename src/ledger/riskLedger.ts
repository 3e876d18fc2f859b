import crypto from 'crypto';
import { parseTradeOutcome } from '../core/schema';
import { addMinutes, sessionDayKey, sessionWeekKey } from '../core/time';
import {
  LedgerEvent,
  LedgerTotals,
  LimitScope,
  NewLedgerEvent,
  OpenPosition,
  OperatingPhase,
  PeriodSummary,
  ReasonCode,
  RejectionCategory,
  RiskLedgerState,
  SetupCandidate,
  TradeOutcome
} from '../core/types';
import { LedgerStore } from './storage';

export interface RiskLedgerOptions {
  timezone: string;
  windowDays: number;
  startingEquity: number;
  now?: Date;
}

export type RecordOutcomeResult =
  | { ok: true; seq: number; outcome: TradeOutcome }
  | { ok: false; error: 'DUPLICATE_OUTCOME'; correlationId: string }
  | { ok: false; error: 'MALFORMED_INPUT'; issues: string[] };

interface WindowEntry {
  seq: number;
  outcome: TradeOutcome;
  dayKey: string;
  weekKey: string;
}

interface AdmissionEntry {
  candidate: SetupCandidate;
  size: number;
  admittedAt: string;
  dayKey: string;
  weekKey: string;
}

// Reported close times may run slightly ahead of the engine clock; anything further out is rejected.
const FUTURE_TOLERANCE_MINUTES = 5;

// Summation in correlation-id order keeps aggregates independent of arrival order.
const sumCanonical = (entries: WindowEntry[]): number =>
  entries
    .slice()
    .sort((a, b) => (a.outcome.correlationId < b.outcome.correlationId ? -1 : a.outcome.correlationId > b.outcome.correlationId ? 1 : 0))
    .reduce((acc, e) => acc + e.outcome.pnlFraction, 0);

export class RiskLedger {
  private store: LedgerStore;
  private tz: string;
  private windowDays: number;
  private seq = 0;
  private dayKey = '';
  private weekKey = '';
  private phase: OperatingPhase = 'OBSERVATION';
  private phaseEnteredAt = '';
  private equity: number;
  private window = new Map<string, WindowEntry>();
  private seenOutcomeIds = new Set<string>();
  private admissions = new Map<string, AdmissionEntry>();
  private admittedIds = new Set<string>();
  private periods: PeriodSummary[] = [];
  private latches: Record<LimitScope, Set<string>> = { DAY: new Set(), WEEK: new Set() };

  constructor(store: LedgerStore, opts: RiskLedgerOptions) {
    this.store = store;
    this.tz = opts.timezone;
    this.windowDays = opts.windowDays;
    this.equity = opts.startingEquity;
    this.replay();
    const now = opts.now ?? new Date();
    if (!this.phaseEnteredAt) {
      this.commit(
        {
          type: 'ENGINE_INITIALIZED',
          details: {
            phase: 'OBSERVATION',
            equity: opts.startingEquity,
            dayKey: sessionDayKey(now, this.tz),
            weekKey: sessionWeekKey(now, this.tz)
          }
        },
        now
      );
    }
  }

  private replay() {
    const events = this.store.readAll();
    let skipped = 0;
    for (const evt of events) {
      if (evt.seq <= this.seq) {
        skipped += 1;
        continue;
      }
      this.apply(evt);
    }
    if (skipped) console.warn(`Ledger replay skipped ${skipped} out-of-order event(s)`);
    this.prune(this.latestEventTime(events));
  }

  private latestEventTime(events: LedgerEvent[]): Date {
    const last = events.at(-1);
    return last ? new Date(last.timestamp) : new Date(0);
  }

  // Durable write first; memory only changes once the event is on disk.
  private commit(event: NewLedgerEvent, at: Date): LedgerEvent {
    const full: LedgerEvent = { ...event, seq: this.seq + 1, id: crypto.randomUUID(), timestamp: at.toISOString() };
    this.store.append(full);
    this.apply(full);
    return full;
  }

  private apply(evt: LedgerEvent) {
    this.seq = evt.seq;
    switch (evt.type) {
      case 'ENGINE_INITIALIZED':
        this.phase = evt.details.phase;
        this.phaseEnteredAt = evt.timestamp;
        this.equity = evt.details.equity;
        this.dayKey = evt.details.dayKey;
        this.weekKey = evt.details.weekKey;
        break;
      case 'CANDIDATE_ADMITTED': {
        const { candidate, size } = evt.details;
        const at = new Date(evt.timestamp);
        this.admittedIds.add(candidate.correlationId);
        this.admissions.set(candidate.correlationId, {
          candidate,
          size,
          admittedAt: evt.timestamp,
          dayKey: sessionDayKey(at, this.tz),
          weekKey: sessionWeekKey(at, this.tz)
        });
        break;
      }
      case 'OUTCOME_RECORDED': {
        const { outcome } = evt.details;
        if (this.seenOutcomeIds.has(outcome.correlationId)) {
          console.warn(`Ledger replay ignored duplicate outcome ${outcome.correlationId} at seq ${evt.seq}`);
          break;
        }
        const closed = new Date(outcome.closedAt);
        this.seenOutcomeIds.add(outcome.correlationId);
        this.window.set(outcome.correlationId, {
          seq: evt.seq,
          outcome,
          dayKey: sessionDayKey(closed, this.tz),
          weekKey: sessionWeekKey(closed, this.tz)
        });
        break;
      }
      case 'PERIOD_ROLLED_OVER':
        this.dayKey = evt.details.dayKey;
        this.weekKey = evt.details.weekKey;
        this.periods.push(...evt.details.archived);
        this.prune(new Date(evt.timestamp));
        break;
      case 'LIMIT_LATCHED':
        this.latches[evt.details.scope].add(evt.details.key);
        break;
      case 'PHASE_ADVANCED':
      case 'PHASE_DOWNGRADED':
        this.phase = evt.details.to;
        this.phaseEnteredAt = evt.timestamp;
        break;
      case 'EQUITY_UPDATED':
        this.equity = evt.details.to;
        break;
      case 'CANDIDATE_REJECTED':
        break;
    }
  }

  private prune(now: Date) {
    const cutoff = now.getTime() - this.windowDays * 86400000;
    for (const [id, entry] of this.window) {
      if (new Date(entry.outcome.closedAt).getTime() < cutoff) this.window.delete(id);
    }
    for (const [id, entry] of this.admissions) {
      if (new Date(entry.admittedAt).getTime() < cutoff) this.admissions.delete(id);
    }
    const oldestDay = sessionDayKey(new Date(cutoff), this.tz);
    const oldestWeek = sessionWeekKey(new Date(cutoff), this.tz);
    this.periods = this.periods.filter((p) => (p.kind === 'DAY' ? p.key >= oldestDay : p.key >= oldestWeek));
  }

  private pnlFor(scope: LimitScope, key: string): number {
    const entries = Array.from(this.window.values()).filter((e) => (scope === 'DAY' ? e.dayKey : e.weekKey) === key);
    return sumCanonical(entries);
  }

  private tradesFor(scope: LimitScope, key: string): number {
    const ids = new Set<string>();
    for (const [id, a] of this.admissions) {
      if ((scope === 'DAY' ? a.dayKey : a.weekKey) === key) ids.add(id);
    }
    for (const [id, e] of this.window) {
      if ((scope === 'DAY' ? e.dayKey : e.weekKey) === key) ids.add(id);
    }
    return ids.size;
  }

  private outcomesFor(scope: LimitScope, key: string): number {
    return Array.from(this.window.values()).filter((e) => (scope === 'DAY' ? e.dayKey : e.weekKey) === key).length;
  }

  private summarize(kind: LimitScope, key: string): PeriodSummary {
    return {
      kind,
      key,
      realizedPnl: this.pnlFor(kind, key),
      trades: this.tradesFor(kind, key),
      outcomes: this.outcomesFor(kind, key)
    };
  }

  /**
   * Closes the current day and/or week when `now` falls in a later one.
   * Keys only move forward; a `now` earlier than the current period is a no-op.
   */
  rollover(now: Date): boolean {
    const nextDay = sessionDayKey(now, this.tz);
    const nextWeek = sessionWeekKey(now, this.tz);
    const dayChanged = nextDay > this.dayKey;
    const weekChanged = nextWeek > this.weekKey;
    if (!dayChanged && !weekChanged) return false;
    const archived: PeriodSummary[] = [];
    if (dayChanged) archived.push(this.summarize('DAY', this.dayKey));
    if (weekChanged) archived.push(this.summarize('WEEK', this.weekKey));
    this.commit(
      {
        type: 'PERIOD_ROLLED_OVER',
        details: {
          dayKey: dayChanged ? nextDay : this.dayKey,
          weekKey: weekChanged ? nextWeek : this.weekKey,
          archived
        }
      },
      now
    );
    console.log(`Ledger rolled over to ${this.dayKey} / ${this.weekKey}`);
    return true;
  }

  recordOutcome(input: unknown, now: Date = new Date()): RecordOutcomeResult {
    const parsed = parseTradeOutcome(input);
    if (!parsed.success) {
      return { ok: false, error: 'MALFORMED_INPUT', issues: parsed.errors };
    }
    const outcome = parsed.value;
    if (new Date(outcome.closedAt).getTime() > addMinutes(now, FUTURE_TOLERANCE_MINUTES).getTime()) {
      return { ok: false, error: 'MALFORMED_INPUT', issues: [`closedAt: ${outcome.closedAt} is in the future`] };
    }
    if (this.seenOutcomeIds.has(outcome.correlationId)) {
      return { ok: false, error: 'DUPLICATE_OUTCOME', correlationId: outcome.correlationId };
    }
    this.rollover(now);
    if (!this.admittedIds.has(outcome.correlationId)) {
      console.warn(`Outcome ${outcome.correlationId} has no matching admission; recording as external trade.`);
    }
    const evt = this.commit({ type: 'OUTCOME_RECORDED', details: { outcome } }, now);
    return { ok: true, seq: evt.seq, outcome };
  }

  recordAdmission(candidate: SetupCandidate, size: number, phase: OperatingPhase, reasonCodes: ReasonCode[], now: Date) {
    this.commit({ type: 'CANDIDATE_ADMITTED', details: { candidate, size, phase, reasonCodes } }, now);
  }

  recordRejection(
    correlationId: string | undefined,
    category: RejectionCategory,
    reasonCodes: ReasonCode[],
    now: Date
  ) {
    this.commit({ type: 'CANDIDATE_REJECTED', details: { correlationId, category, reasonCodes } }, now);
  }

  latchLimit(scope: LimitScope, pnl: number, now: Date) {
    const key = this.periodKey(scope, now);
    if (this.latches[scope].has(key)) return;
    this.commit({ type: 'LIMIT_LATCHED', details: { scope, key, pnl } }, now);
  }

  // Without `now`, the latch for the ledger's current period.
  isLatched(scope: LimitScope, now?: Date): boolean {
    return this.latches[scope].has(this.periodKey(scope, now));
  }

  private periodKey(scope: LimitScope, now?: Date): string {
    if (scope === 'DAY') return now ? sessionDayKey(now, this.tz) : this.dayKey;
    return now ? sessionWeekKey(now, this.tz) : this.weekKey;
  }

  recordPhaseChange(from: OperatingPhase, to: OperatingPhase, now: Date, downgradeReason?: string) {
    if (downgradeReason !== undefined) {
      this.commit({ type: 'PHASE_DOWNGRADED', details: { from, to, reason: downgradeReason } }, now);
    } else {
      this.commit({ type: 'PHASE_ADVANCED', details: { from, to } }, now);
    }
  }

  updateEquity(to: number, now: Date): { ok: true; from: number; to: number } | { ok: false; error: 'MALFORMED_INPUT' } {
    if (!Number.isFinite(to) || to <= 0) return { ok: false, error: 'MALFORMED_INPUT' };
    const from = this.equity;
    this.commit({ type: 'EQUITY_UPDATED', details: { from, to } }, now);
    return { ok: true, from, to };
  }

  hasAdmitted(correlationId: string): boolean {
    return this.admittedIds.has(correlationId);
  }

  hasOutcome(correlationId: string): boolean {
    return this.seenOutcomeIds.has(correlationId);
  }

  getPhase(): OperatingPhase {
    return this.phase;
  }

  getPhaseEnteredAt(): Date {
    return new Date(this.phaseEnteredAt);
  }

  getEquity(): number {
    return this.equity;
  }

  getSeq(): number {
    return this.seq;
  }

  getOpenPositions(): OpenPosition[] {
    return Array.from(this.admissions.entries())
      .filter(([id, a]) => a.size > 0 && !this.seenOutcomeIds.has(id))
      .map(([id, a]) => ({ correlationId: id, size: a.size, admittedAt: a.admittedAt }));
  }

  // Window outcomes closed at or after `since`, oldest first.
  outcomesSince(since: Date): TradeOutcome[] {
    return Array.from(this.window.values())
      .filter((e) => new Date(e.outcome.closedAt).getTime() >= since.getTime())
      .sort((a, b) => Date.parse(a.outcome.closedAt) - Date.parse(b.outcome.closedAt) || a.seq - b.seq)
      .map((e) => e.outcome);
  }

  /**
   * Aggregates for the day and week containing `now`, or for the ledger's current
   * period when omitted. Read-only: never rolls the ledger over.
   */
  getTotals(now?: Date): LedgerTotals {
    const dayKey = this.periodKey('DAY', now);
    const weekKey = this.periodKey('WEEK', now);
    return {
      dayKey,
      weekKey,
      dailyPnl: this.pnlFor('DAY', dayKey),
      weeklyPnl: this.pnlFor('WEEK', weekKey),
      tradesToday: this.tradesFor('DAY', dayKey),
      tradesThisWeek: this.tradesFor('WEEK', weekKey),
      openPositions: this.getOpenPositions()
    };
  }

  getState(): RiskLedgerState {
    return {
      ...this.getTotals(),
      window: this.outcomesSince(new Date(0)),
      periods: this.periods.map((p) => ({ ...p }))
    };
  }

  close() {
    this.store.close();
  }
}
