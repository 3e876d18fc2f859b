import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';
import { PersistenceFailure, errorCode } from '../core/errors';
import { ledgerEventSchema } from '../core/schema';
import { LedgerEvent } from '../core/types';

export interface LedgerStore {
  readAll(): LedgerEvent[];
  // Must be durable when it returns; throws PersistenceFailure otherwise.
  append(event: LedgerEvent): void;
  close(): void;
}

const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user.
    return errorCode(err) !== 'ESRCH';
  }
};

export const resolveLedgerDir = () =>
  process.env.LEDGER_DIR ? path.resolve(process.env.LEDGER_DIR) : path.resolve(process.cwd(), 'ledger');

export class JsonlLedgerStore implements LedgerStore {
  private ledgerFile: string;
  private lockFile: string;
  private locked = false;
  private unusable = false;

  constructor(dir: string = resolveLedgerDir()) {
    this.ledgerFile = path.join(dir, 'events.jsonl');
    this.lockFile = path.join(dir, 'ledger.lock');
    try {
      ensureDir(dir);
    } catch (err) {
      throw new PersistenceFailure(`Unable to create ledger directory ${dir}`, err);
    }
    this.acquireLock(dir, true);
    this.repairTornTail();
  }

  private acquireLock(dir: string, reclaimStale: boolean) {
    try {
      const fd = fs.openSync(this.lockFile, 'wx');
      fs.writeSync(fd, String(process.pid));
      fs.closeSync(fd);
      this.locked = true;
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw new PersistenceFailure(`Unable to lock ledger ${dir}`, err);
      const holder = this.lockHolder();
      if (reclaimStale && holder !== undefined && !isProcessAlive(holder)) {
        console.warn(`Reclaiming ledger lock left by exited process ${holder}`);
        try {
          fs.unlinkSync(this.lockFile);
        } catch (unlinkErr) {
          throw new PersistenceFailure(`Unable to remove stale lock ${this.lockFile}`, unlinkErr);
        }
        this.acquireLock(dir, false);
        return;
      }
      throw new PersistenceFailure(
        `Ledger ${dir} is held by another writer${holder !== undefined ? ` (pid ${holder})` : ''}`
      );
    }
  }

  private lockHolder(): number | undefined {
    try {
      const pid = Number(fs.readFileSync(this.lockFile, 'utf-8').trim());
      return Number.isInteger(pid) && pid > 0 ? pid : undefined;
    } catch {
      return undefined;
    }
  }

  // A crash mid-append can leave a line without its newline; terminate it so the next append starts clean.
  private repairTornTail() {
    if (!fs.existsSync(this.ledgerFile)) return;
    const content = fs.readFileSync(this.ledgerFile, 'utf-8');
    if (content.length && !content.endsWith('\n')) {
      console.warn(`Ledger ${this.ledgerFile} ends with a partial line; it will be skipped on replay.`);
      fs.appendFileSync(this.ledgerFile, '\n');
    }
  }

  readAll(): LedgerEvent[] {
    if (!fs.existsSync(this.ledgerFile)) return [];
    const content = fs.readFileSync(this.ledgerFile, 'utf-8');
    const lines = content.split('\n').filter((line) => line.trim().length);
    const events: LedgerEvent[] = [];
    lines.forEach((line, idx) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        console.warn(`Skipping unreadable ledger line ${idx + 1}`);
        return;
      }
      const result = ledgerEventSchema.safeParse(parsed);
      if (!result.success) {
        console.warn(`Skipping invalid ledger line ${idx + 1}: ${result.error.issues[0]?.message ?? 'unknown'}`);
        return;
      }
      events.push(result.data);
    });
    return events;
  }

  // A failed append is cut back off the file so disk never holds an event memory rejected.
  append(event: LedgerEvent) {
    if (!this.locked) throw new PersistenceFailure('Ledger store is closed');
    if (this.unusable) throw new PersistenceFailure(`Ledger ${this.ledgerFile} could not be rolled back; restart to recover`);
    const line = Buffer.from(`${JSON.stringify(event)}\n`, 'utf-8');
    let fd: number | undefined;
    let sizeBefore = 0;
    try {
      fd = fs.openSync(this.ledgerFile, 'a');
      sizeBefore = fs.fstatSync(fd).size;
      const written = fs.writeSync(fd, line);
      if (written !== line.length) throw new Error(`short write (${written} of ${line.length} bytes)`);
      fs.fsyncSync(fd);
    } catch (err) {
      if (fd !== undefined) this.rollback(fd, sizeBefore);
      throw new PersistenceFailure(`Failed to persist ledger event ${event.seq} (${event.type})`, err);
    } finally {
      if (fd !== undefined) fs.closeSync(fd);
    }
  }

  private rollback(fd: number, size: number) {
    try {
      fs.ftruncateSync(fd, size);
      fs.fsyncSync(fd);
    } catch (err) {
      this.unusable = true;
      console.error(`Ledger ${this.ledgerFile} could not be truncated after a failed write`, err);
    }
  }

  close() {
    if (!this.locked) return;
    this.locked = false;
    if (fs.existsSync(this.lockFile)) fs.unlinkSync(this.lockFile);
  }
}
