/**
 * SQLite-backed tracker store (better-sqlite3).
 *
 * Tables:
 *   open_sessions  currently connected users in the tracked channel
 *   daily_totals   aggregated seconds per local day and user
 *   meta           small key/value table for scheduler and cooldown markers
 *
 * better-sqlite3 is synchronous, so every call has committed by the time it
 * returns and calls from the event loop never interleave.
 */
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { DailyTotal, OpenSession } from "../shared/types.js";
import { InvalidIntervalError, StoreUnavailableError } from "../tracker/errors.js";
import { assertInstant, parseInstant } from "../tracker/local-day.js";
import type { TrackerStore } from "./store.js";

export const IN_MEMORY = ":memory:";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS open_sessions (
    user_id TEXT PRIMARY KEY,
    started_at_utc TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS daily_totals (
    day_local TEXT NOT NULL,
    user_id TEXT NOT NULL,
    seconds INTEGER NOT NULL DEFAULT 0 CHECK (seconds >= 0),
    PRIMARY KEY (day_local, user_id)
  );

  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

interface OpenSessionRow {
  user_id: string;
  started_at_utc: string;
}

interface DailyTotalRow {
  day_local: string;
  user_id: string;
  seconds: number;
}

interface MetaRow {
  value: string;
}

export class SqliteTrackerStore implements TrackerStore {
  private readonly db: Database.Database;
  private closed = false;

  private readonly upsertSessionStmt: Database.Statement<[string, string]>;
  private readonly getSessionStmt: Database.Statement<[string], OpenSessionRow>;
  private readonly deleteSessionStmt: Database.Statement<[string]>;
  private readonly listSessionsStmt: Database.Statement<[], OpenSessionRow>;
  private readonly clearSessionsStmt: Database.Statement<[]>;
  private readonly addSecondsStmt: Database.Statement<[string, string, number]>;
  private readonly listTotalsStmt: Database.Statement<[string], DailyTotalRow>;
  private readonly getMetaStmt: Database.Statement<[string], MetaRow>;
  private readonly setMetaStmt: Database.Statement<[string, string]>;

  /**
   * Open (creating if needed) the database at `filePath`.
   * Pass `":memory:"` for a throwaway store.
   */
  constructor(filePath: string) {
    this.db = openDatabase(filePath);

    this.upsertSessionStmt = this.db.prepare<[string, string]>(`
      INSERT INTO open_sessions (user_id, started_at_utc)
      VALUES (?, ?)
      ON CONFLICT(user_id)
      DO UPDATE SET started_at_utc = excluded.started_at_utc
    `);
    this.getSessionStmt = this.db.prepare<[string], OpenSessionRow>(
      "SELECT user_id, started_at_utc FROM open_sessions WHERE user_id = ?",
    );
    this.deleteSessionStmt = this.db.prepare<[string]>("DELETE FROM open_sessions WHERE user_id = ?");
    this.listSessionsStmt = this.db.prepare<[], OpenSessionRow>(
      "SELECT user_id, started_at_utc FROM open_sessions ORDER BY user_id ASC",
    );
    this.clearSessionsStmt = this.db.prepare<[]>("DELETE FROM open_sessions");
    this.addSecondsStmt = this.db.prepare<[string, string, number]>(`
      INSERT INTO daily_totals (day_local, user_id, seconds)
      VALUES (?, ?, ?)
      ON CONFLICT(day_local, user_id)
      DO UPDATE SET seconds = seconds + excluded.seconds
    `);
    this.listTotalsStmt = this.db.prepare<[string], DailyTotalRow>(`
      SELECT day_local, user_id, seconds
      FROM daily_totals
      WHERE day_local = ?
      ORDER BY seconds DESC, user_id ASC
    `);
    this.getMetaStmt = this.db.prepare<[string], MetaRow>("SELECT value FROM meta WHERE key = ?");
    this.setMetaStmt = this.db.prepare<[string, string]>(`
      INSERT INTO meta (key, value)
      VALUES (?, ?)
      ON CONFLICT(key)
      DO UPDATE SET value = excluded.value
    `);
  }

  upsertOpenSession(userId: string, startedAt: Date): void {
    assertInstant(startedAt, "Session start");
    this.guard("upsertOpenSession", () => {
      this.upsertSessionStmt.run(userId, startedAt.toISOString());
    });
  }

  getOpenSession(userId: string): OpenSession | null {
    const row = this.guard("getOpenSession", () => this.getSessionStmt.get(userId));
    return row ? toOpenSession(row) : null;
  }

  deleteOpenSession(userId: string): void {
    this.guard("deleteOpenSession", () => {
      this.deleteSessionStmt.run(userId);
    });
  }

  listOpenSessions(): OpenSession[] {
    const rows = this.guard("listOpenSessions", () => this.listSessionsStmt.all());
    return rows.map(toOpenSession);
  }

  clearOpenSessions(): void {
    this.guard("clearOpenSessions", () => {
      this.clearSessionsStmt.run();
    });
  }

  addDailySeconds(dayKey: string, userId: string, seconds: number): void {
    // Callers may pass raw differences; empty or negative spans are dropped here.
    if (!Number.isFinite(seconds) || seconds <= 0) return;
    const whole = Math.floor(seconds);
    if (whole === 0) return;
    this.guard("addDailySeconds", () => {
      this.addSecondsStmt.run(dayKey, userId, whole);
    });
  }

  listDailyTotals(dayKey: string): DailyTotal[] {
    const rows = this.guard("listDailyTotals", () => this.listTotalsStmt.all(dayKey));
    return rows.map((row) => ({ dayKey: row.day_local, userId: row.user_id, seconds: row.seconds }));
  }

  getMeta(key: string): string | null {
    const row = this.guard("getMeta", () => this.getMetaStmt.get(key));
    return row ? row.value : null;
  }

  setMeta(key: string, value: string): void {
    this.guard("setMeta", () => {
      this.setMetaStmt.run(key, value);
    });
  }

  transaction<T>(fn: () => T): T {
    return this.guard("transaction", () => this.db.transaction(fn)());
  }

  close(): void {
    if (this.closed) return;
    this.guard("close", () => {
      this.db.close();
    });
    this.closed = true;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error: unknown) {
      if (error instanceof StoreUnavailableError || error instanceof InvalidIntervalError) {
        throw error;
      }
      if (operation === "transaction" && !(error instanceof Database.SqliteError)) {
        throw error;
      }
      throw new StoreUnavailableError(operation, error);
    }
  }
}

function openDatabase(filePath: string): Database.Database {
  try {
    if (filePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    const db = new Database(filePath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = FULL");
    db.exec(SCHEMA);
    return db;
  } catch (error: unknown) {
    throw new StoreUnavailableError("open", error);
  }
}

function toOpenSession(row: OpenSessionRow): OpenSession {
  return { userId: row.user_id, startedAt: parseInstant(row.started_at_utc) };
}
