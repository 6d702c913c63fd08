/**
 * Persistence contract for tracker state.
 *
 * Split in two so the session engine never sees the scheduler's and command
 * layer's idempotency markers. Every write is committed before the call
 * returns; failures surface as StoreUnavailableError.
 */
import type { DailyTotal, OpenSession } from "../shared/types.js";

export interface SessionStore {
  /** Insert or replace the open session for a user. */
  upsertOpenSession(userId: string, startedAt: Date): void;
  getOpenSession(userId: string): OpenSession | null;
  deleteOpenSession(userId: string): void;
  listOpenSessions(): OpenSession[];
  clearOpenSessions(): void;
  /** Atomically add seconds to a day bucket. Non-positive deltas are ignored. */
  addDailySeconds(dayKey: string, userId: string, seconds: number): void;
  /** Rows for one day, ordered by seconds descending then user ID ascending. */
  listDailyTotals(dayKey: string): DailyTotal[];
  /** Run `fn` so that all of its writes commit together or not at all. */
  transaction<T>(fn: () => T): T;
}

/** The read side used by totals and reports. */
export type SessionReader = Pick<SessionStore, "listOpenSessions" | "listDailyTotals">;

export interface MetaStore {
  getMeta(key: string): string | null;
  setMeta(key: string, value: string): void;
}

export interface TrackerStore extends SessionStore, MetaStore {
  close(): void;
}
