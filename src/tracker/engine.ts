/**
 * Session engine.
 *
 * Owns the open-session and daily-total writes. Each user is either Closed
 * (no row) or Open (one row holding the start of the current accrual
 * window). Closing a session, or rolling it over at local midnight, splits
 * the window by local day and credits each slice to its day bucket.
 *
 * Presence sources redeliver events, so a duplicate join and a leave without
 * a join are defined no-ops rather than errors.
 */
import type { Logger } from "../shared/logger.js";
import type { SessionStore } from "../storage/store.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { splitIntervalByLocalDay } from "./splitter.js";

export interface SessionEngineOptions {
  store: SessionStore;
  timeZone: string;
  clock?: Clock;
  logger?: Logger;
}

export class SessionEngine {
  private readonly store: SessionStore;
  private readonly timeZone: string;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(options: SessionEngineOptions) {
    this.store = options.store;
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  /**
   * Open a session for `userId`.
   *
   * @returns false when one is already open (the stored start is kept).
   */
  startSession(userId: string, startedAt: Date = this.clock.now()): boolean {
    if (this.store.getOpenSession(userId) !== null) {
      this.logger?.debug(`Ignoring duplicate start for user ${userId}`);
      return false;
    }
    this.store.upsertOpenSession(userId, startedAt);
    return true;
  }

  /**
   * Close the session for `userId`, crediting `[startedAt, endedAt)`.
   *
   * @returns seconds credited across all day buckets; 0 when nothing was open.
   */
  endSession(userId: string, endedAt: Date = this.clock.now()): number {
    return this.store.transaction(() => {
      const session = this.store.getOpenSession(userId);
      if (session === null) {
        this.logger?.debug(`Ignoring stop for missing session user=${userId}`);
        return 0;
      }
      const tracked = this.accumulateInterval(userId, session.startedAt, endedAt);
      this.store.deleteOpenSession(userId);
      return tracked;
    });
  }

  /** Credit `[start, end)` to the user's local-day buckets; returns seconds applied. */
  accumulateInterval(userId: string, start: Date, end: Date): number {
    let total = 0;
    for (const slice of splitIntervalByLocalDay(start, end, this.timeZone)) {
      if (slice.seconds <= 0) continue;
      this.store.addDailySeconds(slice.dayKey, userId, slice.seconds);
      total += slice.seconds;
    }
    return total;
  }

  /**
   * Move every open session that started before `midnight` onto the new day.
   *
   * Time up to `midnight` is credited and the session restarts at exactly
   * `midnight`, so a second call for the same instant finds nothing to do.
   *
   * @returns the number of sessions rolled over.
   */
  rolloverOpenSessions(midnight: Date): number {
    let rolled = 0;
    for (const session of this.store.listOpenSessions()) {
      if (session.startedAt.getTime() >= midnight.getTime()) continue;
      this.store.transaction(() => {
        this.accumulateInterval(session.userId, session.startedAt, midnight);
        this.store.upsertOpenSession(session.userId, midnight);
      });
      rolled += 1;
    }
    return rolled;
  }

  /**
   * Replace all open sessions with one per listed user, all starting at
   * `startedAt`. Time between the last persisted snapshot and now is dropped.
   */
  reseedSessions(userIds: readonly string[], startedAt: Date = this.clock.now()): void {
    const unique = [...new Set(userIds)];
    this.store.transaction(() => {
      this.store.clearOpenSessions();
      for (const userId of unique) {
        this.store.upsertOpenSession(userId, startedAt);
      }
    });
  }
}
