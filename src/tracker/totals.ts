/**
 * Totals reader: persisted day buckets, optionally topped up with the time
 * still accruing in open sessions. Live time is recomputed on every call and
 * never written back.
 */
import type { SessionReader } from "../storage/store.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { splitIntervalByLocalDay } from "./splitter.js";

export interface TotalsQuery {
  /** Add the in-progress time of open sessions that falls on the day. */
  includeLive: boolean;
  /** Reference instant for live time. Defaults to the clock. */
  now?: Date;
}

export class TotalsReader {
  private readonly store: SessionReader;
  private readonly timeZone: string;
  private readonly clock: Clock;

  constructor(store: SessionReader, timeZone: string, clock: Clock = systemClock) {
    this.store = store;
    this.timeZone = timeZone;
    this.clock = clock;
  }

  /**
   * Seconds per user for a local day.
   *
   * Iteration order follows the persisted ranking (seconds desc, user asc);
   * users with only live time come after, in open-session order.
   */
  getTotalsForDay(dayKey: string, query: TotalsQuery): Map<string, number> {
    const totals = new Map<string, number>();
    for (const row of this.store.listDailyTotals(dayKey)) {
      totals.set(row.userId, row.seconds);
    }

    if (!query.includeLive) {
      return totals;
    }

    const now = query.now ?? this.clock.now();
    for (const session of this.store.listOpenSessions()) {
      for (const slice of splitIntervalByLocalDay(session.startedAt, now, this.timeZone)) {
        if (slice.dayKey !== dayKey) continue;
        totals.set(session.userId, (totals.get(session.userId) ?? 0) + slice.seconds);
      }
    }

    return totals;
  }
}
