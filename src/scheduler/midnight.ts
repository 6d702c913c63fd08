/**
 * Midnight rollover and daily report.
 *
 * Ticked on a short interval. During the first minute of a local day it
 * rolls open sessions onto the new day and posts the previous day's report.
 * The `last_auto_report_day` marker makes this happen at most once per day;
 * it is written only after the report went out, so a failed post is tried
 * again on the next tick inside the same minute.
 */
import type { Logger } from "../shared/logger.js";
import type { MetaStore } from "../storage/store.js";
import type { ReportDestination, Reporter } from "../report/reporter.js";
import type { SessionEngine } from "../tracker/engine.js";
import type { LocalCalendar } from "../tracker/local-day.js";

export const AUTO_REPORT_META_KEY = "last_auto_report_day";

/** How long after local midnight a tick still counts as "at midnight". */
export const MIDNIGHT_WINDOW_MS = 60_000;

export type TickOutcome =
  | { action: "idle"; reason: "not-midnight" | "already-reported" }
  | { action: "reported"; dayKey: string; rolledOver: number }
  | { action: "failed"; dayKey: string; rolledOver: number; error: string };

export interface MidnightSchedulerOptions {
  engine: SessionEngine;
  calendar: LocalCalendar;
  meta: MetaStore;
  reporter: Reporter;
  destination: ReportDestination;
  logger?: Logger;
  windowMs?: number;
}

export class MidnightScheduler {
  private readonly options: MidnightSchedulerOptions;
  private readonly windowMs: number;

  constructor(options: MidnightSchedulerOptions) {
    this.options = options;
    this.windowMs = options.windowMs ?? MIDNIGHT_WINDOW_MS;
  }

  async tick(now: Date): Promise<TickOutcome> {
    const { engine, calendar, meta, reporter, destination, logger } = this.options;

    const today = calendar.dayKey(now);
    const midnight = calendar.midnightFor(today);
    const sinceMidnight = now.getTime() - midnight.getTime();
    if (sinceMidnight < 0 || sinceMidnight >= this.windowMs) {
      return { action: "idle", reason: "not-midnight" };
    }

    const targetDay = calendar.previousDayKey(now);
    if (meta.getMeta(AUTO_REPORT_META_KEY) === targetDay) {
      return { action: "idle", reason: "already-reported" };
    }

    // Close yesterday's slice for users still connected at midnight.
    const rolledOver = engine.rolloverOpenSessions(midnight);
    if (rolledOver > 0) {
      logger?.info(`Rolled over ${rolledOver} open session${rolledOver === 1 ? "" : "s"} at ${midnight.toISOString()}`);
    }

    logger?.info(`Posting midnight report for ${targetDay}`);
    try {
      await reporter.postReport(destination, targetDay, { includeLive: false, now: midnight });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      logger?.error(`Failed to post midnight report for ${targetDay}: ${msg}`);
      return { action: "failed", dayKey: targetDay, rolledOver, error: msg };
    }

    meta.setMeta(AUTO_REPORT_META_KEY, targetDay);
    return { action: "reported", dayKey: targetDay, rolledOver };
  }
}
