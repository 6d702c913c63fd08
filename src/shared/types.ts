/**
 * Shared TypeScript types for voicetally.
 *
 * Defines the persisted tracker records, the report view of a day's
 * totals and the log entry format.
 */

// ---------------------------------------------------------------------------
// Tracker state
// ---------------------------------------------------------------------------

/** An unclosed presence interval: time accrued but not yet credited to a day. */
export interface OpenSession {
  /** Discord user ID (snowflake string). */
  userId: string;
  /** Instant the current accrual window started. */
  startedAt: Date;
}

/** Accumulated closed time for one user on one local day. */
export interface DailyTotal {
  /** Local calendar date, `YYYY-MM-DD`. */
  dayKey: string;
  userId: string;
  /** Whole seconds, never negative. */
  seconds: number;
}

/** One `(day, seconds)` slice of an interval split on local midnights. */
export interface DaySlice {
  dayKey: string;
  seconds: number;
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export interface ReportRow {
  userId: string;
  /** Guild display name, or `User <id>` when the member is unknown. */
  displayName: string;
  seconds: number;
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Subsystem that emitted the log (e.g. "engine", "scheduler"). */
  component: string;
  /** Human-readable message. */
  msg: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
