/**
 * Shared utilities for voicetally.
 */
export type { DailyTotal, DaySlice, LogEntry, LogLevel, OpenSession, ReportRow } from "./types.js";
export { LOG_LEVELS, isLogLevel } from "./types.js";
export { Logger, createLogger, sanitize } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { retry, RetryError } from "./retry.js";
export type { RetryOptions } from "./retry.js";
