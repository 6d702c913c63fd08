/**
 * Tracker core: session lifecycle, local-day splitting and totals.
 */
export type { Clock } from "./clock.js";
export { ManualClock, systemClock } from "./clock.js";
export { InvalidIntervalError, StoreUnavailableError } from "./errors.js";
export {
  LocalCalendar,
  formatLocalIso,
  isValidTimeZone,
  localDayKey,
  midnightInstantForLocalDay,
  nextLocalMidnight,
  parseInstant,
  previousLocalDayKey,
  shiftDayKey,
} from "./local-day.js";
export { splitIntervalByLocalDay } from "./splitter.js";
export { SessionEngine } from "./engine.js";
export type { SessionEngineOptions } from "./engine.js";
export { TotalsReader } from "./totals.js";
export type { TotalsQuery } from "./totals.js";
