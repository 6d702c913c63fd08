/**
 * Local calendar arithmetic for an IANA time zone.
 *
 * Durations are always absolute-instant differences. The zone is consulted
 * only to name the local day of an instant and to find the instant at which
 * a local day begins. Built on Intl.DateTimeFormat; no tz database is bundled.
 */
import { InvalidIntervalError } from "./errors.js";

const DAY_MS = 86_400_000;
const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ZONE_SUFFIX_PATTERN = /T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})$/i;

export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim() === "") return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatDayKey(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

/** Wall-clock fields of an instant as observed in `timeZone`. */
export function toLocalDateTime(instant: Date, timeZone: string): LocalDateTime {
  const local: LocalDateTime = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    switch (part.type) {
      case "year":
        local.year = Number(part.value);
        break;
      case "month":
        local.month = Number(part.value);
        break;
      case "day":
        local.day = Number(part.value);
        break;
      case "hour":
        local.hour = Number(part.value) % 24;
        break;
      case "minute":
        local.minute = Number(part.value);
        break;
      case "second":
        local.second = Number(part.value);
        break;
      default:
        break;
    }
  }
  return local;
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds (east positive). */
export function zoneOffsetMs(instant: Date, timeZone: string): number {
  const local = toLocalDateTime(instant, timeZone);
  const wall = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return wall - wholeSeconds;
}

export function parseDayKey(dayKey: string): { year: number; month: number; day: number } {
  const match = DAY_KEY_PATTERN.exec(dayKey);
  if (!match) {
    throw new RangeError(`Invalid day key "${dayKey}": expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new RangeError(`Invalid day key "${dayKey}": no such calendar date`);
  }
  return { year, month, day };
}

/** Move a day key by whole calendar days. */
export function shiftDayKey(dayKey: string, days: number): string {
  const { year, month, day } = parseDayKey(dayKey);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return formatDayKey(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

export function localDayKey(instant: Date, timeZone: string): string {
  const local = toLocalDateTime(instant, timeZone);
  return formatDayKey(local.year, local.month, local.day);
}

export function previousLocalDayKey(instant: Date, timeZone: string): string {
  return shiftDayKey(localDayKey(instant, timeZone), -1);
}

/**
 * The earliest instant whose local date is `dayKey`.
 *
 * When local midnight is repeated (fall-back at midnight) this is its first
 * occurrence; when it is skipped (spring-forward at midnight) this is the
 * transition instant, the first wall-clock reading of the new day.
 */
export function midnightInstantForLocalDay(dayKey: string, timeZone: string): Date {
  const { year, month, day } = parseDayKey(dayKey);
  const wall = Date.UTC(year, month - 1, day);
  const candidates = [
    wall - zoneOffsetMs(new Date(wall - DAY_MS), timeZone),
    wall - zoneOffsetMs(new Date(wall + DAY_MS), timeZone),
  ];
  const exact = candidates.filter((t) => zoneOffsetMs(new Date(t), timeZone) === wall - t);
  if (exact.length > 0) {
    return new Date(Math.min(...exact));
  }
  return new Date(Math.max(...candidates));
}

/** Instant at which the local day following `instant`'s local day begins. */
export function nextLocalMidnight(instant: Date, timeZone: string): Date {
  return midnightInstantForLocalDay(shiftDayKey(localDayKey(instant, timeZone), 1), timeZone);
}

/** ISO-8601 local time with numeric offset, e.g. `2026-01-01T23:50:00-05:00`. */
export function formatLocalIso(instant: Date, timeZone: string): string {
  const local = toLocalDateTime(instant, timeZone);
  const offsetMinutes = Math.round(zoneOffsetMs(instant, timeZone) / 60_000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return (
    `${formatDayKey(local.year, local.month, local.day)}` +
    `T${pad2(local.hour)}:${pad2(local.minute)}:${pad2(local.second)}` +
    `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
  );
}

/** Reject anything that is not a usable absolute instant. */
export function assertInstant(value: Date, label: string): void {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidIntervalError(`${label} is not a valid instant`, value);
  }
}

/** Parse a stored ISO-8601 timestamp; it must carry `Z` or a numeric offset. */
export function parseInstant(text: string): Date {
  const trimmed = text.trim();
  if (!ZONE_SUFFIX_PATTERN.test(trimmed)) {
    throw new InvalidIntervalError(`Timestamp "${text}" has no zone offset`, text);
  }
  const instant = new Date(trimmed);
  assertInstant(instant, `Timestamp "${text}"`);
  return instant;
}

/** The calendar helpers bound to one configured time zone. */
export class LocalCalendar {
  readonly timeZone: string;

  constructor(timeZone: string) {
    if (!isValidTimeZone(timeZone)) {
      throw new RangeError(`Unknown time zone "${timeZone}"`);
    }
    this.timeZone = timeZone;
  }

  dayKey(instant: Date): string {
    return localDayKey(instant, this.timeZone);
  }

  previousDayKey(instant: Date): string {
    return previousLocalDayKey(instant, this.timeZone);
  }

  midnightFor(dayKey: string): Date {
    return midnightInstantForLocalDay(dayKey, this.timeZone);
  }

  nextMidnight(instant: Date): Date {
    return nextLocalMidnight(instant, this.timeZone);
  }

  localIso(instant: Date): string {
    return formatLocalIso(instant, this.timeZone);
  }
}
