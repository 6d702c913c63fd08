/**
 * Interval splitter.
 *
 * Cuts an absolute interval `[start, end)` at every local midnight of a time
 * zone and reports whole seconds per local day. Chunk lengths come from
 * instant subtraction only, so DST shifts move where a boundary falls but
 * never change how long a chunk is.
 */
import type { DaySlice } from "../shared/types.js";
import { InvalidIntervalError } from "./errors.js";
import { assertInstant, localDayKey, midnightInstantForLocalDay, shiftDayKey } from "./local-day.js";

/**
 * Split `[start, end)` into ordered local-day slices.
 *
 * Returns `[]` when `end <= start`. Seconds are truncated cumulatively from
 * `start`, so the slices always sum to `floor((end - start) / 1000)`.
 * Slices that truncate to zero seconds are omitted.
 *
 * @throws InvalidIntervalError when either bound is not a valid instant, or
 *   when the zone yields a next midnight that does not move forward.
 */
export function splitIntervalByLocalDay(start: Date, end: Date, timeZone: string): DaySlice[] {
  assertInstant(start, "Interval start");
  assertInstant(end, "Interval end");

  const startMs = start.getTime();
  const endMs = end.getTime();
  if (endMs <= startMs) return [];

  const slices: DaySlice[] = [];
  let cursor = startMs;
  let credited = 0;

  while (cursor < endMs) {
    const dayKey = localDayKey(new Date(cursor), timeZone);
    const boundary = midnightInstantForLocalDay(shiftDayKey(dayKey, 1), timeZone).getTime();
    if (boundary <= cursor) {
      throw new InvalidIntervalError(
        `Local midnight after ${new Date(cursor).toISOString()} in ${timeZone} did not advance`,
        new Date(cursor),
      );
    }

    const chunkEnd = Math.min(endMs, boundary);
    const elapsed = Math.floor((chunkEnd - startMs) / 1000);
    const seconds = elapsed - credited;
    if (seconds > 0) {
      slices.push({ dayKey, seconds });
      credited = elapsed;
    }
    cursor = chunkEnd;
  }

  return slices;
}
