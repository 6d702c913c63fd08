import { describe, expect, it } from "vitest";
import { InvalidIntervalError } from "./errors.js";
import {
  formatLocalIso,
  isValidTimeZone,
  LocalCalendar,
  localDayKey,
  midnightInstantForLocalDay,
  nextLocalMidnight,
  parseDayKey,
  parseInstant,
  previousLocalDayKey,
  shiftDayKey,
  zoneOffsetMs,
} from "./local-day.js";

const NY = "America/New_York";

describe("isValidTimeZone", () => {
  it("accepts IANA names", () => {
    expect(isValidTimeZone(NY)).toBe(true);
    expect(isValidTimeZone("UTC")).toBe(true);
  });

  it("rejects unknown and empty names", () => {
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
    expect(isValidTimeZone("")).toBe(false);
  });
});

describe("localDayKey", () => {
  it("names the local date, not the UTC date", () => {
    expect(localDayKey(new Date("2026-01-02T04:50:00Z"), NY)).toBe("2026-01-01");
    expect(localDayKey(new Date("2026-01-02T05:00:00Z"), NY)).toBe("2026-01-02");
  });

  it("previous day key steps back one calendar day", () => {
    expect(previousLocalDayKey(new Date("2026-01-01T05:00:30Z"), NY)).toBe("2025-12-31");
  });
});

describe("day keys", () => {
  it("shifts across month and leap-day boundaries", () => {
    expect(shiftDayKey("2024-02-28", 1)).toBe("2024-02-29");
    expect(shiftDayKey("2026-03-01", -1)).toBe("2026-02-28");
    expect(shiftDayKey("2025-12-31", 1)).toBe("2026-01-01");
  });

  it("rejects malformed or impossible dates", () => {
    expect(() => parseDayKey("2026-1-01")).toThrow(RangeError);
    expect(() => parseDayKey("2026-02-30")).toThrow(RangeError);
  });
});

describe("zoneOffsetMs", () => {
  it("reports standard and daylight offsets", () => {
    expect(zoneOffsetMs(new Date("2026-01-15T12:00:00Z"), NY)).toBe(-5 * 3_600_000);
    expect(zoneOffsetMs(new Date("2026-07-15T12:00:00Z"), NY)).toBe(-4 * 3_600_000);
  });
});

describe("midnightInstantForLocalDay", () => {
  it("resolves an ordinary midnight", () => {
    expect(midnightInstantForLocalDay("2026-01-02", NY).toISOString()).toBe("2026-01-02T05:00:00.000Z");
  });

  it("uses the offset in force at midnight around spring-forward", () => {
    expect(midnightInstantForLocalDay("2026-03-08", NY).toISOString()).toBe("2026-03-08T05:00:00.000Z");
    expect(midnightInstantForLocalDay("2026-03-09", NY).toISOString()).toBe("2026-03-09T04:00:00.000Z");
  });

  it("uses the offset in force at midnight around fall-back", () => {
    expect(midnightInstantForLocalDay("2026-11-01", NY).toISOString()).toBe("2026-11-01T04:00:00.000Z");
    expect(midnightInstantForLocalDay("2026-11-02", NY).toISOString()).toBe("2026-11-02T05:00:00.000Z");
  });

  it("returns the transition instant when midnight is skipped", () => {
    // Clocks in Sao Paulo went from 00:00 to 01:00 on 2018-11-04.
    const midnight = midnightInstantForLocalDay("2018-11-04", "America/Sao_Paulo");
    expect(midnight.toISOString()).toBe("2018-11-04T03:00:00.000Z");
    expect(localDayKey(midnight, "America/Sao_Paulo")).toBe("2018-11-04");
    expect(localDayKey(new Date(midnight.getTime() - 1000), "America/Sao_Paulo")).toBe("2018-11-03");
  });

  it("returns the single midnight after a fall-back just before it", () => {
    // Clocks in Sao Paulo went from 00:00 back to 23:00 on 2019-02-17.
    expect(midnightInstantForLocalDay("2019-02-17", "America/Sao_Paulo").toISOString()).toBe(
      "2019-02-17T03:00:00.000Z",
    );
  });
});

describe("nextLocalMidnight", () => {
  it("returns the start of the following local day", () => {
    expect(nextLocalMidnight(new Date("2026-03-07T12:00:00Z"), NY).toISOString()).toBe("2026-03-08T05:00:00.000Z");
    expect(nextLocalMidnight(new Date("2026-03-08T12:00:00Z"), NY).toISOString()).toBe("2026-03-09T04:00:00.000Z");
  });
});

describe("formatLocalIso", () => {
  it("renders wall time with the numeric offset", () => {
    expect(formatLocalIso(new Date("2026-01-02T04:50:00Z"), NY)).toBe("2026-01-01T23:50:00-05:00");
    expect(formatLocalIso(new Date("2026-07-01T12:00:00Z"), NY)).toBe("2026-07-01T08:00:00-04:00");
    expect(formatLocalIso(new Date("2026-01-01T00:00:00Z"), "Asia/Kolkata")).toBe("2026-01-01T05:30:00+05:30");
    expect(formatLocalIso(new Date("2026-01-01T00:00:00Z"), "UTC")).toBe("2026-01-01T00:00:00+00:00");
  });
});

describe("parseInstant", () => {
  it("accepts Z and numeric offsets", () => {
    expect(parseInstant("2026-01-01T05:00:00Z").getTime()).toBe(Date.UTC(2026, 0, 1, 5));
    expect(parseInstant("2026-01-01T00:00:00-05:00").getTime()).toBe(Date.UTC(2026, 0, 1, 5));
    expect(parseInstant("2026-01-01T05:00:00.250+00:00").getTime()).toBe(Date.UTC(2026, 0, 1, 5, 0, 0, 250));
  });

  it("rejects timestamps without a zone", () => {
    expect(() => parseInstant("2026-01-01T00:00:00")).toThrow(InvalidIntervalError);
    expect(() => parseInstant("2026-01-01")).toThrow(InvalidIntervalError);
  });
});

describe("LocalCalendar", () => {
  it("rejects unknown zones", () => {
    expect(() => new LocalCalendar("Nope/Nowhere")).toThrow(RangeError);
  });

  it("binds helpers to its zone", () => {
    const calendar = new LocalCalendar(NY);
    const instant = new Date("2026-01-02T04:50:00Z");
    expect(calendar.dayKey(instant)).toBe("2026-01-01");
    expect(calendar.previousDayKey(instant)).toBe("2025-12-31");
    expect(calendar.midnightFor("2026-01-02").toISOString()).toBe("2026-01-02T05:00:00.000Z");
    expect(calendar.nextMidnight(instant).toISOString()).toBe("2026-01-02T05:00:00.000Z");
    expect(calendar.localIso(instant)).toBe("2026-01-01T23:50:00-05:00");
  });
});
