import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RetryError } from "../shared/retry.js";
import { IN_MEMORY, SqliteTrackerStore } from "../storage/sqlite-store.js";
import { ManualClock } from "../tracker/clock.js";
import { TotalsReader } from "../tracker/totals.js";
import { formatSeconds, Reporter } from "./reporter.js";
import type { ReportDestination } from "./reporter.js";

const NY = "America/New_York";
const NAMES: Record<string, string> = { "1": "zed", "2": "Amy", "3": "bob" };

function fakeDestination(sendReport: (content: string) => Promise<void>): ReportDestination {
  return {
    trackedChannelName: () => "hangout",
    displayName: (userId: string) => NAMES[userId] ?? null,
    sendReport,
  };
}

describe("formatSeconds", () => {
  it("renders HH:MM:SS", () => {
    expect(formatSeconds(0)).toBe("00:00:00");
    expect(formatSeconds(3661)).toBe("01:01:01");
    expect(formatSeconds(59.9)).toBe("00:00:59");
  });

  it("does not wrap hours at a day", () => {
    expect(formatSeconds(90_000)).toBe("25:00:00");
  });

  it("clamps negative and non-finite input to zero", () => {
    expect(formatSeconds(-5)).toBe("00:00:00");
    expect(formatSeconds(Number.NaN)).toBe("00:00:00");
  });
});

describe("Reporter", () => {
  let store: SqliteTrackerStore;
  let reporter: Reporter;

  beforeEach(() => {
    store = new SqliteTrackerStore(IN_MEMORY);
    const totals = new TotalsReader(store, NY, new ManualClock(new Date("2026-01-01T20:00:00Z")));
    reporter = new Reporter(totals, { retry: { initialDelayMs: 0, jitter: false } });
  });

  afterEach(() => {
    store.close();
  });

  describe("buildRowsForDay", () => {
    it("sorts by seconds, then case-insensitive name, and names unknown users by ID", () => {
      store.addDailySeconds("2026-01-01", "1", 60);
      store.addDailySeconds("2026-01-01", "2", 60);
      store.addDailySeconds("2026-01-01", "3", 600);
      store.addDailySeconds("2026-01-01", "9", 30);

      const rows = reporter.buildRowsForDay(
        (userId) => NAMES[userId] ?? null,
        "2026-01-01",
        { includeLive: false },
      );

      expect(rows).toEqual([
        { userId: "3", displayName: "bob", seconds: 600 },
        { userId: "2", displayName: "Amy", seconds: 60 },
        { userId: "1", displayName: "zed", seconds: 60 },
        { userId: "9", displayName: "User 9", seconds: 30 },
      ]);
    });

    it("includes live time when asked", () => {
      store.upsertOpenSession("2", new Date("2026-01-01T19:59:00Z"));
      const rows = reporter.buildRowsForDay(() => null, "2026-01-01", { includeLive: true });
      expect(rows).toEqual([{ userId: "2", displayName: "User 2", seconds: 60 }]);
    });
  });

  describe("buildReportContent", () => {
    it("renders a header, the tracked channel and one line per member", () => {
      const content = reporter.buildReportContent("2026-01-01", "hangout", [
        { userId: "3", displayName: "bob", seconds: 3725 },
        { userId: "2", displayName: "Amy", seconds: 60 },
      ]);
      expect(content).toBe(
        [
          "**Daily Voice Activity - 2026-01-01**",
          "Tracked channel: #hangout",
          "- bob: `01:02:05`",
          "- Amy: `00:01:00`",
        ].join("\n"),
      );
    });

    it("says so when nobody was tracked", () => {
      expect(reporter.buildReportContent("2026-01-01", "hangout", [])).toBe(
        "**Daily Voice Activity - 2026-01-01**\nTracked channel: #hangout\nNo tracked activity for 2026-01-01.",
      );
    });
  });

  describe("postReport", () => {
    it("sends the rendered report and returns its rows", async () => {
      store.addDailySeconds("2026-01-01", "3", 120);
      const send = vi.fn(async (_content: string) => {});

      const rows = await reporter.postReport(fakeDestination(send), "2026-01-01", { includeLive: false });

      expect(rows).toEqual([{ userId: "3", displayName: "bob", seconds: 120 }]);
      expect(send).toHaveBeenCalledOnce();
      expect(send).toHaveBeenCalledWith(
        "**Daily Voice Activity - 2026-01-01**\nTracked channel: #hangout\n- bob: `00:02:00`",
      );
    });

    it("retries a failed delivery", async () => {
      const send = vi
        .fn<(content: string) => Promise<void>>()
        .mockRejectedValueOnce(new Error("503 Service Unavailable"))
        .mockResolvedValueOnce(undefined);
      await reporter.postReport(fakeDestination(send), "2026-01-01", { includeLive: false });

      expect(send).toHaveBeenCalledTimes(2);
    });

    it("throws RetryError once every attempt failed", async () => {
      const destination = fakeDestination(async () => {
        throw new Error("Missing Access");
      });

      await expect(reporter.postReport(destination, "2026-01-01", { includeLive: false })).rejects.toThrow(
        RetryError,
      );
      await expect(reporter.postReport(destination, "2026-01-01", { includeLive: false })).rejects.toThrow(
        "Report for 2026-01-01 failed after 3 attempts: Missing Access",
      );
    });
  });
});
