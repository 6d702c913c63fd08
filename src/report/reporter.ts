/**
 * Daily voice activity reports.
 *
 * Maps a day's totals to display rows, renders the report message and hands
 * it to the report channel. Delivery is retried with backoff; the caller
 * decides what a final failure means (the scheduler leaves its marker unset,
 * /report-now tells the user).
 */
import type { Logger } from "../shared/logger.js";
import { retry } from "../shared/retry.js";
import type { RetryOptions } from "../shared/retry.js";
import type { ReportRow } from "../shared/types.js";
import type { TotalsQuery, TotalsReader } from "../tracker/totals.js";

/** Resolves a user ID to the member's current display name. */
export type DisplayNameLookup = (userId: string) => string | null;

/** Where reports are posted, and how members are named there. */
export interface ReportDestination {
  /** Name shown in the report header. */
  trackedChannelName(): string;
  displayName(userId: string): string | null;
  sendReport(content: string): Promise<void>;
}

export interface ReporterOptions {
  /** Backoff for report delivery. */
  retry?: RetryOptions;
  logger?: Logger;
}

/** Render a duration as HH:MM:SS (hours are not capped at 24). */
export function formatSeconds(totalSeconds: number): string {
  const safe = Number.isFinite(totalSeconds) ? Math.max(0, Math.floor(totalSeconds)) : 0;
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

export class Reporter {
  private readonly totals: TotalsReader;
  private readonly retryOptions: RetryOptions;
  private readonly logger: Logger | undefined;

  constructor(totals: TotalsReader, options: ReporterOptions = {}) {
    this.totals = totals;
    this.retryOptions = options.retry ?? {};
    this.logger = options.logger;
  }

  /** Totals for the day as named rows, longest first, then by name. */
  buildRowsForDay(lookup: DisplayNameLookup, dayKey: string, query: TotalsQuery): ReportRow[] {
    const rows: ReportRow[] = [];
    for (const [userId, seconds] of this.totals.getTotalsForDay(dayKey, query)) {
      if (seconds <= 0) continue;
      // Members who left the guild keep their time under their raw ID.
      const displayName = lookup(userId) ?? `User ${userId}`;
      rows.push({ userId, displayName, seconds });
    }

    rows.sort((a, b) => {
      if (a.seconds !== b.seconds) return b.seconds - a.seconds;
      const left = a.displayName.toLowerCase();
      const right = b.displayName.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    });
    return rows;
  }

  buildReportContent(dayKey: string, trackedChannelName: string, rows: readonly ReportRow[]): string {
    const header = `**Daily Voice Activity - ${dayKey}**`;
    const channelLine = `Tracked channel: #${trackedChannelName}`;

    if (rows.length === 0) {
      return `${header}\n${channelLine}\nNo tracked activity for ${dayKey}.`;
    }

    const lines = rows.map((row) => `- ${row.displayName}: \`${formatSeconds(row.seconds)}\``);
    return [header, channelLine, ...lines].join("\n");
  }

  /**
   * Build and deliver the report for a day.
   *
   * @throws RetryError when every delivery attempt failed.
   */
  async postReport(destination: ReportDestination, dayKey: string, query: TotalsQuery): Promise<ReportRow[]> {
    const rows = this.buildRowsForDay((userId) => destination.displayName(userId), dayKey, query);
    const content = this.buildReportContent(dayKey, destination.trackedChannelName(), rows);

    await retry(() => destination.sendReport(content), {
      label: `Report for ${dayKey}`,
      onRetry: (error, attempt, delayMs) => {
        const msg = error instanceof Error ? error.message : String(error);
        this.logger?.warn(`Report delivery attempt ${attempt} failed (${msg}); retrying in ${Math.round(delayMs)}ms`);
      },
      ...this.retryOptions,
    });

    this.logger?.info(`Posted report for ${dayKey} (${rows.length} member${rows.length === 1 ? "" : "s"})`);
    return rows;
  }
}
