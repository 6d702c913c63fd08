/**
 * Global cooldown for manual (/report-now) reports.
 *
 * The last run is stored as an ISO timestamp in the meta table under
 * MANUAL_REPORT_META_KEY.
 */
import type { MetaStore } from "../storage/store.js";

export const MANUAL_REPORT_META_KEY = "last_manual_report_at_utc";

/**
 * Parse a stored timestamp. Values without a zone are read as UTC so that a
 * hand-edited marker still counts.
 */
export function parseIsoUtc(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(trimmed) && trimmed.includes("T");
  const parsed = new Date(hasZone ? trimmed : `${trimmed}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Seconds until the next manual report is allowed (0 when allowed now). */
export function remainingCooldownSeconds(
  lastRunIso: string | null | undefined,
  cooldownSeconds: number,
  now: Date,
): number {
  if (cooldownSeconds <= 0) return 0;

  const lastRun = parseIsoUtc(lastRunIso);
  if (lastRun === null) return 0;

  const elapsed = Math.floor((now.getTime() - lastRun.getTime()) / 1000);
  return Math.max(0, cooldownSeconds - elapsed);
}

export class ReportCooldown {
  private readonly meta: MetaStore;
  private readonly cooldownSeconds: number;

  constructor(meta: MetaStore, cooldownSeconds: number) {
    this.meta = meta;
    this.cooldownSeconds = cooldownSeconds;
  }

  remaining(now: Date): number {
    return remainingCooldownSeconds(this.meta.getMeta(MANUAL_REPORT_META_KEY), this.cooldownSeconds, now);
  }

  record(now: Date): void {
    this.meta.setMeta(MANUAL_REPORT_META_KEY, now.toISOString());
  }
}
