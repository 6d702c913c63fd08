/**
 * CLI program definition for voicetally.
 *
 * Uses Commander to define the command structure:
 *   voicetally run                        connect and track (default)
 *   voicetally totals [day] [--live]      print a day's totals from the store
 *   voicetally status                     print configuration and store state
 */
import { Command } from "commander";
import process from "node:process";
import { VERSION } from "../version.js";
import { VoiceTrackerBot } from "../bot/runtime.js";
import { createDiscordAdapter } from "../channels/discord/index.js";
import type { DiscordAdapterDeps } from "../channels/discord/index.js";
import { createDiscordJsAdapterDeps } from "../channels/discord/discord-adapter.js";
import { ensureStateDir, loadConfig, resolveLogDir } from "../config/index.js";
import type { LoadConfigOptions, TrackerConfig } from "../config/index.js";
import { ReportCooldown } from "../report/cooldown.js";
import { formatSeconds } from "../report/reporter.js";
import { AUTO_REPORT_META_KEY } from "../scheduler/midnight.js";
import { createLogger } from "../shared/logger.js";
import { SqliteTrackerStore } from "../storage/sqlite-store.js";
import type { Clock } from "../tracker/clock.js";
import { systemClock } from "../tracker/clock.js";
import { LocalCalendar, parseDayKey } from "../tracker/local-day.js";
import { TotalsReader } from "../tracker/totals.js";

export interface TotalsOptions {
  live?: boolean;
  json?: boolean;
}

/** Overrides for tests. */
export interface CliDeps {
  config?: LoadConfigOptions;
  clock?: Clock;
  adapterDeps?: DiscordAdapterDeps;
  /** Resolves when the process should shut down. Defaults to SIGINT/SIGTERM. */
  waitForShutdown?: () => Promise<string>;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("voicetally")
    .description("Track time members spend in a Discord voice channel, per local day")
    .version(VERSION);

  program
    .command("run", { isDefault: true })
    .description("Connect to Discord and track the configured voice channel")
    .action(async () => {
      await runCommand(() => handleRun(deps));
    });

  program
    .command("totals")
    .description("Print tracked totals for a local day (default: today)")
    .argument("[day]", "local day as YYYY-MM-DD")
    .option("--live", "include time still accruing in open sessions")
    .option("--json", "output raw JSON to stdout")
    .action(async (day: string | undefined, opts: TotalsOptions) => {
      await runCommand(async () => handleTotals(day, opts, deps));
    });

  program
    .command("status")
    .description("Show configuration, open sessions and the /report-now cooldown")
    .action(async () => {
      await runCommand(async () => handleStatus(deps));
    });

  return program;
}

async function runCommand(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(`[voicetally] ${msg}`);
    process.exitCode = 1;
  }
}

function waitForSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

/** Run the bot until shutdown is requested. */
export async function handleRun(deps: CliDeps = {}): Promise<void> {
  const config = loadConfig(deps.config);
  ensureStateDir(config.stateDir);

  const logger = createLogger("", {
    level: config.logLevel,
    logDir: resolveLogDir(config.stateDir),
    redact: [config.discordToken],
  });

  const store = new SqliteTrackerStore(config.databasePath);
  const adapter = createDiscordAdapter(
    {
      token: config.discordToken,
      guildId: config.guildId,
      trackedVoiceChannelId: config.trackedVoiceChannelId,
      reportChannelId: config.reportChannelId,
    },
    deps.adapterDeps ?? createDiscordJsAdapterDeps(logger.child("discord")),
  );
  const bot = new VoiceTrackerBot({ config, store, adapter, clock: deps.clock, logger });

  try {
    await bot.start();
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error(`Startup failed: ${msg}`);
    await bot.stop();
    throw error;
  }

  logger.info(`Tracking voice channel ${config.trackedVoiceChannelId} in ${config.timeZone}`);
  const signal = await (deps.waitForShutdown ?? waitForSignal)();
  logger.info(`Received ${signal}, shutting down`);
  await bot.stop();
}

function openOffline(deps: CliDeps): { config: TrackerConfig; store: SqliteTrackerStore; now: Date } {
  const config = loadConfig({ ...deps.config, requireToken: false });
  const store = new SqliteTrackerStore(config.databasePath);
  return { config, store, now: (deps.clock ?? systemClock).now() };
}

/** Print a day's totals straight from the store. */
export function handleTotals(day: string | undefined, opts: TotalsOptions, deps: CliDeps = {}): void {
  const { config, store, now } = openOffline(deps);
  try {
    const calendar = new LocalCalendar(config.timeZone);
    const dayKey = day ?? calendar.dayKey(now);
    parseDayKey(dayKey);

    const live = opts.live === true;
    const totals = new TotalsReader(store, config.timeZone).getTotalsForDay(dayKey, { includeLive: live, now });
    const entries = [...totals.entries()].sort(([userA, a], [userB, b]) =>
      a !== b ? b - a : userA < userB ? -1 : userA > userB ? 1 : 0,
    );

    if (opts.json) {
      console.log(JSON.stringify({ day: dayKey, live, totals: Object.fromEntries(entries) }, null, 2));
      return;
    }

    if (entries.length === 0) {
      console.log(`No tracked activity for ${dayKey}.`);
      return;
    }

    console.log(`Totals for ${dayKey}${live ? " (live)" : ""}:`);
    for (const [userId, seconds] of entries) {
      console.log(`- ${userId}: ${formatSeconds(seconds)}`);
    }
  } finally {
    store.close();
  }
}

/** Print configuration and store state without connecting to Discord. */
export function handleStatus(deps: CliDeps = {}): void {
  const { config, store, now } = openOffline(deps);
  try {
    const calendar = new LocalCalendar(config.timeZone);
    const cooldown = new ReportCooldown(store, config.reportNowCooldownSeconds);

    const lines = [
      `Database: ${config.databasePath}`,
      `Guild ID: ${config.guildId}`,
      `Tracked voice channel ID: ${config.trackedVoiceChannelId}`,
      `Report channel ID: ${config.reportChannelId}`,
      `Timezone: ${config.timeZone}`,
      `Current local time: ${calendar.localIso(now)}`,
      `Next scheduled midnight check: ${calendar.localIso(calendar.nextMidnight(now))}`,
      `Open sessions: ${store.listOpenSessions().length}`,
      `Last midnight report: ${store.getMeta(AUTO_REPORT_META_KEY) ?? "never"}`,
      `/report-now cooldown remaining: ${formatSeconds(cooldown.remaining(now))}`,
    ];
    console.log(lines.join("\n"));
  } finally {
    store.close();
  }
}
