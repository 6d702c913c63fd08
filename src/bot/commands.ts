/**
 * Slash commands: /status, /today and /report-now.
 *
 * All replies are ephemeral. /today and /report-now only answer inside the
 * configured guild.
 */
import type { CommandHandler, CommandInvocation, SlashCommandDefinition } from "../channels/discord/index.js";
import type { TrackerConfig } from "../config/index.js";
import type { ReportCooldown } from "../report/cooldown.js";
import { formatSeconds } from "../report/reporter.js";
import type { ReportDestination, Reporter } from "../report/reporter.js";
import type { Logger } from "../shared/logger.js";
import type { Clock } from "../tracker/clock.js";
import type { LocalCalendar } from "../tracker/local-day.js";

export const COMMAND_DEFINITIONS: readonly SlashCommandDefinition[] = [
  { name: "status", description: "Show bot status and cooldown info" },
  { name: "today", description: "Show today's tracked totals so far" },
  { name: "report-now", description: "Post a manual day-so-far report" },
];

export const WRONG_GUILD_REPLY = "This command can only be used in the configured server.";

export interface CommandDestination extends ReportDestination {
  reportChannelAvailable(): boolean;
}

export interface CommandContext {
  config: Pick<TrackerConfig, "guildId" | "trackedVoiceChannelId" | "reportChannelId" | "timeZone">;
  calendar: LocalCalendar;
  clock: Clock;
  reporter: Reporter;
  cooldown: ReportCooldown;
  destination: CommandDestination;
  logger?: Logger;
}

export function renderStatus(ctx: CommandContext, now: Date): string {
  const { config, calendar, cooldown } = ctx;
  return [
    "Voice tracker status: online",
    `Guild ID: \`${config.guildId}\``,
    `Tracked voice channel ID: \`${config.trackedVoiceChannelId}\``,
    `Report channel ID: \`${config.reportChannelId}\``,
    `Timezone: \`${config.timeZone}\``,
    `Current local time: \`${calendar.localIso(now)}\``,
    `Next scheduled midnight check: \`${calendar.localIso(calendar.nextMidnight(now))}\``,
    `/report-now cooldown remaining: \`${formatSeconds(cooldown.remaining(now))}\``,
  ].join("\n");
}

export function renderToday(ctx: CommandContext, now: Date): string {
  const dayKey = ctx.calendar.dayKey(now);
  const rows = ctx.reporter.buildRowsForDay(
    (userId) => ctx.destination.displayName(userId),
    dayKey,
    { includeLive: true, now },
  );

  if (rows.length === 0) {
    return `No tracked activity for ${dayKey}.`;
  }

  const lines = [`Today's totals (${dayKey}):`];
  for (const row of rows) {
    lines.push(`- ${row.displayName}: \`${formatSeconds(row.seconds)}\``);
  }
  return lines.join("\n");
}

/**
 * Post a day-so-far report unless the global cooldown is running.
 * The cooldown starts only when the report was delivered.
 */
export async function runReportNow(ctx: CommandContext, now: Date): Promise<string> {
  const remaining = ctx.cooldown.remaining(now);
  if (remaining > 0) {
    return `Global cooldown active. Try again in \`${formatSeconds(remaining)}\`.`;
  }

  if (!ctx.destination.reportChannelAvailable()) {
    return "Report channel is not available.";
  }

  const dayKey = ctx.calendar.dayKey(now);
  try {
    await ctx.reporter.postReport(ctx.destination, dayKey, { includeLive: true, now });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    ctx.logger?.error(`/report-now failed: ${msg}`);
    return `Failed to send report: \`${msg}\``;
  }

  ctx.cooldown.record(now);
  return `Posted day-so-far report for \`${dayKey}\` in <#${ctx.config.reportChannelId}>.`;
}

function inConfiguredGuild(ctx: CommandContext, invocation: CommandInvocation): boolean {
  return invocation.guildId === ctx.config.guildId;
}

/** Route slash command invocations to their handlers. */
export function createCommandRouter(ctx: CommandContext): CommandHandler {
  return async (invocation: CommandInvocation): Promise<void> => {
    const now = ctx.clock.now();

    switch (invocation.commandName) {
      case "status":
        await invocation.reply(renderStatus(ctx, now));
        return;

      case "today":
        if (!inConfiguredGuild(ctx, invocation)) {
          await invocation.reply(WRONG_GUILD_REPLY);
          return;
        }
        await invocation.reply(renderToday(ctx, now));
        return;

      case "report-now":
        if (!inConfiguredGuild(ctx, invocation)) {
          await invocation.reply(WRONG_GUILD_REPLY);
          return;
        }
        await invocation.reply(await runReportNow(ctx, now));
        return;

      default:
        ctx.logger?.warn(`Ignoring unknown command /${invocation.commandName}`);
        await invocation.reply(`Unknown command: /${invocation.commandName}`);
    }
  };
}
