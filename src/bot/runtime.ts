/**
 * Bot runtime.
 *
 * Wires the Discord adapter to the session engine, the midnight scheduler and
 * the slash commands. Presence events are dropped until the adapter has
 * validated its resources and open sessions were reseeded from the channel.
 * A failing event or tick is logged and never stops the bot.
 */
import { createCommandRouter, COMMAND_DEFINITIONS } from "./commands.js";
import type { DiscordChannelAdapter, PresenceEvent } from "../channels/discord/index.js";
import type { TrackerConfig } from "../config/index.js";
import { ReportCooldown } from "../report/cooldown.js";
import { Reporter } from "../report/reporter.js";
import { MidnightScheduler } from "../scheduler/midnight.js";
import type { TickOutcome } from "../scheduler/midnight.js";
import type { Logger } from "../shared/logger.js";
import type { RetryOptions } from "../shared/retry.js";
import type { TrackerStore } from "../storage/store.js";
import type { Clock } from "../tracker/clock.js";
import { systemClock } from "../tracker/clock.js";
import { SessionEngine } from "../tracker/engine.js";
import { LocalCalendar } from "../tracker/local-day.js";
import { TotalsReader } from "../tracker/totals.js";

export const DEFAULT_TICK_INTERVAL_MS = 30_000;

export interface VoiceTrackerBotOptions {
  config: TrackerConfig;
  store: TrackerStore;
  adapter: DiscordChannelAdapter;
  clock?: Clock;
  logger?: Logger;
  tickIntervalMs?: number;
  /** Backoff for report delivery. */
  retry?: RetryOptions;
}

export class VoiceTrackerBot {
  readonly engine: SessionEngine;
  readonly totals: TotalsReader;
  readonly reporter: Reporter;
  readonly cooldown: ReportCooldown;
  readonly scheduler: MidnightScheduler;
  readonly calendar: LocalCalendar;

  private readonly config: TrackerConfig;
  private readonly store: TrackerStore;
  private readonly adapter: DiscordChannelAdapter;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;
  private readonly tickIntervalMs: number;

  private ready = false;
  private ticking = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: VoiceTrackerBotOptions) {
    this.config = options.config;
    this.store = options.store;
    this.adapter = options.adapter;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;

    this.calendar = new LocalCalendar(this.config.timeZone);
    this.engine = new SessionEngine({
      store: this.store,
      timeZone: this.config.timeZone,
      clock: this.clock,
      logger: this.logger?.child("engine"),
    });
    this.totals = new TotalsReader(this.store, this.config.timeZone, this.clock);
    this.reporter = new Reporter(this.totals, { retry: options.retry, logger: this.logger?.child("reporter") });
    this.cooldown = new ReportCooldown(this.store, this.config.reportNowCooldownSeconds);
    this.scheduler = new MidnightScheduler({
      engine: this.engine,
      calendar: this.calendar,
      meta: this.store,
      reporter: this.reporter,
      destination: this.adapter,
      logger: this.logger?.child("scheduler"),
    });
  }

  isReady(): boolean {
    return this.ready;
  }

  /**
   * Connect, reseed open sessions from the tracked channel and start the
   * midnight timer.
   *
   * @throws ChannelSetupError when the guild or channels are unusable.
   */
  async start(): Promise<void> {
    if (this.ready) return;

    this.adapter.onPresence((event) => this.handlePresence(event));
    this.adapter.onCommand(
      createCommandRouter({
        config: this.config,
        calendar: this.calendar,
        clock: this.clock,
        reporter: this.reporter,
        cooldown: this.cooldown,
        destination: this.adapter,
        logger: this.logger?.child("commands"),
      }),
    );

    await this.adapter.start(COMMAND_DEFINITIONS);
    this.logger?.info("Runtime checks passed");

    const members = await this.adapter.currentMembers();
    this.engine.reseedSessions(members, this.clock.now());
    this.logger?.info(`Reseeded open sessions for ${members.length} active user${members.length === 1 ? "" : "s"}`);

    this.ready = true;
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        const msg = error instanceof Error ? error.message : String(error);
        this.logger?.error(`Midnight tick failed: ${msg}`);
      });
    }, this.tickIntervalMs);
  }

  /** Apply a join or leave at `at` (defaults to now). */
  handlePresence(event: PresenceEvent, at: Date = this.clock.now()): void {
    if (!this.ready) return;

    try {
      if (event.joined) {
        if (this.engine.startSession(event.userId, at)) {
          this.logger?.info(`Session started: user=${event.userId}`);
        }
        return;
      }
      const tracked = this.engine.endSession(event.userId, at);
      this.logger?.info(`Session ended: user=${event.userId} tracked=${tracked}s`);
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger?.error(`Failed to apply ${event.joined ? "join" : "leave"} for user=${event.userId}: ${msg}`);
    }
  }

  /**
   * Run one scheduler tick. Returns null when not ready, when a previous tick
   * is still running, or when the tick threw.
   */
  async tick(now: Date = this.clock.now()): Promise<TickOutcome | null> {
    if (!this.ready || this.ticking) return null;

    this.ticking = true;
    try {
      return await this.scheduler.tick(now);
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger?.error(`Midnight tick failed: ${msg}`);
      return null;
    } finally {
      this.ticking = false;
    }
  }

  /** Stop the timer, disconnect and close the store. */
  async stop(): Promise<void> {
    this.ready = false;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }

    try {
      await this.adapter.stop();
    } finally {
      this.store.close();
    }
    this.logger?.info("Stopped");
  }
}
