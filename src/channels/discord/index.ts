/**
 * Discord channel adapter.
 *
 * Presence source and report destination for a single guild: voice-state
 * updates for the tracked voice channel become join/leave events, reports go
 * to the report text channel, and slash commands are routed to one handler.
 *
 * The Discord client itself sits behind DiscordAdapterDeps so that the
 * adapter can be exercised without a gateway connection.
 */
import type { ReportDestination } from "../../report/reporter.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface DiscordConfig {
  /** Bot token. */
  token: string;
  guildId: string;
  trackedVoiceChannelId: string;
  reportChannelId: string;
}

export class ChannelSetupError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Discord setup failed: ${reason}`);
    this.name = "ChannelSetupError";
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** A raw voice-state update, reduced to what presence tracking needs. */
export interface VoiceStateChange {
  guildId: string;
  userId: string;
  isBot: boolean;
  beforeChannelId: string | null;
  afterChannelId: string | null;
}

export interface PresenceEvent {
  userId: string;
  /** true when the user entered the tracked channel, false when they left it. */
  joined: boolean;
}

export interface ChannelMember {
  userId: string;
  displayName: string;
  isBot: boolean;
}

export interface SlashCommandDefinition {
  name: string;
  description: string;
}

export interface CommandInvocation {
  commandName: string;
  /** Guild the command was used in; null in DMs. */
  guildId: string | null;
  /** Reply visible only to the caller. */
  reply(content: string): Promise<void>;
}

export type CommandHandler = (invocation: CommandInvocation) => Promise<void>;

/**
 * Map a voice-state update to a join or leave of the tracked channel.
 *
 * Bots, other guilds, and updates that neither enter nor leave the tracked
 * channel (mute, deafen, moves between other channels) yield null.
 */
export function translateVoiceState(config: DiscordConfig, change: VoiceStateChange): PresenceEvent | null {
  if (change.isBot) return null;
  if (change.guildId !== config.guildId) return null;

  const tracked = config.trackedVoiceChannelId;
  const wasIn = change.beforeChannelId === tracked;
  const isIn = change.afterChannelId === tracked;

  if (!wasIn && isIn) return { userId: change.userId, joined: true };
  if (wasIn && !isIn) return { userId: change.userId, joined: false };
  return null;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface DiscordChannelAdapter extends ReportDestination {
  /**
   * Connect, validate the guild and channels, and register slash commands.
   *
   * @throws ChannelSetupError when a configured resource is missing or unusable.
   */
  start(commands: readonly SlashCommandDefinition[]): Promise<void>;
  stop(): Promise<void>;
  isConnected(): boolean;
  /** Human members currently in the tracked voice channel. */
  currentMembers(): Promise<string[]>;
  reportChannelAvailable(): boolean;
  onPresence(handler: (event: PresenceEvent) => void): void;
  onCommand(handler: CommandHandler): void;
}

/**
 * Create a Discord adapter.
 *
 * Handlers registered with onPresence/onCommand are wired to the client on
 * start(). Dependencies are injected for testability; see
 * createDiscordJsAdapterDeps for the real ones.
 */
export function createDiscordAdapter(config: DiscordConfig, deps: DiscordAdapterDeps): DiscordChannelAdapter {
  let connected = false;
  const presenceHandlers: Array<(event: PresenceEvent) => void> = [];
  let commandHandler: CommandHandler | null = null;

  function handleVoiceState(change: VoiceStateChange): void {
    const event = translateVoiceState(config, change);
    if (event === null) return;
    for (const handler of presenceHandlers) {
      handler(event);
    }
  }

  async function handleCommand(invocation: CommandInvocation): Promise<void> {
    if (commandHandler === null) {
      await invocation.reply("Voice tracker is still starting. Try again shortly.");
      return;
    }
    await commandHandler(invocation);
  }

  return {
    async start(commands: readonly SlashCommandDefinition[]): Promise<void> {
      if (connected) return;

      deps.onVoiceStateUpdate(handleVoiceState);
      deps.onCommand(handleCommand);
      await deps.connect(config);

      // Past this point the client is logged in; any failure must log it out.
      let problem: string | null;
      try {
        problem = await deps.checkResources(config);
        if (problem === null) {
          await deps.registerCommands(config.guildId, commands);
        }
      } catch (error: unknown) {
        await deps.disconnect();
        throw error;
      }

      if (problem !== null) {
        await deps.disconnect();
        throw new ChannelSetupError(problem);
      }
      connected = true;
    },

    async stop(): Promise<void> {
      if (!connected) return;
      connected = false;
      await deps.disconnect();
    },

    isConnected(): boolean {
      return connected;
    },

    async currentMembers(): Promise<string[]> {
      if (!connected) return [];
      const members = await deps.listChannelMembers(config.trackedVoiceChannelId);
      return members.filter((member) => !member.isBot).map((member) => member.userId);
    },

    reportChannelAvailable(): boolean {
      return connected && deps.getChannelName(config.reportChannelId) !== null;
    },

    trackedChannelName(): string {
      return deps.getChannelName(config.trackedVoiceChannelId) ?? config.trackedVoiceChannelId;
    },

    displayName(userId: string): string | null {
      return deps.getMemberDisplayName(userId);
    },

    async sendReport(content: string): Promise<void> {
      if (!connected) {
        throw new Error("Discord adapter is not connected");
      }
      await deps.sendMessage(config.reportChannelId, content);
    },

    onPresence(handler: (event: PresenceEvent) => void): void {
      presenceHandlers.push(handler);
    },

    onCommand(handler: CommandHandler): void {
      commandHandler = handler;
    },
  };
}

// ---------------------------------------------------------------------------
// Dependency injection types (for testability)
// ---------------------------------------------------------------------------

export interface DiscordAdapterDeps {
  /** Log in and wait for the gateway to be ready. */
  connect: (config: DiscordConfig) => Promise<void>;
  /** Validate guild, channels and permissions. Returns a problem description, or null when usable. */
  checkResources: (config: DiscordConfig) => Promise<string | null>;
  listChannelMembers: (channelId: string) => Promise<ChannelMember[]>;
  getMemberDisplayName: (userId: string) => string | null;
  getChannelName: (channelId: string) => string | null;
  /** Post a message with mentions disabled. */
  sendMessage: (channelId: string, content: string) => Promise<void>;
  registerCommands: (guildId: string, commands: readonly SlashCommandDefinition[]) => Promise<void>;
  onVoiceStateUpdate: (handler: (change: VoiceStateChange) => void) => void;
  onCommand: (handler: CommandHandler) => void;
  disconnect: () => Promise<void>;
}
