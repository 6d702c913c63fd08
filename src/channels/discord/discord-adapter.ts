/**
 * Real discord.js implementation for Discord adapter deps.
 *
 * Needs a bot token with the Guilds and GuildVoiceStates intents, and the
 * applications.commands scope in the configured guild.
 */
import type { Client, Guild } from "discord.js";
import type { Logger } from "../../shared/logger.js";
import type {
  ChannelMember,
  CommandHandler,
  CommandInvocation,
  DiscordAdapterDeps,
  DiscordConfig,
  SlashCommandDefinition,
  VoiceStateChange,
} from "./index.js";

type DiscordModule = typeof import("discord.js");

/** The parts of a slash-command interaction a command reply needs. */
export interface DeferrableInteraction {
  commandName: string;
  guildId: string | null;
  deferReply(options: { ephemeral: boolean }): Promise<unknown>;
  editReply(content: string): Promise<unknown>;
}

/**
 * Acknowledge an interaction and wrap it as a command invocation.
 *
 * Discord drops an interaction that is not acknowledged within three seconds,
 * and /report-now may spend longer than that retrying delivery. The reply is
 * deferred right away and the handler's answer edits it in later.
 */
export async function deferredInvocation(interaction: DeferrableInteraction): Promise<CommandInvocation> {
  await interaction.deferReply({ ephemeral: true });
  return {
    commandName: interaction.commandName,
    guildId: interaction.guildId,
    reply: async (content: string) => {
      await interaction.editReply(content);
    },
  };
}

/**
 * Create real discord.js dependency implementations.
 *
 * Uses dynamic import so discord.js is only loaded when the bot actually
 * connects; offline CLI commands never pay for it.
 */
export function createDiscordJsAdapterDeps(logger?: Logger): DiscordAdapterDeps {
  let discord: DiscordModule | null = null;
  let client: Client | null = null;
  let guild: Guild | null = null;
  let voiceHandler: ((change: VoiceStateChange) => void) | null = null;
  let commandHandler: CommandHandler | null = null;

  function requireGuild(): Guild {
    if (guild === null) {
      throw new Error("Discord guild is not resolved; call checkResources first");
    }
    return guild;
  }

  return {
    async connect(config: DiscordConfig): Promise<void> {
      if (!config.token) {
        throw new Error("Discord bot token is required");
      }

      discord = await import("discord.js");
      const { Client, Events, GatewayIntentBits } = discord;
      const instance = new Client({
        intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
      });

      instance.on(Events.VoiceStateUpdate, (oldState, newState) => {
        const member = newState.member ?? oldState.member;
        if (member === null || voiceHandler === null) return;
        voiceHandler({
          guildId: newState.guild.id,
          userId: member.id,
          isBot: member.user.bot,
          beforeChannelId: oldState.channelId,
          afterChannelId: newState.channelId,
        });
      });

      instance.on(Events.InteractionCreate, (interaction) => {
        const handler = commandHandler;
        if (!interaction.isChatInputCommand() || handler === null) return;
        const name = interaction.commandName;
        deferredInvocation(interaction)
          .then((invocation) => handler(invocation))
          .catch((error: unknown) => {
            const msg = error instanceof Error ? error.message : String(error);
            logger?.error(`Command /${name} failed: ${msg}`);
          });
      });

      const ready = new Promise<void>((resolve) => {
        instance.once(Events.ClientReady, (readyClient) => {
          logger?.info(`Connected as ${readyClient.user.tag} (${readyClient.user.id})`);
          resolve();
        });
      });
      await instance.login(config.token);
      await ready;
      client = instance;
    },

    async checkResources(config: DiscordConfig): Promise<string | null> {
      if (client === null || discord === null) {
        return "Discord client is not connected";
      }
      const { ChannelType, PermissionFlagsBits } = discord;

      const found = client.guilds.cache.get(config.guildId);
      if (found === undefined) {
        return `Configured guild ${config.guildId} not found`;
      }

      const tracked = found.channels.cache.get(config.trackedVoiceChannelId);
      if (tracked === undefined || tracked.type !== ChannelType.GuildVoice) {
        return `Tracked channel ${config.trackedVoiceChannelId} is missing or not a voice channel`;
      }

      const report = found.channels.cache.get(config.reportChannelId);
      if (report === undefined || report.type !== ChannelType.GuildText) {
        return `Report channel ${config.reportChannelId} is missing or not a text channel`;
      }

      const me = found.members.me;
      if (me === null) {
        return `Unable to resolve bot member in guild ${found.id}`;
      }

      const perms = report.permissionsFor(me);
      if (!perms.has(PermissionFlagsBits.ViewChannel) || !perms.has(PermissionFlagsBits.SendMessages)) {
        return `Missing view/send permission in report channel ${report.id}`;
      }

      guild = found;
      return null;
    },

    async listChannelMembers(channelId: string): Promise<ChannelMember[]> {
      const channel = requireGuild().channels.cache.get(channelId);
      if (channel === undefined || discord === null || channel.type !== discord.ChannelType.GuildVoice) {
        return [];
      }
      return [...channel.members.values()].map((member) => ({
        userId: member.id,
        displayName: member.displayName,
        isBot: member.user.bot,
      }));
    },

    getMemberDisplayName(userId: string): string | null {
      return guild?.members.cache.get(userId)?.displayName ?? null;
    },

    getChannelName(channelId: string): string | null {
      return guild?.channels.cache.get(channelId)?.name ?? null;
    },

    async sendMessage(channelId: string, content: string): Promise<void> {
      const channel = requireGuild().channels.cache.get(channelId);
      if (channel === undefined || !channel.isTextBased()) {
        throw new Error(`Channel ${channelId} is not available`);
      }
      await channel.send({ content, allowedMentions: { parse: [] } });
    },

    async registerCommands(guildId: string, commands: readonly SlashCommandDefinition[]): Promise<void> {
      const target = client?.guilds.cache.get(guildId);
      if (target === undefined) {
        throw new Error(`Configured guild ${guildId} not found`);
      }
      await target.commands.set(
        commands.map((command) => ({ name: command.name, description: command.description })),
      );
    },

    onVoiceStateUpdate(handler: (change: VoiceStateChange) => void): void {
      voiceHandler = handler;
    },

    onCommand(handler: CommandHandler): void {
      commandHandler = handler;
    },

    async disconnect(): Promise<void> {
      if (client !== null) {
        await client.destroy();
        client = null;
      }
      guild = null;
      voiceHandler = null;
      commandHandler = null;
    },
  };
}
