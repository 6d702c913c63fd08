/**
 * Configuration for voicetally.
 *
 * Settings come from an optional ~/.voicetally/config.yaml, overridden by
 * environment variables. Everything is validated up front so that a
 * misconfigured bot fails before it connects.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { isLogLevel } from "../shared/types.js";
import type { LogLevel } from "../shared/types.js";
import { isValidTimeZone } from "../tracker/local-day.js";

const STATE_DIRNAME = ".voicetally";
const CONFIG_FILENAME = "config.yaml";
const DATABASE_FILENAME = "voicetally.db";
const LOGS_DIRNAME = "logs";

export const DEFAULT_REPORT_NOW_COOLDOWN_SECONDS = 3600;

export class ConfigError extends Error {
  /** The setting at fault (environment variable name or config.yaml key). */
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.VOICETALLY_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new ConfigError(
        "VOICETALLY_HOME",
        `Invalid VOICETALLY_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new ConfigError("VOICETALLY_HOME", `Invalid VOICETALLY_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.VOICETALLY_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export function resolveLogDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, LOGS_DIRNAME);
}

export function ensureStateDir(stateDir: string = resolveStateDir()): void {
  fs.mkdirSync(path.join(stateDir, LOGS_DIRNAME), { recursive: true });
}

export interface TrackerConfig {
  /** Bot token; empty when loaded for offline CLI commands. */
  discordToken: string;
  guildId: string;
  trackedVoiceChannelId: string;
  reportChannelId: string;
  /** IANA zone that defines local days. */
  timeZone: string;
  reportNowCooldownSeconds: number;
  databasePath: string;
  logLevel: LogLevel;
  stateDir: string;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read config.yaml from the state directory.
 * Returns an empty object when the file does not exist.
 */
export function loadConfigFile(stateDir: string = resolveStateDir()): RawConfig {
  const filePath = resolveConfigPath(stateDir);
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(CONFIG_FILENAME, `Invalid YAML in ${filePath}: ${msg}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(CONFIG_FILENAME, `${filePath} must contain a mapping of settings`);
  }
  return parsed;
}

interface Setting {
  env: string;
  file: string;
}

const SETTINGS = {
  discordToken: { env: "DISCORD_TOKEN", file: "discordToken" },
  guildId: { env: "GUILD_ID", file: "guildId" },
  trackedVoiceChannelId: { env: "TRACKED_VOICE_CHANNEL_ID", file: "trackedVoiceChannelId" },
  reportChannelId: { env: "REPORT_CHANNEL_ID", file: "reportChannelId" },
  timeZone: { env: "TIMEZONE", file: "timezone" },
  reportNowCooldownSeconds: { env: "REPORT_NOW_COOLDOWN_SECONDS", file: "reportNowCooldownSeconds" },
  databasePath: { env: "VOICETALLY_DB_PATH", file: "databasePath" },
  logLevel: { env: "VOICETALLY_LOG_LEVEL", file: "logLevel" },
} satisfies Record<keyof Omit<TrackerConfig, "stateDir">, Setting>;

class SettingReader {
  constructor(
    private readonly env: NodeJS.ProcessEnv,
    private readonly file: RawConfig,
  ) {}

  optional(setting: Setting): string | undefined {
    const fromEnv = this.env[setting.env]?.trim();
    if (fromEnv) return fromEnv;

    const fromFile = this.file[setting.file];
    if (fromFile === undefined || fromFile === null) return undefined;
    if (typeof fromFile === "string") {
      const trimmed = fromFile.trim();
      return trimmed === "" ? undefined : trimmed;
    }
    if (typeof fromFile === "number") {
      // Discord IDs exceed 2^53; unquoted YAML numbers that large are already corrupted.
      if (!Number.isSafeInteger(fromFile)) {
        throw new ConfigError(setting.file, `${setting.file} in ${CONFIG_FILENAME} must be quoted`);
      }
      return String(fromFile);
    }
    throw new ConfigError(setting.file, `${setting.file} in ${CONFIG_FILENAME} must be a string or a number`);
  }

  required(setting: Setting): string {
    const value = this.optional(setting);
    if (value === undefined) {
      throw new ConfigError(
        setting.env,
        `Missing required setting: ${setting.env} (or ${setting.file} in ${CONFIG_FILENAME})`,
      );
    }
    return value;
  }

  id(setting: Setting): string {
    const value = this.required(setting);
    if (!/^\d+$/.test(value) || /^0+$/.test(value)) {
      throw new ConfigError(setting.env, `${setting.env} must be a positive integer`);
    }
    return value;
  }

  positiveInteger(setting: Setting, fallback: number): number {
    const value = this.optional(setting);
    if (value === undefined) return fallback;
    if (!/^-?\d+$/.test(value)) {
      throw new ConfigError(setting.env, `${setting.env} must be an integer`);
    }
    const parsed = Number(value);
    if (parsed <= 0) {
      throw new ConfigError(setting.env, `${setting.env} must be positive`);
    }
    return parsed;
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  stateDir?: string;
  /** Require DISCORD_TOKEN. Offline CLI commands pass false. Defaults to true. */
  requireToken?: boolean;
}

/** Load and validate the full configuration. */
export function loadConfig(options: LoadConfigOptions = {}): TrackerConfig {
  const env = options.env ?? process.env;
  const stateDir = options.stateDir ?? resolveStateDir(env);
  const reader = new SettingReader(env, loadConfigFile(stateDir));

  const discordToken =
    options.requireToken === false
      ? (reader.optional(SETTINGS.discordToken) ?? "")
      : reader.required(SETTINGS.discordToken);

  const timeZone = reader.required(SETTINGS.timeZone);
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(SETTINGS.timeZone.env, `Invalid timezone in ${SETTINGS.timeZone.env}: ${timeZone}`);
  }

  const logLevel = reader.optional(SETTINGS.logLevel) ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      SETTINGS.logLevel.env,
      `${SETTINGS.logLevel.env} must be one of fatal, error, warn, info, debug, trace`,
    );
  }

  const databasePath = reader.optional(SETTINGS.databasePath);

  return {
    discordToken,
    guildId: reader.id(SETTINGS.guildId),
    trackedVoiceChannelId: reader.id(SETTINGS.trackedVoiceChannelId),
    reportChannelId: reader.id(SETTINGS.reportChannelId),
    timeZone,
    reportNowCooldownSeconds: reader.positiveInteger(
      SETTINGS.reportNowCooldownSeconds,
      DEFAULT_REPORT_NOW_COOLDOWN_SECONDS,
    ),
    databasePath: databasePath ? path.resolve(stateDir, databasePath) : path.join(stateDir, DATABASE_FILENAME),
    logLevel,
    stateDir,
  };
}
