import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_REPORT_NOW_COOLDOWN_SECONDS,
  ensureStateDir,
  loadConfig,
  loadConfigFile,
  resolveConfigPath,
  resolveHomeDir,
  resolveLogDir,
  resolveStateDir,
} from "./index.js";

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "voicetally-config-test-"));
}

function rmrf(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

const BASE_ENV: NodeJS.ProcessEnv = {
  DISCORD_TOKEN: "test-secret",
  GUILD_ID: "111",
  TRACKED_VOICE_CHANNEL_ID: "222",
  REPORT_CHANNEL_ID: "333",
  TIMEZONE: "America/New_York",
};

describe("resolveHomeDir", () => {
  it("returns os.homedir() by default", () => {
    expect(resolveHomeDir({})).toBe(os.homedir());
  });

  it("returns VOICETALLY_HOME override when set", () => {
    expect(resolveHomeDir({ VOICETALLY_HOME: "/tmp/custom-home" })).toBe("/tmp/custom-home");
  });

  it("rejects relative and traversing overrides", () => {
    expect(() => resolveHomeDir({ VOICETALLY_HOME: "relative/home" })).toThrow(
      "Invalid VOICETALLY_HOME path 'relative/home': path must be absolute",
    );
    expect(() => resolveHomeDir({ VOICETALLY_HOME: "/tmp/../etc" })).toThrow(ConfigError);
  });
});

describe("resolveStateDir", () => {
  it("returns ~/.voicetally by default", () => {
    expect(resolveStateDir({})).toBe(path.join(os.homedir(), ".voicetally"));
  });

  it("nests under VOICETALLY_HOME", () => {
    expect(resolveStateDir({ VOICETALLY_HOME: "/tmp/custom-home" })).toBe("/tmp/custom-home/.voicetally");
  });

  it("respects VOICETALLY_STATE_DIR override", () => {
    expect(resolveStateDir({ VOICETALLY_STATE_DIR: "/tmp/custom-state" })).toBe("/tmp/custom-state");
  });
});

describe("state paths", () => {
  it("places config.yaml and logs inside the state dir", () => {
    expect(resolveConfigPath("/tmp/test")).toBe("/tmp/test/config.yaml");
    expect(resolveLogDir("/tmp/test")).toBe("/tmp/test/logs");
  });

  it("ensureStateDir creates the logs directory", () => {
    const tmp = makeTmpDir();
    try {
      const stateDir = path.join(tmp, "state");
      ensureStateDir(stateDir);
      expect(fs.statSync(path.join(stateDir, "logs")).isDirectory()).toBe(true);
    } finally {
      rmrf(tmp);
    }
  });
});

describe("loadConfigFile", () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = makeTmpDir();
  });

  afterEach(() => {
    rmrf(stateDir);
  });

  it("returns an empty object when config.yaml is missing", () => {
    expect(loadConfigFile(stateDir)).toEqual({});
  });

  it("returns an empty object for an empty file", () => {
    fs.writeFileSync(path.join(stateDir, "config.yaml"), "");
    expect(loadConfigFile(stateDir)).toEqual({});
  });

  it("rejects a document that is not a mapping", () => {
    fs.writeFileSync(path.join(stateDir, "config.yaml"), "- one\n- two\n");
    expect(() => loadConfigFile(stateDir)).toThrow(`${path.join(stateDir, "config.yaml")} must contain a mapping of settings`);
  });

  it("rejects invalid YAML", () => {
    fs.writeFileSync(path.join(stateDir, "config.yaml"), "guildId: [unclosed\n");
    expect(() => loadConfigFile(stateDir)).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = makeTmpDir();
  });

  afterEach(() => {
    rmrf(stateDir);
  });

  it("loads every setting from the environment with defaults", () => {
    expect(loadConfig({ env: BASE_ENV, stateDir })).toEqual({
      discordToken: "test-secret",
      guildId: "111",
      trackedVoiceChannelId: "222",
      reportChannelId: "333",
      timeZone: "America/New_York",
      reportNowCooldownSeconds: DEFAULT_REPORT_NOW_COOLDOWN_SECONDS,
      databasePath: path.join(stateDir, "voicetally.db"),
      logLevel: "info",
      stateDir,
    });
  });

  it("derives the state dir from the environment when none is given", () => {
    const config = loadConfig({ env: { ...BASE_ENV, VOICETALLY_STATE_DIR: stateDir } });
    expect(config.stateDir).toBe(stateDir);
  });

  it("reads config.yaml and lets the environment override it", () => {
    fs.writeFileSync(
      path.join(stateDir, "config.yaml"),
      [
        'guildId: "444"',
        'trackedVoiceChannelId: "555"',
        "reportChannelId: 666",
        "timezone: Europe/Berlin",
        "reportNowCooldownSeconds: 120",
        "databasePath: data/tally.db",
        "logLevel: debug",
      ].join("\n"),
    );

    const config = loadConfig({
      env: { DISCORD_TOKEN: "test-secret", GUILD_ID: "777" },
      stateDir,
    });

    expect(config).toMatchObject({
      guildId: "777",
      trackedVoiceChannelId: "555",
      reportChannelId: "666",
      timeZone: "Europe/Berlin",
      reportNowCooldownSeconds: 120,
      databasePath: path.join(stateDir, "data", "tally.db"),
      logLevel: "debug",
    });
  });

  it("keeps an absolute database path as given", () => {
    const config = loadConfig({ env: { ...BASE_ENV, VOICETALLY_DB_PATH: "/var/lib/tally.db" }, stateDir });
    expect(config.databasePath).toBe("/var/lib/tally.db");
  });

  it("names the missing setting", () => {
    const env = { ...BASE_ENV, REPORT_CHANNEL_ID: undefined };
    const error = (() => {
      try {
        loadConfig({ env, stateDir });
        return null;
      } catch (err: unknown) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      key: "REPORT_CHANNEL_ID",
      message: "Missing required setting: REPORT_CHANNEL_ID (or reportChannelId in config.yaml)",
    });
  });

  it("treats blank values as missing", () => {
    expect(() => loadConfig({ env: { ...BASE_ENV, DISCORD_TOKEN: "  " }, stateDir })).toThrow(
      "Missing required setting: DISCORD_TOKEN (or discordToken in config.yaml)",
    );
  });

  it("allows a missing token when it is not required", () => {
    const config = loadConfig({ env: { ...BASE_ENV, DISCORD_TOKEN: undefined }, stateDir, requireToken: false });
    expect(config.discordToken).toBe("");
  });

  it("rejects IDs that are not positive integers", () => {
    expect(() => loadConfig({ env: { ...BASE_ENV, GUILD_ID: "abc" }, stateDir })).toThrow(
      "GUILD_ID must be a positive integer",
    );
    expect(() => loadConfig({ env: { ...BASE_ENV, TRACKED_VOICE_CHANNEL_ID: "0" }, stateDir })).toThrow(
      "TRACKED_VOICE_CHANNEL_ID must be a positive integer",
    );
  });

  it("rejects unknown timezones", () => {
    expect(() => loadConfig({ env: { ...BASE_ENV, TIMEZONE: "Mars/Olympus" }, stateDir })).toThrow(
      "Invalid timezone in TIMEZONE: Mars/Olympus",
    );
  });

  it("validates the cooldown", () => {
    expect(() => loadConfig({ env: { ...BASE_ENV, REPORT_NOW_COOLDOWN_SECONDS: "soon" }, stateDir })).toThrow(
      "REPORT_NOW_COOLDOWN_SECONDS must be an integer",
    );
    expect(() => loadConfig({ env: { ...BASE_ENV, REPORT_NOW_COOLDOWN_SECONDS: "0" }, stateDir })).toThrow(
      "REPORT_NOW_COOLDOWN_SECONDS must be positive",
    );
    expect(() => loadConfig({ env: { ...BASE_ENV, REPORT_NOW_COOLDOWN_SECONDS: "-5" }, stateDir })).toThrow(
      "REPORT_NOW_COOLDOWN_SECONDS must be positive",
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ env: { ...BASE_ENV, VOICETALLY_LOG_LEVEL: "verbose" }, stateDir })).toThrow(
      "VOICETALLY_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace",
    );
  });

  it("rejects unquoted snowflakes in config.yaml", () => {
    fs.writeFileSync(path.join(stateDir, "config.yaml"), "guildId: 123456789012345678901\n");
    expect(() => loadConfig({ env: { ...BASE_ENV, GUILD_ID: undefined }, stateDir })).toThrow(
      "guildId in config.yaml must be quoted",
    );
  });

  it("rejects settings of the wrong type in config.yaml", () => {
    fs.writeFileSync(path.join(stateDir, "config.yaml"), "timezone: [UTC]\n");
    expect(() => loadConfig({ env: { ...BASE_ENV, TIMEZONE: undefined }, stateDir })).toThrow(
      "timezone in config.yaml must be a string or a number",
    );
  });
});
