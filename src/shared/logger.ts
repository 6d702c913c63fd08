/**
 * Structured logger for voicetally.
 *
 * Writes JSON log lines to <stateDir>/logs/ and human-readable output to console.
 * Log format: {ts, level, component, msg}
 * Console format: [component] message
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { LogEntry, LogLevel } from "./types.js";

const REDACTED = "[REDACTED]";

/** Replace every occurrence of the given secrets in a string. */
export function sanitize(input: string, secrets: readonly string[]): string {
  let output = input;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    output = output.split(secret).join(REDACTED);
  }
  return output;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LoggerContext {
  /** Subsystem name (e.g. "engine"). */
  component: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ~/.voicetally/logs/. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
  /** Values masked in every emitted line (bot token and the like). */
  redact?: readonly string[];
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly logDir: string;
  private fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private readonly redact: readonly string[];
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.logDir = options.logDir ?? path.join(os.homedir(), ".voicetally", "logs");
    this.fileOutput = options.fileOutput ?? true;
    this.consoleOutput = options.consoleOutput ?? true;
    this.redact = options.redact ?? [];
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Create a child logger for another component, sharing outputs and level. */
  child(component: string): Logger {
    return new Logger(
      { component },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
        redact: this.redact,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      msg: sanitize(msg, this.redact),
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.component ? `[${entry.component}]` : "[voicetally]";
    const line = `${prefix} ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = entry.ts.slice(0, 10);
        this.logFilePath = path.join(this.logDir, `voicetally-${date}.jsonl`);
      }
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n");
    } catch (error: unknown) {
      // Reported once; console output continues.
      const msg = error instanceof Error ? error.message : String(error);
      console.error(`[voicetally] Log file write failed, disabling file output: ${msg}`);
      this.fileOutput = false;
    }
  }
}

/** Create a logger with default context. */
export function createLogger(component = "", options: LoggerOptions = {}): Logger {
  return new Logger({ component }, options);
}
