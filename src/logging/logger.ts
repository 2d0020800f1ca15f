/**
 * Lightweight logging utility.
 * Writes timestamped lines tagged with the run ID and an optional scope to the
 * console and, when enabled, to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name printed after the run ID */
  scope?: string;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Receives every emitted line instead of the console */
  sink?: (level: LogLevel, line: string) => void;
}

interface ResolvedOptions {
  level: LogLevel;
  scope: string | undefined;
  logDir: string;
  logFile: string;
  console: boolean;
  file: boolean;
  sink: ((level: LogLevel, line: string) => void) | undefined;
}

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  scope: undefined,
  logDir: "output/logs",
  logFile: "review-scheduler.log",
  console: true,
  file: false,
  sink: undefined,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger with the same settings and a nested scope ("store", "store:lock") */
  child(scope: string): Logger;
}

function formatLogEntry(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  context?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}]${scopeStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

function buildLogger(opts: ResolvedOptions): Logger {
  const logFilePath = join(opts.logDir, opts.logFile);

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, opts.scope, message, context);

    if (opts.sink) {
      opts.sink(level, entry);
    } else if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) =>
      buildLogger({ ...opts, scope: opts.scope ? `${opts.scope}:${scope}` : scope }),
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: ResolvedOptions = {
    level: options.level ?? DEFAULT_OPTIONS.level,
    scope: options.scope,
    logDir: options.logDir ?? DEFAULT_OPTIONS.logDir,
    logFile: options.logFile ?? DEFAULT_OPTIONS.logFile,
    console: options.console ?? DEFAULT_OPTIONS.console,
    file: options.file ?? DEFAULT_OPTIONS.file,
    sink: options.sink,
  };

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  return buildLogger(opts);
}

/**
 * Logger that drops everything. Used where a collaborator does not care
 * about diagnostics, such as one-off library calls.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
