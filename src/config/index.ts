/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, maybeEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export scheduler configuration module
export * from "./scheduler/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Also append log lines to a file */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Application name */
  readonly appName: string;
  /** Path of the JSON file holding every topic */
  readonly storePath: string;
  /** How long to wait for the store lock before failing */
  readonly lockTimeoutMs: number;
  /** Optional JSON file overriding the default ladder and mastery table */
  readonly schedulerConfigPath?: string;
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

/**
 * Load and validate application configuration from the environment.
 * Fails fast with ConfigError on malformed values.
 */
export function loadConfig(): AppConfig {
  const env = optionalEnv("NODE_ENV", "development");
  if (!isEnvironment(env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${env}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return {
    env,
    logLevel,
    logToFile: optionalEnvBool("LOG_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    appName: optionalEnv("APP_NAME", "review-scheduler"),
    storePath: optionalEnv("REVIEW_STORE_PATH", "data/review-schedule.json"),
    lockTimeoutMs: optionalEnvInt("REVIEW_LOCK_TIMEOUT_MS", 5_000, 0),
    schedulerConfigPath: maybeEnv("REVIEW_LADDER_PATH"),
  };
}
