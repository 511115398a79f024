/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { isLogLevel } from "../logging/index.js";
import { ConfigError, optionalEnv, optionalEnvBool, maybeEnv } from "./env.js";

export { ConfigError } from "./env.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log lines to a file in logDir */
  readonly logToFile: boolean;
  /** Echo log lines to the console alongside command output */
  readonly logToConsole: boolean;
  /** Author written into document info and XMP metadata */
  readonly author: string;
  /** Optional JSON file with additional version profiles */
  readonly profilesFile?: string;
}

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logToConsole: optionalEnvBool("LOG_TO_CONSOLE", false),
    author: optionalEnv("PDFVT_AUTHOR", "PDFVT Generator"),
    profilesFile: maybeEnv("PDFVT_PROFILES_FILE"),
  };
}

/**
 * Validate configuration values that have a closed set of options.
 * Call this at startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.some((env) => env === config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
