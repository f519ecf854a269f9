/**
 * Application configuration.
 * Validates and exposes typed configuration values read from the environment.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export run configuration module
export * from "./run/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Mirror log entries to the console */
  readonly logToConsole: boolean;
  /** Application name */
  readonly appName: string;
  /** Executable that converts coordinate files to GTF */
  readonly bed2gtfBin: string;
  /** Executable that converts coordinate files to GFF */
  readonly bed2gffBin: string;
}

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToConsole: optionalEnvBool("LOG_TO_CONSOLE", true),
    appName: optionalEnv("APP_NAME", "projection-reconciler"),
    bed2gtfBin: optionalEnv("BED2GTF_BIN", "bed2gtf"),
    bed2gffBin: optionalEnv("BED2GFF_BIN", "bed2gff"),
  };
}

/**
 * Validate that configuration values are usable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): LogLevel {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return config.logLevel;
}
