/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError, requireEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

// Pipeline configuration module
export * from "./pipeline/index.js";

export const APP_ENVIRONMENTS = ["development", "production", "test"] as const;
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly appName: string;
  /** Directory for log files when file logging is enabled */
  readonly logDir: string;
  readonly logToFile: boolean;
  /** Manifest mapping logical package names to installable ones */
  readonly requirementsFile: string;
}

function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "nlu-component-runtime"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    requirementsFile: optionalEnv("REQUIREMENTS_FILE", "requirements/optional-packages.txt"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the loaded configuration. Call at startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!APP_ENVIRONMENTS.some((env) => env === appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be ${APP_ENVIRONMENTS.join(", ")}.`,
      "NODE_ENV"
    );
  }

  if (!LOG_LEVELS.some((level) => level === appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`,
      "LOG_LEVEL"
    );
  }
}
