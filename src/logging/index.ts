/**
 * Logging utilities.
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

export { generateRunId, initRunId, getRunId, ensureRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";

/**
 * Logger configured from the application environment (LOG_LEVEL,
 * LOG_TO_FILE, LOG_DIR).
 */
export function createAppLogger(scope: string): Logger {
  return createLogger({
    scope,
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    file: config.logToFile,
    logDir: config.logDir,
  });
}
