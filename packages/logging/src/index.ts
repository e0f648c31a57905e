/**
 * @receipt-pipeline/logging
 * pino loggers configured from the environment.
 */
import { Logger } from "./core/logger.js";
import type { LoggerConfig } from "./core/types.js";

export { Logger };
export { getLoggingConfig, getDefaultConfig } from "./core/config.js";
export type {
  LoggerConfig,
  LogContext,
  LoggingConfig,
  LogLevel,
  LogFormat,
} from "./core/types.js";

export {
  redactSensitive,
  isSensitiveField,
  REDACTED,
} from "./utils/redaction.js";
export { shouldSample, parseSampleRate } from "./utils/sampling.js";
export { normalizeError } from "./utils/error.js";
export type { NormalizedError } from "./utils/error.js";

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}
