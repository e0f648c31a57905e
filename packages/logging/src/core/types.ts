import type { DestinationStream, LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** `compact` is pretty output squeezed onto one line per entry. */
export type LogFormat = "json" | "pretty" | "compact";

export type LogContext = Record<string, unknown>;

/**
 * Options accepted by `createLogger`. Anything pino understands passes through.
 */
export interface LoggerConfig extends LoggerOptions {
  service?: string;
  environment?: string;
  /** Forces pretty output on or off regardless of `LOGGING_OUTPUT_FORMAT`. */
  prettyPrint?: boolean;
  /** When false the environment is not consulted. */
  useEnvConfig?: boolean;
  /** Write here instead of stdout; pretty printing is skipped. */
  destination?: DestinationStream;
}

/**
 * Settings resolved from `LOG_LEVEL` and the `LOGGING_*` variables.
 */
export interface LoggingConfig {
  level: string;
  format: LogFormat;
  redactSensitive: boolean;
  includeCaller: boolean;
  colorize: boolean;
  singleLine: boolean;
  translateTime: string | boolean;
  /** Fraction of trace/debug/info/warn entries kept. */
  sampleRate: number;
}
