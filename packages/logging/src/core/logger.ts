import pino from "pino";
import type { Logger as PinoLogger, LoggerOptions } from "pino";
import { getDefaultConfig, getLoggingConfig } from "./config.js";
import type { LogContext, LoggerConfig, LoggingConfig } from "./types.js";
import { createPrettyTransport } from "../formatters/pretty.js";
import { redactSensitive } from "../utils/redaction.js";
import { shouldSample } from "../utils/sampling.js";

type SampledLevel = "trace" | "debug" | "info" | "warn";

/** What a child inherits from its parent instead of building a new pino. */
export type LoggerSource = {
  pinoInstance: PinoLogger;
  config: LoggingConfig;
};

// Frames above the caller: Error, mixin, two pino frames, Logger.write, Logger.<level>.
const CALLER_FRAME = 5;
const FRAME_PATTERN = /at\s+(.+)\s+\((.+):(\d+):(\d+)\)/;

function callerMixin(): object {
  const frame = new Error().stack?.split("\n")[CALLER_FRAME];
  const match = frame ? FRAME_PATTERN.exec(frame) : null;
  if (!match) {
    return {};
  }
  return {
    caller: { function: match[1], file: match[2], line: Number(match[3]) },
  };
}

function buildPino(config: LoggerConfig, settings: LoggingConfig): PinoLogger {
  const {
    service = "receipt-pipeline",
    environment = process.env.NODE_ENV || "development",
    prettyPrint,
    useEnvConfig: _useEnvConfig,
    destination,
    ...pinoOptions
  } = config;

  const options: LoggerOptions = {
    ...pinoOptions,
    level: settings.level,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
      ...pinoOptions.formatters,
    },
    base: { service, environment, pid: process.pid, ...pinoOptions.base },
    mixin: settings.includeCaller ? callerMixin : pinoOptions.mixin,
  };

  if (destination) {
    return pino(options, destination);
  }

  const pretty = prettyPrint ?? settings.format !== "json";
  return pretty
    ? pino({ ...options, transport: createPrettyTransport(settings) })
    : pino(options);
}

/**
 * pino wrapper with redaction and sampling. trace/debug/info/warn honour
 * the sample rate; error and fatal always write.
 */
export class Logger {
  private readonly pinoInstance: PinoLogger;
  private readonly config: LoggingConfig;

  constructor(config: LoggerConfig = {}, source?: LoggerSource) {
    if (source) {
      this.pinoInstance = source.pinoInstance;
      this.config = source.config;
      return;
    }

    const useEnv = config.useEnvConfig ?? true;
    this.config = useEnv ? getLoggingConfig() : getDefaultConfig();
    if (config.level) {
      this.config.level = config.level;
    }
    this.pinoInstance = buildPino(config, this.config);
  }

  child(bindings: LogContext): Logger {
    return new Logger(
      {},
      {
        pinoInstance: this.pinoInstance.child(
          redactSensitive(bindings, this.config),
        ),
        config: this.config,
      },
    );
  }

  trace(message: string, context?: LogContext): void {
    this.write("trace", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.pinoInstance.error(this.attachError(error, context), message);
  }

  fatal(message: string, error?: unknown, context?: LogContext): void {
    this.pinoInstance.fatal(this.attachError(error, context), message);
  }

  isLevelEnabled(level: string): boolean {
    return this.pinoInstance.isLevelEnabled(level);
  }

  /** Live settings; changes apply to this logger and its children. */
  getConfig(): LoggingConfig {
    return this.config;
  }

  private write(
    level: SampledLevel,
    message: string,
    context: LogContext = {},
  ): void {
    if (shouldSample(this.config.sampleRate)) {
      this.pinoInstance[level](redactSensitive(context, this.config), message);
    }
  }

  private attachError(error: unknown, context: LogContext = {}): LogContext {
    const entry = redactSensitive({ ...context }, this.config);
    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      entry.error = error;
    }
    return entry;
  }
}
