import type { LoggerOptions } from "pino";
import type { LoggingConfig } from "../core/types.js";

type Transport = NonNullable<LoggerOptions["transport"]>;

/**
 * pino-pretty transport. Compact mode prefixes each line with service and module.
 */
export function createPrettyTransport(config: LoggingConfig): Transport {
  const compact = config.format === "compact";

  return {
    target: "pino-pretty",
    options: {
      colorize: config.colorize,
      translateTime: config.translateTime,
      ignore: "pid,hostname",
      singleLine: compact || config.singleLine,
      messageFormat: compact ? "{service} | {module} | {msg}" : "{msg}",
      errorLikeObjectKeys: ["err", "error"],
    },
  };
}
