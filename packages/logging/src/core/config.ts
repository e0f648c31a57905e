import type { LogFormat, LoggingConfig } from "./types.js";
import { parseSampleRate } from "../utils/sampling.js";

const DEFAULTS: LoggingConfig = {
  level: "info",
  format: "json",
  redactSensitive: true,
  includeCaller: false,
  colorize: true,
  singleLine: false,
  translateTime: "SYS:standard",
  sampleRate: 1,
};

const isLogFormat = (value: string | undefined): value is LogFormat =>
  value === "json" || value === "pretty" || value === "compact";

export function getDefaultConfig(): LoggingConfig {
  return { ...DEFAULTS };
}

/**
 * Boolean switches are opt-out (`"false"`) or opt-in (`"true"`) depending on
 * their default. Output is pretty while `NODE_ENV` is unset or `development`,
 * except inside the Lambda runtime, which never sets `NODE_ENV`.
 */
export function getLoggingConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoggingConfig {
  const onLambda = Boolean(
    env.AWS_LAMBDA_FUNCTION_NAME || env.AWS_EXECUTION_ENV,
  );
  const local =
    !onLambda &&
    (env.NODE_ENV === undefined || env.NODE_ENV === "development");
  const format = env.LOGGING_OUTPUT_FORMAT;

  return {
    level: env.LOG_LEVEL || DEFAULTS.level,
    format: isLogFormat(format) ? format : local ? "pretty" : "json",
    redactSensitive: env.LOGGING_REDACT_SENSITIVE !== "false",
    includeCaller: env.LOGGING_INCLUDE_CALLER === "true",
    colorize: env.LOGGING_COLOR !== "false",
    singleLine: env.LOGGING_SINGLE_LINE === "true",
    translateTime: env.LOGGING_TRANSLATE_TIME || DEFAULTS.translateTime,
    sampleRate: parseSampleRate(env.LOGGING_SAMPLE_RATE),
  };
}
