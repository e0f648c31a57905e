import type { LogContext, LoggingConfig } from "../core/types.js";

export const REDACTED = "[REDACTED]";

/** Matched as lower-case substrings of a key. */
const SENSITIVE_KEY_PARTS = [
  "password",
  "passphrase",
  "token",
  "apikey",
  "secret",
  "authorization",
  "cookie",
  "sessionid",
  "creditcard",
  "privatekey",
];

export function isSensitiveField(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lowered.includes(part));
}

function scrubEntries(source: object): LogContext {
  const scrubbed: LogContext = {};
  for (const [key, value] of Object.entries(source)) {
    scrubbed[key] = isSensitiveField(key) ? REDACTED : scrub(value);
  }
  return scrubbed;
}

function scrub(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(scrub);
  }
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    return scrubEntries(value);
  }
  return value;
}

/**
 * Replaces values under sensitive keys at any depth. Returns `context`
 * itself when redaction is switched off.
 */
export function redactSensitive(
  context: LogContext,
  config: LoggingConfig,
): LogContext {
  return config.redactSensitive ? scrubEntries(context) : context;
}
