export type NormalizedError = {
  error: Error;
  message: string;
};

/**
 * Coerces whatever reached a `catch` into an `Error` plus its message,
 * ready for `logger.error(msg, error, ...)`.
 */
export function normalizeError(thrown: unknown): NormalizedError {
  const error = thrown instanceof Error ? thrown : new Error(String(thrown));
  return { error, message: error.message };
}
