/**
 * Success-or-failure value returned by every fallible pipeline step.
 * Steps never throw below the process boundary; they hand back one of these.
 */
export type Ok<T> = { readonly kind: "ok"; readonly value: T };
export type Err<E> = { readonly kind: "err"; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ kind: "ok", value });

export const err = <E>(error: E): Err<E> => ({ kind: "err", error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> =>
  result.kind === "ok";

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> =>
  result.kind === "err";

export const map = <T, U, E>(
  result: Result<T, E>,
  transform: (value: T) => U,
): Result<U, E> => (isOk(result) ? ok(transform(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  next: (value: T) => Result<U, E>,
): Result<U, E> => (isOk(result) ? next(result.value) : result);

/**
 * Runs `fn`, turning anything it throws into an Err via `toError`.
 */
export const tryCatch = <T, E>(
  fn: () => T,
  toError: (thrown: unknown) => E,
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (thrown) {
    return err(toError(thrown));
  }
};

/**
 * Extracts the value, throwing the held error otherwise.
 * Reserved for process boundaries such as the Lambda handler.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error instanceof Error
    ? result.error
    : new Error(`Attempted to unwrap an Err: ${String(result.error)}`);
};
