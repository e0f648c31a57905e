export type FieldMap = Readonly<Record<string, string | null | undefined>>;

/**
 * Returns the value of the first key in `keys` that holds a non-empty string,
 * or `fallback` when none does. Keys are consulted in priority order.
 */
export function firstNonEmpty(
  fields: FieldMap,
  keys: readonly string[],
  fallback: string,
): string {
  for (const key of keys) {
    if (!Object.prototype.hasOwnProperty.call(fields, key)) {
      continue;
    }
    const value = fields[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }

  return fallback;
}
