import type { ISODateString, UUID } from "./common.js";

const UUID_V4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const isUUID = (value: unknown): value is UUID =>
  typeof value === "string" && UUID_V4.test(value);

export const isISODateString = (value: unknown): value is ISODateString => {
  if (typeof value !== "string") {
    return false;
  }
  const parsed = new Date(value);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString() === value;
};

export function asISODateString(value: string): ISODateString {
  if (!isISODateString(value)) {
    throw new Error(`Invalid ISO date string: ${value}`);
  }
  return value;
}
