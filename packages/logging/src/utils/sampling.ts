/**
 * Rates at or above 1 keep everything; at or below 0, nothing.
 */
export function shouldSample(sampleRate: number): boolean {
  if (sampleRate >= 1) return true;
  if (sampleRate <= 0) return false;
  return Math.random() < sampleRate;
}

/** Unset or non-numeric input means 1. */
export function parseSampleRate(value?: string): number {
  const rate = value ? Number.parseFloat(value) : Number.NaN;
  return Number.isNaN(rate) ? 1 : Math.min(1, Math.max(0, rate));
}
