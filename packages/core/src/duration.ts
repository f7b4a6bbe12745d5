/**
 * @module duration
 * Parse human durations such as `"500ms"`, `"5s"`, `"2m"`, `"24h"`, `"7d"`.
 */

const MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/**
 * Convert a duration string to milliseconds. Plain integers are milliseconds.
 * @throws Error on an unrecognised format
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/);
  const amount = match?.[1];
  const unit = match?.[2];
  const multiplier = unit !== undefined ? MULTIPLIERS[unit] : undefined;
  if (amount === undefined || multiplier === undefined) {
    throw new Error(`Invalid duration: "${value}". Expected format like "500ms", "5s", "2m", "24h", "7d"`);
  }

  return Math.round(parseFloat(amount) * multiplier);
}
