// Small numeric helpers shared by the stages, the market and the aggregator

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** FNV-1a over UTF-16 code units. Stable across platforms. */
export function hashString(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Timestamp of a step on the simulated clock.
 * @param startTime - ISO-8601 start of day 1, step 0
 */
export function stepTimestamp(startTime: string, stepIndex: number, stepMinutes: number): string {
  return new Date(Date.parse(startTime) + stepIndex * stepMinutes * 60_000).toISOString();
}
