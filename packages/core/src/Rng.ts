/**
 * Seeded pseudo-random streams.
 *
 * Every random draw in a run comes from an `Rng` whose seed is derived from
 * the run seed plus the identity of the consumer (agent id and step, market
 * step, persona generation). Math.random() is never used by the engine.
 *
 * Algorithm: Mulberry32.
 */

export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1). Advances internal state. */
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Float in [min, max). */
  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Integer in [0, maxExclusive). */
  int(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.int(items.length)];
    if (item === undefined) throw new Error('[Rng] pick() from an empty list');
    return item;
  }

  /** Picks a key with probability proportional to its weight. */
  weighted<K>(entries: ReadonlyArray<readonly [K, number]>): K {
    const total = entries.reduce((s, [, w]) => s + w, 0);
    let roll = this.next() * total;
    for (const [key, w] of entries) {
      roll -= w;
      if (roll < 0) return key;
    }
    const last = entries[entries.length - 1];
    if (!last) throw new Error('[Rng] weighted() with no entries');
    return last[0];
  }

  /**
   * First `k` elements of a Fisher-Yates shuffle of a copy of `items`.
   * Only k swaps are made.
   */
  sample<T>(items: readonly T[], k: number): T[] {
    const pool = [...items];
    const n = Math.min(k, pool.length);
    for (let i = 0; i < n; i++) {
      const j = i + this.int(pool.length - i);
      const a = pool[i];
      const b = pool[j];
      if (a === undefined || b === undefined) break;
      pool[i] = b;
      pool[j] = a;
    }
    return pool.slice(0, n);
  }
}

/**
 * Mix integers into one 32-bit seed (murmur3 finalizer per part).
 * Parts beyond 32 bits contribute their high word too.
 */
export function deriveSeed(...parts: number[]): number {
  let h = 0x9e3779b9;
  for (const part of parts) {
    const hi = Math.floor(part / 4294967296);
    for (const word of [part | 0, hi | 0]) {
      h ^= word;
      h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
      h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
      h ^= h >>> 16;
    }
  }
  return h >>> 0;
}

/** Stream labels, so that different consumers never share a sequence. */
export const STREAM = {
  agent: 1,
  market: 2,
  personas: 3,
  content: 4,
} as const;
