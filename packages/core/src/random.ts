import type { RandomSource } from './types.js';

/** RandomSource backed by Math.random. Used when no seed is configured. */
export const mathRandomSource: RandomSource = Object.freeze({
  next: (): number => Math.random(),
});

/**
 * Deterministic PRNG (Mulberry32). String seeds are hashed to a 32-bit state,
 * so `new SeededRandom('demo')` and `new SeededRandom(42)` are both reproducible.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.hashToSeed(seed);
  }

  static hashToSeed(seed: number | string): number {
    let x = typeof seed === 'number' ? Math.floor(seed) : 0;
    if (typeof seed === 'string') {
      for (let i = 0; i < seed.length; i++) {
        x = (x ^ seed.charCodeAt(i)) >>> 0;
        x = (x + 0x9e3779b9 + ((x << 6) >>> 0) + (x >>> 2)) >>> 0;
      }
    }
    if (x === 0) x = 0x6d2b79f5;
    return x >>> 0;
  }

  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Pick one item with probability proportional to its weight, using a single draw.
 *
 * @param items - Candidates, in the order their weights are accumulated.
 * @param weights - Non-negative weights, one per item.
 * @param random - Source of the draw.
 * @returns The selected item.
 * @throws RangeError if the lists differ in length or no weight is positive.
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[], random: RandomSource): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new RangeError(`weightedChoice needs one weight per item (got ${String(items.length)} items, ${String(weights.length)} weights)`);
  }

  let total = 0;
  for (const w of weights) total += w;
  if (!(total > 0)) {
    throw new RangeError('weightedChoice needs at least one positive weight');
  }

  const target = random.next() * total;
  let cumulative = 0;
  let lastPositive = -1;
  for (let i = 0; i < items.length; i++) {
    const w = weights[i];
    if (w <= 0) continue;
    lastPositive = i;
    cumulative += w;
    if (target < cumulative) {
      return items[i];
    }
  }

  // Rounding can leave target a hair above the final cumulative sum.
  return items[lastPositive];
}

/**
 * Pick one item uniformly at random.
 *
 * @param items - Non-empty candidate list.
 * @param random - Source of the draw.
 * @returns The selected item.
 */
export function uniformChoice<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('uniformChoice needs at least one item');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}
