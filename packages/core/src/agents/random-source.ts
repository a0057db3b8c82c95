import seedrandom from 'seedrandom';

/**
 * Source of uniform draws in [0, 1). Every probabilistic decision goes through one,
 * so a seeded source makes a whole debate reproducible.
 */
export interface RandomSource {
  next(): number;
}

export const DEFAULT_RANDOM: RandomSource = { next: () => Math.random() };

export function createSeededRandom(seed: string | number): RandomSource {
  const rng = seedrandom(String(seed));
  return { next: () => rng() };
}

/**
 * Uniform choice from a non-empty list.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

/** A candidate and its relative weight; non-positive weights are never chosen. */
export type Weighted<T> = readonly [T, number];

/**
 * Weighted choice. Weights need not sum to one.
 */
export function weightedPick<T>(random: RandomSource, entries: readonly Weighted<T>[]): T {
  const candidates = entries.filter(([, weight]) => weight > 0);
  const total = candidates.reduce((sum, [, weight]) => sum + weight, 0);
  if (candidates.length === 0 || total <= 0) {
    throw new RangeError('Weighted choice needs at least one positive weight');
  }
  const target = random.next() * total;
  let cumulative = 0;
  for (const [value, weight] of candidates) {
    cumulative += weight;
    if (target < cumulative) return value;
  }
  return candidates[candidates.length - 1][0];
}
