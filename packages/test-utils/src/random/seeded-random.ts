/**
 * Seeded pseudo-random data for property tests
 *
 * mulberry32: small, fast and reproducible across runs.
 */

import type { PuzzleRecord } from '@tactica/types';

import { aPuzzle } from '../builders/puzzle-builder.js';

/**
 * A generator of floats in [0, 1)
 */
export type RandomSource = () => number;

export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[randomInt(random, 0, items.length - 1)];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffled<T>(random: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i);
    const a = result[i];
    const b = result[j];
    if (a !== undefined && b !== undefined) {
      result[i] = b;
      result[j] = a;
    }
  }
  return result;
}

export interface RandomPuzzleOptions {
  /** Theme pool; each puzzle gets a non-empty subset (default: fork, pin, mate, skewer) */
  themes?: readonly string[];
  minRating?: number;
  maxRating?: number;
}

const DEFAULT_THEME_POOL = ['fork', 'pin', 'mate', 'skewer'];

// Coarse values so that equal scores and equal ratings come up often
const POPULARITY_STEPS = [-20, 0, 40, 60, 80, 100];
const PLAY_COUNTS = [0, 1, 10, 100, 1000];

/**
 * Puzzles with unique ids r000.., in shuffled stream order
 */
export function randomPuzzles(
  random: RandomSource,
  count: number,
  options: RandomPuzzleOptions = {},
): PuzzleRecord[] {
  const pool = options.themes ?? DEFAULT_THEME_POOL;
  const minRating = options.minRating ?? 600;
  const maxRating = options.maxRating ?? 800;

  const puzzles = Array.from({ length: count }, (_, i) => {
    const themes = pool.filter(() => random() < 0.5);
    return aPuzzle(`r${String(i).padStart(3, '0')}`)
      .withRating(minRating + 25 * randomInt(random, 0, Math.floor((maxRating - minRating) / 25)))
      .withPopularity(pickOne(random, POPULARITY_STEPS))
      .withPlayCount(pickOne(random, PLAY_COUNTS))
      .withThemes(...(themes.length > 0 ? themes : [pickOne(random, pool)]))
      .build();
  });
  return shuffled(random, puzzles);
}
