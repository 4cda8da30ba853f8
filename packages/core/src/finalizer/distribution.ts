/**
 * Distribution Finalizer
 *
 * Turns a sealed theme collection into an ordered, banded list: popularity
 * percentile first, then a rating sort and a 30/40/30 split.
 */

import type { BandedPuzzle, DifficultyBand } from '@tactica/types';

import { ConfigurationError } from '../errors.js';
import { compareQuality, type ScoredRecord } from '../selection/quality.js';
import type { ThemeCollection } from '../selection/theme-collection.js';

/**
 * Share of a theme, in tenths, that goes to each of the outer bands
 */
export const OUTER_BAND_TENTHS = 3;

export type BandCounts = Record<DifficultyBand, number>;

export interface FinalizeOptions {
  /** Keep only entries at or above this popularity percentile (0-100) */
  minPopularityPercentile?: number;
}

/**
 * One theme, ready to render
 */
export interface FinalizedTheme {
  theme: string;
  /** Easy first, each band in ascending rating order */
  puzzles: BandedPuzzle[];
  bandCounts: BandCounts;
  /** Entries removed by the popularity percentile */
  percentileDropped: number;
}

/**
 * Band sizes for a theme of n puzzles
 *
 * Easy and hard get floor(0.3n) each; medium takes the remainder.
 */
export function bandSizes(n: number): BandCounts {
  const outer = Math.floor((n * OUTER_BAND_TENTHS) / 10);
  return { Easy: outer, Medium: n - 2 * outer, Hard: outer };
}

/**
 * Number of entries a percentile threshold keeps out of n
 */
export function percentileKeepCount(n: number, percentile: number): number {
  if (n === 0) return 0;
  if (percentile <= 0) return n;
  return Math.max(1, Math.ceil((n * (100 - percentile)) / 100));
}

/**
 * Keep the most popular entries
 *
 * @returns The kept entries, most popular first (ties by quality)
 */
export function applyPopularityPercentile(
  entries: readonly ScoredRecord[],
  percentile: number,
): ScoredRecord[] {
  if (percentile < 0 || percentile > 100 || Number.isNaN(percentile)) {
    throw new ConfigurationError(
      `minPopularityPercentile must be between 0 and 100, got ${percentile}`,
      'minPopularityPercentile',
    );
  }
  const ranked = [...entries].sort(
    (a, b) => b.record.popularity - a.record.popularity || compareQuality(b, a),
  );
  return ranked.slice(0, percentileKeepCount(ranked.length, percentile));
}

function byRating(a: ScoredRecord, b: ScoredRecord): number {
  if (a.record.rating !== b.record.rating) {
    return a.record.rating - b.record.rating;
  }
  if (a.record.id === b.record.id) return 0;
  return a.record.id < b.record.id ? -1 : 1;
}

/**
 * Sort by rating and label each entry with its band and rank
 */
export function assignBands(theme: string, entries: readonly ScoredRecord[]): BandedPuzzle[] {
  const sorted = [...entries].sort(byRating);
  const sizes = bandSizes(sorted.length);
  const mediumStart = sizes.Easy;
  const hardStart = sizes.Easy + sizes.Medium;

  return sorted.map((entry, index): BandedPuzzle => {
    const band: DifficultyBand =
      index < mediumStart ? 'Easy' : index < hardStart ? 'Medium' : 'Hard';
    return Object.freeze({
      record: entry.record,
      theme,
      band,
      rank: index + 1,
      qualityScore: entry.score,
    });
  });
}

/**
 * Finalize one sealed collection
 *
 * Consumes the collection; finalizing it again throws.
 */
export function finalizeTheme(
  theme: string,
  collection: ThemeCollection,
  options: FinalizeOptions = {},
): FinalizedTheme {
  const retained = collection.consume();
  const kept = applyPopularityPercentile(retained, options.minPopularityPercentile ?? 0);
  const puzzles = assignBands(theme, kept);

  return {
    theme,
    puzzles,
    bandCounts: countBands(puzzles),
    percentileDropped: retained.length - kept.length,
  };
}

/**
 * Keep the first `count` puzzles of a finalized theme, in emitted order
 *
 * Bands and ranks are not reassigned.
 */
export function truncateTheme(finalized: FinalizedTheme, count: number): FinalizedTheme {
  if (count >= finalized.puzzles.length) {
    return finalized;
  }
  const puzzles = finalized.puzzles.slice(0, Math.max(0, count));
  return { ...finalized, puzzles, bandCounts: countBands(puzzles) };
}

function countBands(puzzles: readonly BandedPuzzle[]): BandCounts {
  const counts: BandCounts = { Easy: 0, Medium: 0, Hard: 0 };
  for (const puzzle of puzzles) {
    counts[puzzle.band]++;
  }
  return counts;
}
