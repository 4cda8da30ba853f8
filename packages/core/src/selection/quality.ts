/**
 * Quality score used to rank puzzles within a theme
 */

import type { PuzzleRecord, QualityWeights } from '@tactica/types';

/**
 * A record paired with its quality score
 */
export interface ScoredRecord {
  readonly record: PuzzleRecord;
  readonly score: number;
}

/**
 * Default weights: popularity points, plus ten per decade of plays
 */
export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  popularity: 1,
  playCount: 10,
};

/**
 * Weighted combination of popularity and (log-scaled) play count
 */
export function computeQualityScore(
  record: PuzzleRecord,
  weights: QualityWeights = DEFAULT_QUALITY_WEIGHTS,
): number {
  return (
    weights.popularity * record.popularity +
    weights.playCount * Math.log10(Math.max(1, record.playCount))
  );
}

/**
 * Total order on scored records
 *
 * @returns positive if a is better than b, negative if worse. Equal scores
 *   fall back to the id: the lexicographically smaller id is better.
 */
export function compareQuality(a: ScoredRecord, b: ScoredRecord): number {
  if (a.score !== b.score) {
    return a.score > b.score ? 1 : -1;
  }
  if (a.record.id === b.record.id) {
    return 0;
  }
  return a.record.id < b.record.id ? 1 : -1;
}
