/**
 * Selection configuration and run statistics
 */

import type { SideColor } from '../puzzle/index.js';

/**
 * Theme selection mode: every tag on a record, or an explicit list
 */
export type ThemeSelection = 'all' | readonly string[];

/**
 * Filter criteria applied to every decoded record
 */
export interface SelectionCriteria {
  /** Inclusive lower rating bound */
  minRating?: number;
  /** Inclusive upper rating bound */
  maxRating?: number;
  /** Inclusive lower bound on play count */
  minPlayCount?: number;
  /** Inclusive lower bound on raw popularity */
  minPopularity?: number;
  /** Minimum popularity percentile within a theme (0-100), enforced at finalization */
  minPopularityPercentile?: number;
  themes: ThemeSelection;
  /** Keep only puzzles whose solver plays this color */
  solverColor?: SideColor;
  /** Whether the opponent's first move is played before the puzzle is presented */
  startAfterFirstMove: boolean;
}

/**
 * Weights of the quality score
 */
export interface QualityWeights {
  popularity: number;
  playCount: number;
}

/**
 * Everything the selection pipeline needs for one run
 */
export interface SelectionOptions {
  criteria: SelectionCriteria;
  /** Per-theme capacity; undefined keeps every accepted record */
  perTheme?: number;
  /** Cap on puzzles emitted over all themes, in theme order; undefined for none */
  limitTotal?: number;
  weights: QualityWeights;
}

/**
 * Reasons a source row can fail to decode
 */
export type DecodeFailureReason =
  | 'malformed_row'
  | 'missing_field'
  | 'invalid_number'
  | 'out_of_range'
  | 'empty_moves'
  | 'empty_themes';

/**
 * Counters collected over one run
 */
export interface RunStats {
  /** Non-blank data rows read from the source */
  rowsRead: number;
  /** Rows that failed to decode */
  rowsSkipped: number;
  decodeFailures: Record<DecodeFailureReason, number>;
  /** Decoded records rejected by the filter chain */
  filteredOut: number;
  /** Record-to-theme offers made to the selector */
  offers: number;
  accepted: number;
  evicted: number;
  rejected: number;
  /** Entries removed by the popularity percentile at finalization */
  percentileDropped: number;
  /** Banded puzzles cut by the total limit */
  limitDropped: number;
  /** Themes with at least one accepted record */
  themes: number;
  /** Puzzles emitted by the finalizer */
  selected: number;
  rendered: number;
  renderFailures: number;
}

/**
 * Create a zeroed statistics record
 */
export function createRunStats(): RunStats {
  return {
    rowsRead: 0,
    rowsSkipped: 0,
    decodeFailures: {
      malformed_row: 0,
      missing_field: 0,
      invalid_number: 0,
      out_of_range: 0,
      empty_moves: 0,
      empty_themes: 0,
    },
    filteredOut: 0,
    offers: 0,
    accepted: 0,
    evicted: 0,
    rejected: 0,
    percentileDropped: 0,
    limitDropped: 0,
    themes: 0,
    selected: 0,
    rendered: 0,
    renderFailures: 0,
  };
}
