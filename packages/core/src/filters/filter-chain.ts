/**
 * Filter chain
 *
 * Stateless predicates over decoded records. The popularity percentile is
 * not checked here: it needs the whole theme population and is applied by
 * the distribution finalizer.
 */

import type { PuzzleRecord, SelectionCriteria, SideColor } from '@tactica/types';

import { ConfigurationError } from '../errors.js';

/**
 * A named predicate over a record
 */
export interface RecordFilter {
  name: string;
  test: (record: PuzzleRecord) => boolean;
}

/**
 * Criteria that keep everything
 */
export const DEFAULT_CRITERIA: SelectionCriteria = {
  themes: 'all',
  startAfterFirstMove: true,
};

function isNonNegativeInteger(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value >= 0);
}

/**
 * Validate criteria and capacity before a run starts
 *
 * Absolute and percentile popularity thresholds are independent: both
 * apply when both are set.
 * @throws ConfigurationError on the first invalid setting
 */
export function validateCriteria(
  criteria: SelectionCriteria,
  perTheme?: number,
  limitTotal?: number,
): void {
  const { minRating, maxRating, minPlayCount, minPopularity, minPopularityPercentile } = criteria;

  if (!isNonNegativeInteger(minRating)) {
    throw new ConfigurationError('minRating must be a non-negative integer', 'minRating');
  }
  if (!isNonNegativeInteger(maxRating)) {
    throw new ConfigurationError('maxRating must be a non-negative integer', 'maxRating');
  }
  if (minRating !== undefined && maxRating !== undefined && minRating > maxRating) {
    throw new ConfigurationError(
      `minRating (${minRating}) must not exceed maxRating (${maxRating})`,
      'minRating',
    );
  }
  if (!isNonNegativeInteger(minPlayCount)) {
    throw new ConfigurationError('minPlayCount must be a non-negative integer', 'minPlayCount');
  }
  if (minPopularity !== undefined && (minPopularity < -100 || minPopularity > 100)) {
    throw new ConfigurationError('minPopularity must be within [-100, 100]', 'minPopularity');
  }
  if (
    minPopularityPercentile !== undefined &&
    (minPopularityPercentile < 0 || minPopularityPercentile > 100)
  ) {
    throw new ConfigurationError(
      'minPopularityPercentile must be within [0, 100]',
      'minPopularityPercentile',
    );
  }
  if (criteria.themes !== 'all' && criteria.themes.length === 0) {
    throw new ConfigurationError('themes must be "all" or a non-empty list', 'themes');
  }
  if (perTheme !== undefined && (!Number.isInteger(perTheme) || perTheme < 1)) {
    throw new ConfigurationError('perTheme must be a positive integer', 'perTheme');
  }
  if (!isNonNegativeInteger(limitTotal)) {
    throw new ConfigurationError('limitTotal must be a non-negative integer', 'limitTotal');
  }
}

/**
 * Color of the side that solves the puzzle
 *
 * The side to move in the FEN plays the opponent's first move; when that
 * move is applied before presenting, the solver is the other side.
 * @returns null when the FEN has no readable active color
 */
export function solverColorOf(
  record: PuzzleRecord,
  startAfterFirstMove: boolean,
): SideColor | null {
  const active = record.fen.split(/\s+/)[1];
  if (active !== 'w' && active !== 'b') {
    return null;
  }
  const toMove: SideColor = active === 'w' ? 'white' : 'black';
  if (startAfterFirstMove && record.moves.length > 0) {
    return toMove === 'white' ? 'black' : 'white';
  }
  return toMove;
}

/**
 * Themes of a record that are group keys under the criteria
 */
export function candidateThemes(record: PuzzleRecord, criteria: SelectionCriteria): string[] {
  const { themes } = criteria;
  if (themes === 'all') {
    return [...record.themes];
  }
  return record.themes.filter((theme) => themes.includes(theme));
}

/**
 * Build the ordered list of filters for the criteria
 *
 * Only configured bounds produce a filter; theme membership is always last.
 */
export function createFilterChain(criteria: SelectionCriteria): RecordFilter[] {
  const filters: RecordFilter[] = [];
  const { minRating, maxRating, minPlayCount, minPopularity, solverColor } = criteria;

  if (minRating !== undefined) {
    filters.push({ name: 'minRating', test: (record) => record.rating >= minRating });
  }
  if (maxRating !== undefined) {
    filters.push({ name: 'maxRating', test: (record) => record.rating <= maxRating });
  }
  if (minPlayCount !== undefined) {
    filters.push({ name: 'minPlayCount', test: (record) => record.playCount >= minPlayCount });
  }
  if (minPopularity !== undefined) {
    filters.push({ name: 'minPopularity', test: (record) => record.popularity >= minPopularity });
  }
  if (solverColor !== undefined) {
    filters.push({
      name: 'solverColor',
      test: (record) => solverColorOf(record, criteria.startAfterFirstMove) === solverColor,
    });
  }
  filters.push({
    name: 'themes',
    test: (record) => candidateThemes(record, criteria).length > 0,
  });

  return filters;
}

/**
 * Combine filters into a single predicate (all must pass)
 */
export function composeFilters(...filters: RecordFilter[]): (record: PuzzleRecord) => boolean {
  return (record) => filters.every((filter) => filter.test(record));
}

/**
 * Check a record against the criteria
 */
export function matches(record: PuzzleRecord, criteria: SelectionCriteria): boolean {
  return composeFilters(...createFilterChain(criteria))(record);
}
