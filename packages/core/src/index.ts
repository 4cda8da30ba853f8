/**
 * @tactica/core - Selection pipeline
 *
 * This package contains:
 * - The filter chain over decoded records
 * - Bounded best-of-L selection per theme
 * - Difficulty banding of each theme's final distribution
 * - The run that ties them together, and its summary
 */

export const VERSION = '0.1.0';

export { ConfigurationError, SelectionStateError } from './errors.js';

export {
  type RecordFilter,
  DEFAULT_CRITERIA,
  validateCriteria,
  solverColorOf,
  candidateThemes,
  createFilterChain,
  composeFilters,
  matches,
} from './filters/filter-chain.js';

export { PriorityQueue } from './selection/priority-queue.js';
export {
  type ScoredRecord,
  DEFAULT_QUALITY_WEIGHTS,
  computeQualityScore,
  compareQuality,
} from './selection/quality.js';
export {
  type OfferOutcome,
  type CollectionState,
  ThemeCollection,
} from './selection/theme-collection.js';
export {
  type ThemeSelectorOptions,
  type SelectorCounters,
  ThemeSelector,
} from './selection/theme-selector.js';

export {
  type BandCounts,
  type FinalizeOptions,
  type FinalizedTheme,
  OUTER_BAND_TENTHS,
  bandSizes,
  percentileKeepCount,
  applyPopularityPercentile,
  assignBands,
  finalizeTheme,
  truncateTheme,
} from './finalizer/distribution.js';

export {
  type RunState,
  type RunProgressCallback,
  type SelectionRunOptions,
  SelectionRun,
} from './pipeline/selection-run.js';

export {
  type RatingStats,
  type PopularityStats,
  type ThemeSummary,
  type TopPuzzle,
  type RunSummary,
  TOP_PUZZLE_COUNT,
  SummaryAccumulator,
} from './summary/summary.js';
