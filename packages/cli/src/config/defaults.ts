/**
 * Default configuration values
 */

import type {
  OutputConfigSchema,
  QualityConfigSchema,
  SelectionConfigSchema,
  SourceConfigSchema,
  TacticaConfig,
} from './schema.js';

/**
 * Default source configuration (no path: must be given)
 */
export const DEFAULT_SOURCE_CONFIG: SourceConfigSchema = {};

/**
 * Default selection: beginner range, 50 puzzles per theme
 */
export const DEFAULT_SELECTION_CONFIG: SelectionConfigSchema = {
  minRating: 600,
  maxRating: 800,
  minPopularityPercentile: 0,
  themes: 'all',
  perTheme: 50,
  startAfterFirstMove: true,
};

export const DEFAULT_QUALITY_CONFIG: QualityConfigSchema = {
  popularityWeight: 1,
  playCountWeight: 10,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  directory: 'themes_pgn',
  site: '?',
  maxLineLength: 80,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: TacticaConfig = {
  source: DEFAULT_SOURCE_CONFIG,
  selection: DEFAULT_SELECTION_CONFIG,
  quality: DEFAULT_QUALITY_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
