/**
 * Configuration schema types for the tactica CLI
 */

import type { SideColor } from '@tactica/types';

/**
 * Value of the OpeningColor hint tag
 */
export type OpeningColorTag = 'white' | 'black' | 'both';

/**
 * Source configuration
 */
export interface SourceConfigSchema {
  /** Puzzle CSV (.csv, .csv.gz or .csv.zst); required to run */
  path?: string;
}

/**
 * Selection configuration
 *
 * Bounds and limits set to null are explicitly off and override any lower
 * configuration layer.
 */
export interface SelectionConfigSchema {
  /** Inclusive lower rating bound */
  minRating?: number | null;
  /** Inclusive upper rating bound */
  maxRating?: number | null;
  /** Minimum number of plays */
  minPlayCount?: number;
  /** Minimum raw popularity (-100 to 100) */
  minPopularity?: number;
  /** Minimum popularity percentile within each theme (0-100) */
  minPopularityPercentile: number;
  /** "all" or the themes to keep */
  themes: 'all' | string[];
  /** Keep only puzzles solved by this side */
  solverColor?: SideColor;
  /** Puzzles kept per theme; null keeps every match */
  perTheme?: number | null;
  /** Play the opponent's first move before presenting the puzzle */
  startAfterFirstMove: boolean;
}

/**
 * Quality score weights
 */
export interface QualityConfigSchema {
  popularityWeight: number;
  playCountWeight: number;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Directory receiving one PGN file per theme */
  directory: string;
  /** Optional single PGN holding every theme */
  combinedFile?: string;
  /** Cap on puzzles written over all themes, in theme order; null for none */
  limitTotal?: number | null;
  /** Prepended to each Event tag */
  eventPrefix?: string;
  /** Adds an OpeningColor tag to every game */
  openingColor?: OpeningColorTag;
  /** Site tag of every game */
  site: string;
  /** Move text line limit, 0 disables wrapping */
  maxLineLength: number;
}

/**
 * Complete tactica configuration
 */
export interface TacticaConfig {
  source: SourceConfigSchema;
  selection: SelectionConfigSchema;
  quality: QualityConfigSchema;
  output: OutputConfigSchema;
}

/**
 * A configuration layer (file, environment or command line)
 */
export interface PartialTacticaConfig {
  source?: Partial<SourceConfigSchema>;
  selection?: Partial<SelectionConfigSchema>;
  quality?: Partial<QualityConfigSchema>;
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options from command line arguments
 *
 * Enumerated values stay strings here; they are checked when the
 * configuration is validated.
 */
export interface CliOptions {
  /** Puzzle source path */
  source?: string;
  /** Per-theme output directory */
  outDir?: string;
  /** Combined PGN path */
  combined?: string;
  /** Path to config file */
  config?: string;
  /** null for --min-rating none */
  minRating?: number | null;
  maxRating?: number | null;
  /** null for --per-theme none (or 0) */
  perTheme?: number | null;
  limitTotal?: number | null;
  minPlays?: number;
  minPopularity?: number;
  minPopularityPercentile?: number;
  /** Themes to keep (repeatable flag) */
  themes?: string[];
  solverColor?: string;
  openingColor?: string;
  eventPrefix?: string;
  /** false when --no-start-after-first-move is given */
  startAfterFirstMove?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Validate configuration and source without writing output */
  dryRun?: boolean;
  /** Suppress progress output */
  quiet?: boolean;
}
