/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Theme selection help text
 */
const THEME_HELP = `Keep only this theme (repeatable).
    Without it every theme tag becomes its own group.
    Example: -t fork -t mateIn2`;

/**
 * Solver color help text
 */
const SOLVER_COLOR_HELP = `Keep only puzzles where this side solves:
    white | black`;

/**
 * OpeningColor tag help text
 */
const OPENING_COLOR_HELP = `Add an OpeningColor tag to every game:
    white | black | both`;

/**
 * Parse an integer option value
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse an integer option that "none" switches off
 */
export function parseIntegerOrNone(value: string): number | null {
  return value.trim().toLowerCase() === 'none' ? null : parseInteger(value);
}

/**
 * Parse a numeric option value
 */
export function parseNumber(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Collect a repeatable option into a list
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tactica')
    .description('Select themed chess puzzles from a puzzle CSV and write them as PGN')
    .version(VERSION);

  program
    .command('generate')
    .description('Select, band and render puzzles, one PGN file per theme')
    .option('-s, --source <file>', 'Puzzle CSV (.csv, .csv.gz or .csv.zst)')
    .option('-o, --out-dir <dir>', 'Directory for per-theme PGN files (default: themes_pgn)')
    .option('--combined <file>', 'Also write every theme into a single PGN file')
    .option('-c, --config <file>', 'Path to config file')
    .option(
      '--min-rating <rating>',
      'Minimum rating, inclusive, or none (default: 600)',
      parseIntegerOrNone,
    )
    .option(
      '--max-rating <rating>',
      'Maximum rating, inclusive, or none (default: 800)',
      parseIntegerOrNone,
    )
    .option(
      '-n, --per-theme <count>',
      'Puzzles kept per theme, 0 or none for all (default: 50)',
      parseIntegerOrNone,
    )
    .option(
      '--limit-total <count>',
      'Cap on puzzles written over all themes, in theme order',
      parseIntegerOrNone,
    )
    .option('--min-plays <count>', 'Minimum number of plays', parseInteger)
    .option('--min-popularity <value>', 'Minimum popularity (-100 to 100)', parseInteger)
    .option(
      '--min-popularity-percentile <percent>',
      'Keep only the most popular share of each theme (0-100)',
      parseNumber,
    )
    .option('-t, --theme <tag>', THEME_HELP, collect, [])
    .option('--solver-color <color>', SOLVER_COLOR_HELP)
    .option('--opening-color <color>', OPENING_COLOR_HELP)
    .option('--event-prefix <text>', 'Text prepended to every Event tag')
    .option(
      '--no-start-after-first-move',
      "Present the position before the opponent's first move",
    )
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--dry-run', 'Select and render without writing any file')
    .option('-q, --quiet', 'Suppress progress and summary output')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { generateCommand } = await import('./commands/generate.js');
      await generateCommand(options);
    });

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function numberOrNoneOption(value: unknown): number | null | undefined {
  return value === null ? null : numberOption(value);
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function listOption(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  result.source = stringOption(options['source']);
  result.outDir = stringOption(options['outDir']);
  result.combined = stringOption(options['combined']);
  result.config = stringOption(options['config']);
  result.minRating = numberOrNoneOption(options['minRating']);
  result.maxRating = numberOrNoneOption(options['maxRating']);
  result.perTheme = numberOrNoneOption(options['perTheme']);
  result.limitTotal = numberOrNoneOption(options['limitTotal']);
  result.minPlays = numberOption(options['minPlays']);
  result.minPopularity = numberOption(options['minPopularity']);
  result.minPopularityPercentile = numberOption(options['minPopularityPercentile']);
  result.themes = listOption(options['theme']);
  result.solverColor = stringOption(options['solverColor']);
  result.openingColor = stringOption(options['openingColor']);
  result.eventPrefix = stringOption(options['eventPrefix']);
  result.showConfig = booleanOption(options['showConfig']);
  result.dryRun = booleanOption(options['dryRun']);
  result.quiet = booleanOption(options['quiet']);
  // Commander.js sets 'color' (negated) to false when --no-color is used
  if (options['color'] === false) result.noColor = true;
  // Only an explicit --no-start-after-first-move overrides the configuration
  if (options['startAfterFirstMove'] === false) result.startAfterFirstMove = false;

  return result;
}
