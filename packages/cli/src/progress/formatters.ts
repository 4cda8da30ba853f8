/**
 * Output formatting utilities
 */

import { DIFFICULTY_BANDS, type DifficultyBand } from '@tactica/types';

import type { TacticaConfig } from '../config/schema.js';

import { createColorFns } from './colors.js';
import type { ColorFunctions } from './types.js';

function orAny(value: number | null | undefined): string {
  return value === undefined || value === null ? 'any' : String(value);
}

/**
 * Format configuration for display
 *
 * @param c - Color functions, usually the reporter's (default: colored)
 */
export function formatConfigDisplay(
  config: TacticaConfig,
  c: ColorFunctions = createColorFns(true),
): string {
  const { source, selection, quality, output } = config;
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Source:'));
  lines.push(`  Path: ${source.path ?? c.yellow('not set')}`);
  lines.push('');

  lines.push(c.dim('Selection:'));
  lines.push(`  Rating: ${orAny(selection.minRating)} - ${orAny(selection.maxRating)}`);
  lines.push(`  Per theme: ${selection.perTheme ?? 'unlimited'}`);
  lines.push(`  Themes: ${selection.themes === 'all' ? 'all' : selection.themes.join(', ')}`);
  if (selection.minPlayCount !== undefined) {
    lines.push(`  Min plays: ${selection.minPlayCount}`);
  }
  if (selection.minPopularity !== undefined) {
    lines.push(`  Min popularity: ${selection.minPopularity}`);
  }
  if (selection.minPopularityPercentile > 0) {
    lines.push(`  Min popularity percentile: ${selection.minPopularityPercentile}`);
  }
  if (selection.solverColor !== undefined) {
    lines.push(`  Solver color: ${selection.solverColor}`);
  }
  lines.push(`  Start after first move: ${selection.startAfterFirstMove ? 'yes' : 'no'}`);
  lines.push('');

  lines.push(c.dim('Quality:'));
  lines.push(`  Popularity weight: ${quality.popularityWeight}`);
  lines.push(`  Play count weight: ${quality.playCountWeight}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Directory: ${output.directory}`);
  if (output.combinedFile) {
    lines.push(`  Combined file: ${output.combinedFile}`);
  }
  if (output.limitTotal !== undefined && output.limitTotal !== null) {
    lines.push(`  Total limit: ${output.limitTotal}`);
  }
  if (output.eventPrefix) {
    lines.push(`  Event prefix: ${output.eventPrefix}`);
  }
  if (output.openingColor) {
    lines.push(`  OpeningColor tag: ${output.openingColor}`);
  }

  return lines.join('\n');
}

/**
 * Format band counts, easiest first
 */
export function formatBandCounts(counts: Readonly<Record<DifficultyBand, number>>): string {
  return DIFFICULTY_BANDS.map((band) => `${band} ${counts[band]}`).join(', ');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a count with thousands separators
 */
export function formatCount(count: number): string {
  return count.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Format a number with one decimal
 */
export function formatDecimal(value: number): string {
  return value.toFixed(1);
}
