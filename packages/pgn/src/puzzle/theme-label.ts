/**
 * Human-readable names for theme tags
 */

import type { DifficultyBand } from '@tactica/types';

/**
 * Turn a camelCase theme tag into title-cased words
 *
 * @example
 * humanizeTheme('backRankMate') // 'Back Rank Mate'
 * humanizeTheme('mateIn2') // 'Mate In 2'
 */
export function humanizeTheme(theme: string): string {
  return theme
    .replace(/[_-]+/g, ' ')
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/([a-zA-Z])(\d)/g, '$1 $2')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Prepend an event prefix, separated by a single space
 */
export function withEventPrefix(name: string, eventPrefix?: string): string {
  if (!eventPrefix) {
    return name;
  }
  const separator = eventPrefix.endsWith(' ') ? '' : ' ';
  return `${eventPrefix}${separator}${name}`;
}

/**
 * Label of a banded puzzle, e.g. "Back Rank Mate (Easy)"
 */
export function puzzleLabel(theme: string, band: DifficultyBand, eventPrefix?: string): string {
  return withEventPrefix(`${humanizeTheme(theme) || theme} (${band})`, eventPrefix);
}

/**
 * File name for a theme's PGN file
 *
 * Characters outside word characters, hyphens and spaces become "_".
 */
export function themeFileName(theme: string): string {
  const safe = (humanizeTheme(theme) || theme)
    .replace(/[^\w\- ]+/g, '_')
    .replace(/\s+/g, ' ')
    .trim();
  return `${safe || '_'}.pgn`;
}
