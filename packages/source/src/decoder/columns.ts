import { SourceFormatError } from '../errors.js';

/**
 * Columns every puzzle source must provide
 */
export const PUZZLE_COLUMNS = [
  'PuzzleId',
  'FEN',
  'Moves',
  'Rating',
  'RatingDeviation',
  'Popularity',
  'NbPlays',
  'Themes',
  'GameUrl',
  'OpeningTags',
] as const;

export type PuzzleColumn = (typeof PUZZLE_COLUMNS)[number];

/**
 * Field position of each required column
 */
export type ColumnIndex = Readonly<Record<PuzzleColumn, number>>;

/**
 * Map the header row to column positions
 *
 * Extra columns are ignored; their order does not matter.
 * @throws SourceFormatError if any required column is missing
 */
export function resolveColumns(header: readonly string[], sourcePath?: string): ColumnIndex {
  const names = header.map((name) => name.trim());
  const missing = PUZZLE_COLUMNS.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    throw new SourceFormatError(missing, sourcePath);
  }

  const at = (column: PuzzleColumn): number => names.indexOf(column);
  return {
    PuzzleId: at('PuzzleId'),
    FEN: at('FEN'),
    Moves: at('Moves'),
    Rating: at('Rating'),
    RatingDeviation: at('RatingDeviation'),
    Popularity: at('Popularity'),
    NbPlays: at('NbPlays'),
    Themes: at('Themes'),
    GameUrl: at('GameUrl'),
    OpeningTags: at('OpeningTags'),
  };
}

/**
 * Number of fields a row needs to reach every required column
 */
export function requiredFieldCount(columns: ColumnIndex): number {
  return Math.max(...Object.values(columns)) + 1;
}
