/**
 * Record decoder
 *
 * Turns CSV rows into typed puzzle records. A bad row never aborts the
 * stream: it is returned as a failed result for the caller to count and skip.
 */

import type { DecodeFailureReason, PuzzleRecord } from '@tactica/types';

import { splitCsvLine } from '../csv/csv-line.js';
import { DecodeError } from '../errors.js';

import {
  requiredFieldCount,
  resolveColumns,
  type ColumnIndex,
  type PuzzleColumn,
} from './columns.js';

/**
 * Outcome of decoding one row
 */
export type DecodeResult =
  | { ok: true; record: PuzzleRecord; lineNumber: number }
  | { ok: false; error: DecodeError };

const INTEGER_PATTERN = /^[+-]?\d+$/;

const REQUIRED_TEXT_COLUMNS = [
  'PuzzleId',
  'FEN',
  'Rating',
  'RatingDeviation',
  'Popularity',
  'NbPlays',
] as const satisfies readonly PuzzleColumn[];

// Order matters: destructured below
const INTEGER_COLUMNS = [
  'Rating',
  'RatingDeviation',
  'Popularity',
  'NbPlays',
] as const satisfies readonly PuzzleColumn[];

/**
 * Normalize a UCI move token
 *
 * Promotion written as `e7e8=Q` becomes `e7e8q`; everything is lower-cased.
 */
export function normalizeUciMove(token: string): string {
  const move = token.trim();
  if (move.length === 6 && move.charAt(4) === '=') {
    return (move.slice(0, 4) + move.charAt(5)).toLowerCase();
  }
  return move.toLowerCase();
}

/**
 * Split a space-separated list, dropping empty and repeated tokens
 */
function splitTokens(value: string): string[] {
  const seen = new Set<string>();
  for (const token of value.split(/\s+/)) {
    if (token) {
      seen.add(token);
    }
  }
  return [...seen];
}

function fail(reason: DecodeFailureReason, lineNumber: number, detail: string): DecodeResult {
  return { ok: false, error: new DecodeError(reason, lineNumber, detail) };
}

/**
 * Decode the fields of one data row
 *
 * @param fields - Output of splitCsvLine (null for an unbalanced row)
 * @param lineNumber - 1-based line number in the source, for error context
 */
export function decodeRow(
  fields: readonly string[] | null,
  columns: ColumnIndex,
  lineNumber: number,
): DecodeResult {
  if (fields === null) {
    return fail('malformed_row', lineNumber, 'unterminated quoted field');
  }
  const needed = requiredFieldCount(columns);
  if (fields.length < needed) {
    return fail('malformed_row', lineNumber, `expected ${needed} fields, got ${fields.length}`);
  }

  const text = (column: PuzzleColumn): string => (fields[columns[column]] ?? '').trim();

  for (const column of REQUIRED_TEXT_COLUMNS) {
    if (text(column) === '') {
      return fail('missing_field', lineNumber, `missing ${column}`);
    }
  }

  const integers: number[] = [];
  for (const column of INTEGER_COLUMNS) {
    const raw = text(column);
    if (!INTEGER_PATTERN.test(raw)) {
      return fail('invalid_number', lineNumber, `${column} is not an integer: "${raw}"`);
    }
    integers.push(Number.parseInt(raw, 10));
  }
  const [rating = 0, ratingDeviation = 0, popularity = 0, playCount = 0] = integers;

  if (rating < 0) {
    return fail('out_of_range', lineNumber, `negative Rating ${rating}`);
  }
  if (playCount < 0) {
    return fail('out_of_range', lineNumber, `negative NbPlays ${playCount}`);
  }
  if (popularity < -100 || popularity > 100) {
    return fail('out_of_range', lineNumber, `Popularity ${popularity} outside [-100, 100]`);
  }

  const moves = text('Moves')
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map(normalizeUciMove);
  if (moves.length === 0) {
    return fail('empty_moves', lineNumber, 'no solution moves');
  }

  const themes = splitTokens(text('Themes'));
  if (themes.length === 0) {
    return fail('empty_themes', lineNumber, 'no themes');
  }

  const record: PuzzleRecord = Object.freeze({
    id: text('PuzzleId'),
    fen: text('FEN'),
    moves: Object.freeze(moves),
    rating,
    ratingDeviation,
    popularity,
    playCount,
    themes: Object.freeze(themes),
    gameUrl: text('GameUrl'),
    openingTags: Object.freeze(splitTokens(text('OpeningTags'))),
  });

  return { ok: true, record, lineNumber };
}

/**
 * Decode a stream of source lines, header first
 *
 * Blank lines are skipped without being counted. An empty source yields
 * nothing.
 *
 * @throws SourceFormatError if the header lacks required columns
 */
export async function* decodePuzzleLines(
  lines: AsyncIterable<string> | Iterable<string>,
  sourcePath?: string,
): AsyncGenerator<DecodeResult> {
  let columns: ColumnIndex | null = null;
  let lineNumber = 0;

  for await (const rawLine of lines) {
    lineNumber++;
    // Strip a UTF-8 byte order mark on the first line
    const line = lineNumber === 1 ? rawLine.replace(/^\uFEFF/, '') : rawLine;
    if (line.trim() === '') {
      continue;
    }

    if (columns === null) {
      columns = resolveColumns(splitCsvLine(line) ?? [], sourcePath);
      continue;
    }

    yield decodeRow(splitCsvLine(line), columns, lineNumber);
  }
}
