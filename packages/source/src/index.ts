/**
 * @tactica/source - Puzzle source reading and decoding for Tactica
 *
 * This package provides:
 * - Line streaming for plain, gzip and zstandard CSV sources
 * - CSV line splitting
 * - The record decoder (rows to typed puzzle records)
 */

export const VERSION = '0.1.0';

export { splitCsvLine } from './csv/csv-line.js';

export {
  PUZZLE_COLUMNS,
  resolveColumns,
  requiredFieldCount,
  type ColumnIndex,
  type PuzzleColumn,
} from './decoder/columns.js';

export {
  decodeRow,
  decodePuzzleLines,
  normalizeUciMove,
  type DecodeResult,
} from './decoder/record-decoder.js';

export {
  openPuzzleLines,
  detectCompression,
  type SourceCompression,
} from './readers/line-reader.js';

export {
  PuzzleSourceError,
  SourceReadError,
  SourceNotFoundError,
  SourceFormatError,
  DecodeError,
  type SourceStage,
} from './errors.js';
