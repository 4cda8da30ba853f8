/**
 * Error classes for reading and decoding the puzzle source
 */

import type { DecodeFailureReason } from '@tactica/types';

/**
 * Base error class for puzzle source errors
 */
export class PuzzleSourceError extends Error {
  constructor(
    message: string,
    public readonly sourcePath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PuzzleSourceError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PuzzleSourceError);
    }
  }
}

/**
 * Stage of the source reader at which a fatal error happened
 */
export type SourceStage = 'open' | 'header' | 'read' | 'decompress';

/**
 * Fatal error: the source cannot be read any further
 */
export class SourceReadError extends PuzzleSourceError {
  constructor(
    message: string,
    sourcePath: string | undefined,
    public readonly stage: SourceStage,
    cause?: unknown,
  ) {
    super(message, sourcePath, cause === undefined ? undefined : { cause });
    this.name = 'SourceReadError';
  }
}

/**
 * Error thrown when the source file does not exist
 */
export class SourceNotFoundError extends SourceReadError {
  constructor(sourcePath: string) {
    super(`Puzzle source not found: ${sourcePath}`, sourcePath, 'open');
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Error thrown when the header row lacks required columns
 */
export class SourceFormatError extends SourceReadError {
  constructor(
    public readonly missingColumns: readonly string[],
    sourcePath?: string,
  ) {
    super(`Source is missing required columns: ${missingColumns.join(', ')}`, sourcePath, 'header');
    this.name = 'SourceFormatError';
  }
}

/**
 * Recoverable error for a single row that could not be decoded
 */
export class DecodeError extends PuzzleSourceError {
  constructor(
    public readonly reason: DecodeFailureReason,
    public readonly lineNumber: number,
    detail: string,
  ) {
    super(`Line ${lineNumber}: ${detail}`);
    this.name = 'DecodeError';
  }
}
