/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(
    readonly move: string,
    readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * A selected puzzle could not be rendered
 *
 * Recoverable: the puzzle is skipped and counted.
 */
export class RenderError extends Error {
  constructor(
    message: string,
    readonly puzzleId: string,
    /** Index into the solution moves, or null when the start position itself is invalid */
    readonly moveIndex: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RenderError';
  }
}
