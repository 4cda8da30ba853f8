import { Chess } from 'chess.js';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation, with +/# suffix */
  san: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * A move in UCI form split into its parts
 */
interface UciMove {
  from: string;
  to: string;
  promotion?: string;
}

const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

function parseUci(uci: string): UciMove | null {
  const match = UCI_PATTERN.exec(uci.toLowerCase());
  if (match === null) return null;
  const [, from = '', to = '', promotion] = match;
  return promotion === undefined ? { from, to } : { from, to, promotion };
}

/**
 * A chess position wrapper around chess.js
 *
 * Replays puzzle solutions given in UCI notation and reports each move in
 * SAN.
 */
export class ChessPosition {
  private chess: Chess;

  /**
   * @throws InvalidFenError if the FEN is invalid
   */
  constructor(fen: string) {
    try {
      this.chess = new Chess(fen);
    } catch {
      throw new InvalidFenError(`Invalid FEN: ${fen}`);
    }
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Get whose turn it is
   */
  turn(): 'w' | 'b' {
    return this.chess.turn();
  }

  /**
   * Get the current move number
   */
  moveNumber(): number {
    return this.chess.moveNumber();
  }

  /**
   * Check if a UCI move is legal in the current position
   */
  isLegalUci(uci: string): boolean {
    const parsed = parseUci(uci);
    if (parsed === null) return false;
    return this.chess
      .moves({ verbose: true })
      .some(
        (move) =>
          move.from === parsed.from &&
          move.to === parsed.to &&
          (move.promotion ?? undefined) === parsed.promotion,
      );
  }

  /**
   * Apply a move in UCI notation
   * @param uci - Move in UCI format (e.g., "e2e4", "e7e8q")
   * @throws IllegalMoveError if the move is not legal
   */
  playUci(uci: string): MoveResult {
    const fenBefore = this.chess.fen();
    const parsed = parseUci(uci);
    if (parsed === null || !this.isLegalUci(uci)) {
      throw new IllegalMoveError(uci, fenBefore);
    }

    try {
      const result = this.chess.move(parsed);
      return {
        san: result.san,
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      // chess.js throws Error for invalid moves, wrap in our custom error
      throw new IllegalMoveError(uci, fenBefore);
    }
  }
}
