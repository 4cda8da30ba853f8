/**
 * Record Renderer
 *
 * Replays a banded puzzle on the chess engine and writes it as a PGN game.
 * Failures come back as values so one broken record never stops a run.
 */

import type { BandedPuzzle, SideColor } from '@tactica/types';

import { ChessPosition } from '../chess/position.js';
import { IllegalMoveError, InvalidFenError, RenderError } from '../errors.js';
import {
  renderPgnString,
  type PgnMove,
  type PgnTag,
  DEFAULT_MAX_LINE_LENGTH,
} from '../renderer/pgn-renderer.js';

import { puzzleLabel } from './theme-label.js';

/**
 * Value of the OpeningColor hint tag
 */
export type OpeningColor = 'white' | 'black' | 'both';

export interface PuzzleRenderOptions {
  /** Play the opponent's first move before presenting (default: true) */
  startAfterFirstMove?: boolean;
  /** Prepended to the Event tag */
  eventPrefix?: string;
  /** Site tag (default: "?") */
  site?: string;
  /** Date tag in PGN form (default: "????.??.??") */
  date?: string;
  openingColor?: OpeningColor;
  /** Move text line limit (default: 80, 0 disables wrapping) */
  maxLineLength?: number;
}

/**
 * A rendered puzzle
 */
export interface PuzzleArtifact {
  puzzle: BandedPuzzle;
  /** Event tag value */
  label: string;
  /** Position the solver is presented with */
  fen: string;
  solver: SideColor;
  /** Moves from the presented position, in SAN */
  sanMoves: string[];
  /** Complete PGN game, without a trailing newline */
  pgn: string;
}

export type RenderResult =
  | { ok: true; artifact: PuzzleArtifact }
  | { ok: false; error: RenderError };

function colorOf(turn: 'w' | 'b'): SideColor {
  return turn === 'w' ? 'white' : 'black';
}

/**
 * Render one puzzle
 *
 * Never throws for bad puzzle data: an invalid FEN or an illegal move
 * yields a RenderError with the puzzle id and move index.
 */
export function renderPuzzle(
  puzzle: BandedPuzzle,
  options: PuzzleRenderOptions = {},
): RenderResult {
  const { record } = puzzle;
  const startAfterFirstMove = options.startAfterFirstMove ?? true;

  let position: ChessPosition;
  try {
    position = ChessPosition.fromFen(record.fen);
  } catch (error) {
    if (error instanceof InvalidFenError) {
      return {
        ok: false,
        error: new RenderError(`Puzzle ${record.id}: ${error.message}`, record.id, null, {
          cause: error,
        }),
      };
    }
    throw error;
  }

  const skipped = startAfterFirstMove ? 1 : 0;
  const moves: PgnMove[] = [];
  let fen = position.fen();
  let solver = colorOf(position.turn());

  for (const [index, uci] of record.moves.entries()) {
    const isWhiteMove = position.turn() === 'w';
    const moveNumber = position.moveNumber();
    try {
      const { san, fenAfter } = position.playUci(uci);
      if (index < skipped) {
        fen = fenAfter;
        solver = colorOf(position.turn());
      } else {
        moves.push({ moveNumber, san, isWhiteMove });
      }
    } catch (error) {
      if (error instanceof IllegalMoveError) {
        return {
          ok: false,
          error: new RenderError(
            `Puzzle ${record.id}: illegal move ${uci} at index ${index}`,
            record.id,
            index,
            { cause: error },
          ),
        };
      }
      throw error;
    }
  }

  if (moves.length === 0) {
    return {
      ok: false,
      error: new RenderError(
        `Puzzle ${record.id}: no moves left to solve`,
        record.id,
        record.moves.length,
      ),
    };
  }

  const label = puzzleLabel(puzzle.theme, puzzle.band, options.eventPrefix);
  const tags: PgnTag[] = [
    { name: 'Event', value: label },
    { name: 'Site', value: options.site ?? '?' },
    { name: 'Date', value: options.date ?? '????.??.??' },
    { name: 'Round', value: String(puzzle.rank) },
    { name: 'White', value: solver === 'white' ? 'You' : 'Opponent' },
    { name: 'Black', value: solver === 'black' ? 'You' : 'Opponent' },
    { name: 'Result', value: '*' },
    { name: 'SetUp', value: '1' },
    { name: 'FEN', value: fen },
    { name: 'PuzzleId', value: record.id },
    { name: 'Rating', value: String(record.rating) },
    { name: 'Difficulty', value: puzzle.band },
    { name: 'Themes', value: record.themes.join(' ') },
  ];
  if (record.gameUrl) {
    tags.push({ name: 'GameUrl', value: record.gameUrl });
  }
  if (options.openingColor !== undefined) {
    tags.push({ name: 'OpeningColor', value: options.openingColor });
  }

  const pgn = renderPgnString(
    { tags, moves, result: '*' },
    { maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH },
  );

  return {
    ok: true,
    artifact: {
      puzzle,
      label,
      fen,
      solver,
      sanMoves: moves.map((move) => move.san),
      pgn,
    },
  };
}
