/**
 * @tactica/pgn - Puzzle rendering
 *
 * This package handles:
 * - Replaying UCI solutions on a chess.js position
 * - PGN tag and move text rendering
 * - Theme labels and file names
 */

export const VERSION = '0.1.0';

export {
  renderPgnString as renderPgn,
  renderTag,
  renderMoves,
  wrapMoveText,
  DEFAULT_MAX_LINE_LENGTH,
} from './renderer/pgn-renderer.js';
export type { PgnGame, PgnMove, PgnTag, RenderOptions } from './renderer/pgn-renderer.js';

export { ChessPosition } from './chess/position.js';
export type { MoveResult } from './chess/position.js';

export {
  humanizeTheme,
  withEventPrefix,
  puzzleLabel,
  themeFileName,
} from './puzzle/theme-label.js';
export { renderPuzzle } from './puzzle/puzzle-renderer.js';
export type {
  OpeningColor,
  PuzzleRenderOptions,
  PuzzleArtifact,
  RenderResult,
} from './puzzle/puzzle-renderer.js';

export { InvalidFenError, IllegalMoveError, RenderError } from './errors.js';
