/**
 * Puzzle record types
 *
 * The decoded form of one row of the puzzle corpus.
 */

/**
 * Side to move
 */
export type SideColor = 'white' | 'black';

/**
 * A single decoded puzzle
 *
 * Immutable once decoded: arrays are frozen by the decoder.
 */
export interface PuzzleRecord {
  /** Opaque unique identifier */
  readonly id: string;
  /** Initial position, before the opponent's first move */
  readonly fen: string;
  /** Solution in UCI notation, opponent's move first (never empty) */
  readonly moves: readonly string[];
  /** Estimated difficulty rating */
  readonly rating: number;
  /** Rating confidence width (informational) */
  readonly ratingDeviation: number;
  /** Popularity percentage in [-100, 100] */
  readonly popularity: number;
  /** Number of times the puzzle was played */
  readonly playCount: number;
  /** Theme tags in source order (never empty) */
  readonly themes: readonly string[];
  /** Link to the game the puzzle was taken from (may be empty) */
  readonly gameUrl: string;
  /** Opening tags (may be empty) */
  readonly openingTags: readonly string[];
}

/**
 * Difficulty band assigned at finalization
 */
export type DifficultyBand = 'Easy' | 'Medium' | 'Hard';

/**
 * Band order, easiest first
 */
export const DIFFICULTY_BANDS: readonly DifficultyBand[] = ['Easy', 'Medium', 'Hard'];

/**
 * A selected puzzle with its difficulty label
 */
export interface BandedPuzzle {
  readonly record: PuzzleRecord;
  /** Theme this puzzle was selected for */
  readonly theme: string;
  readonly band: DifficultyBand;
  /** 1-based position in the theme's rating order */
  readonly rank: number;
  readonly qualityScore: number;
}
