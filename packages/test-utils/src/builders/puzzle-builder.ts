/**
 * Fluent builder for PuzzleRecord test data
 */

import type { PuzzleRecord } from '@tactica/types';

type PuzzleDraft = { -readonly [K in keyof PuzzleRecord]: PuzzleRecord[K] };

/**
 * A legal back-rank mate: black plays a7a6, white mates with d1d8
 */
export const DEFAULT_PUZZLE_FEN = '6k1/p4ppp/8/8/8/8/5PPP/3R2K1 b - - 0 1';

/**
 * Header line of the puzzle CSV format
 */
export const PUZZLE_CSV_HEADER =
  'PuzzleId,FEN,Moves,Rating,RatingDeviation,Popularity,NbPlays,Themes,GameUrl,OpeningTags';

/**
 * Fluent builder for creating PuzzleRecord instances
 */
export class PuzzleRecordBuilder {
  private draft: PuzzleDraft;

  constructor(id = 'p0001') {
    this.draft = {
      id,
      fen: DEFAULT_PUZZLE_FEN,
      moves: ['a7a6', 'd1d8'],
      rating: 1500,
      ratingDeviation: 75,
      popularity: 80,
      playCount: 100,
      themes: ['mate'],
      gameUrl: '',
      openingTags: [],
    };
  }

  withId(id: string): this {
    this.draft.id = id;
    return this;
  }

  /**
   * Set the starting position and the solution (opponent's move first)
   */
  withPosition(fen: string, moves: readonly string[]): this {
    this.draft.fen = fen;
    this.draft.moves = [...moves];
    return this;
  }

  withRating(rating: number): this {
    this.draft.rating = rating;
    return this;
  }

  withPopularity(popularity: number): this {
    this.draft.popularity = popularity;
    return this;
  }

  withPlayCount(playCount: number): this {
    this.draft.playCount = playCount;
    return this;
  }

  withThemes(...themes: string[]): this {
    this.draft.themes = themes;
    return this;
  }

  withGameUrl(gameUrl: string): this {
    this.draft.gameUrl = gameUrl;
    return this;
  }

  withOpeningTags(...tags: string[]): this {
    this.draft.openingTags = tags;
    return this;
  }

  /**
   * Build a frozen record, like the decoder produces
   */
  build(): PuzzleRecord {
    return Object.freeze({
      ...this.draft,
      moves: Object.freeze([...this.draft.moves]),
      themes: Object.freeze([...this.draft.themes]),
      openingTags: Object.freeze([...this.draft.openingTags]),
    });
  }
}

/**
 * Shorthand for a builder
 */
export function aPuzzle(id?: string): PuzzleRecordBuilder {
  return new PuzzleRecordBuilder(id);
}

function csvField(value: string): string {
  return /[",]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render a record as a CSV data line matching PUZZLE_CSV_HEADER
 */
export function toCsvRow(record: PuzzleRecord): string {
  return [
    record.id,
    record.fen,
    record.moves.join(' '),
    String(record.rating),
    String(record.ratingDeviation),
    String(record.popularity),
    String(record.playCount),
    record.themes.join(' '),
    record.gameUrl,
    record.openingTags.join(' '),
  ]
    .map(csvField)
    .join(',');
}
