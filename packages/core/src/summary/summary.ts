/**
 * Run summary
 *
 * Folds finalized themes into aggregate statistics as they are emitted.
 */

import type { PuzzleRecord, SideColor } from '@tactica/types';

import { solverColorOf } from '../filters/filter-chain.js';
import type { BandCounts, FinalizedTheme } from '../finalizer/distribution.js';
import { PriorityQueue } from '../selection/priority-queue.js';

export const TOP_PUZZLE_COUNT = 10;

export interface RatingStats {
  min: number;
  max: number;
  average: number;
  median: number;
}

export interface PopularityStats {
  min: number;
  max: number;
  average: number;
}

export interface ThemeSummary {
  theme: string;
  count: number;
  averageRating: number;
  averagePopularity: number;
}

export interface TopPuzzle {
  id: string;
  popularity: number;
  playCount: number;
  rating: number;
  /** Themes the puzzle was selected for so far */
  themes: string[];
}

export interface RunSummary {
  /** Selected entries, a puzzle counting once per theme */
  totalPuzzles: number;
  /** Distinct puzzle ids */
  uniquePuzzles: number;
  themeCount: number;
  /** null when nothing was selected */
  rating: RatingStats | null;
  popularity: PopularityStats | null;
  /** Sorted by count (descending), then theme */
  themes: ThemeSummary[];
  bands: BandCounts;
  solverColors: Record<SideColor, number>;
  /** Most popular distinct puzzles, ties by play count then id */
  topPuzzles: TopPuzzle[];
}

/**
 * Popularity order for the top list: positive when a ranks above b
 */
function compareTop(a: PuzzleRecord, b: PuzzleRecord): number {
  if (a.popularity !== b.popularity) return a.popularity - b.popularity;
  if (a.playCount !== b.playCount) return a.playCount - b.playCount;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

function average(total: number, count: number): number {
  return count === 0 ? 0 : total / count;
}

function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

export class SummaryAccumulator {
  private readonly ratings: number[] = [];
  private ratingTotal = 0;
  private popularityTotal = 0;
  private popularityMin = Infinity;
  private popularityMax = -Infinity;
  private readonly ids = new Set<string>();
  private readonly themeRows: ThemeSummary[] = [];
  private readonly bands: BandCounts = { Easy: 0, Medium: 0, Hard: 0 };
  private readonly solverColors: Record<SideColor, number> = { white: 0, black: 0 };
  // Weakest of the current top list at the head
  private readonly top = new PriorityQueue<PuzzleRecord>((a, b) => compareTop(b, a));
  private readonly topThemes = new Map<string, string[]>();

  /**
   * @param startAfterFirstMove - Decides who the solver is
   */
  constructor(private readonly startAfterFirstMove = true) {}

  add(finalized: FinalizedTheme): void {
    let ratingTotal = 0;
    let popularityTotal = 0;

    for (const { record, band } of finalized.puzzles) {
      this.ratings.push(record.rating);
      ratingTotal += record.rating;
      popularityTotal += record.popularity;
      this.popularityMin = Math.min(this.popularityMin, record.popularity);
      this.popularityMax = Math.max(this.popularityMax, record.popularity);
      this.bands[band]++;
      this.ids.add(record.id);

      const solver = solverColorOf(record, this.startAfterFirstMove);
      if (solver !== null) {
        this.solverColors[solver]++;
      }

      this.offerTop(record, finalized.theme);
    }

    this.ratingTotal += ratingTotal;
    this.popularityTotal += popularityTotal;
    const count = finalized.puzzles.length;
    if (count > 0) {
      this.themeRows.push({
        theme: finalized.theme,
        count,
        averageRating: average(ratingTotal, count),
        averagePopularity: average(popularityTotal, count),
      });
    }
  }

  private offerTop(record: PuzzleRecord, theme: string): void {
    const seen = this.topThemes.get(record.id);
    if (seen !== undefined) {
      seen.push(theme);
      return;
    }

    const weakest = this.top.peek();
    if (this.top.size < TOP_PUZZLE_COUNT) {
      this.top.push(record);
    } else if (weakest !== undefined && compareTop(record, weakest) > 0) {
      this.top.replaceTop(record);
      this.topThemes.delete(weakest.id);
    } else {
      return;
    }
    this.topThemes.set(record.id, [theme]);
  }

  summarize(): RunSummary {
    const total = this.ratings.length;
    const sortedRatings = [...this.ratings].sort((a, b) => a - b);

    return {
      totalPuzzles: total,
      uniquePuzzles: this.ids.size,
      themeCount: this.themeRows.length,
      rating:
        total === 0
          ? null
          : {
              min: sortedRatings[0] ?? 0,
              max: sortedRatings[total - 1] ?? 0,
              average: average(this.ratingTotal, total),
              median: median(sortedRatings),
            },
      popularity:
        total === 0
          ? null
          : {
              min: this.popularityMin,
              max: this.popularityMax,
              average: average(this.popularityTotal, total),
            },
      themes: [...this.themeRows].sort(
        (a, b) => b.count - a.count || (a.theme < b.theme ? -1 : a.theme > b.theme ? 1 : 0),
      ),
      bands: { ...this.bands },
      solverColors: { ...this.solverColors },
      topPuzzles: this.top
        .toSortedArray()
        .reverse()
        .map((record) => ({
          id: record.id,
          popularity: record.popularity,
          playCount: record.playCount,
          rating: record.rating,
          themes: [...(this.topThemes.get(record.id) ?? [])],
        })),
    };
  }
}
