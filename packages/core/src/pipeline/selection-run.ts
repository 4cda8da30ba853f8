/**
 * Selection Run
 *
 * Owns the selector and counters for one pass over a source. The stream is
 * consumed once; finalization starts only after it ended cleanly.
 */

import type { DecodeError, DecodeResult } from '@tactica/source';
import { createRunStats, type RunStats, type SelectionOptions } from '@tactica/types';

import { SelectionStateError } from '../errors.js';
import {
  candidateThemes,
  composeFilters,
  createFilterChain,
  validateCriteria,
} from '../filters/filter-chain.js';
import {
  finalizeTheme,
  truncateTheme,
  type FinalizedTheme,
} from '../finalizer/distribution.js';
import { ThemeSelector } from '../selection/theme-selector.js';

/**
 * Lifecycle of a run
 */
export type RunState = 'collecting' | 'complete' | 'aborted' | 'finalized';

/**
 * Progress callback, invoked every `progressInterval` rows and once at the end
 */
export type RunProgressCallback = (stats: Readonly<RunStats>) => void;

export interface SelectionRunOptions extends SelectionOptions {
  /** Rows between progress callbacks (default: 10000) */
  progressInterval?: number;
  onProgress?: RunProgressCallback;
  /** Called for every row that failed to decode */
  onDecodeError?: (error: DecodeError) => void;
}

const DEFAULT_PROGRESS_INTERVAL = 10_000;

export class SelectionRun {
  private readonly options: SelectionRunOptions;
  private readonly selector: ThemeSelector;
  private readonly accept: ReturnType<typeof composeFilters>;
  private readonly stats: RunStats = createRunStats();
  private runState: RunState | 'idle' = 'idle';

  /**
   * @throws ConfigurationError if the criteria or capacity are invalid
   */
  constructor(options: SelectionRunOptions) {
    validateCriteria(options.criteria, options.perTheme, options.limitTotal);
    this.options = options;
    this.selector = new ThemeSelector({ capacity: options.perTheme, weights: options.weights });
    this.accept = composeFilters(...createFilterChain(options.criteria));
  }

  get state(): RunState | 'idle' {
    return this.runState;
  }

  /**
   * Snapshot of the counters
   */
  getStats(): RunStats {
    return {
      ...this.stats,
      decodeFailures: { ...this.stats.decodeFailures },
    };
  }

  /**
   * Consume the decoded stream in a single pass
   *
   * @throws SelectionStateError if called more than once
   * @throws whatever the stream throws (typically SourceReadError); the run is then aborted
   */
  async consume(results: AsyncIterable<DecodeResult> | Iterable<DecodeResult>): Promise<void> {
    if (this.runState !== 'idle') {
      throw new SelectionStateError(`Cannot consume: run is ${this.runState}`);
    }
    this.runState = 'collecting';

    const interval = this.options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    const { criteria, onProgress, onDecodeError } = this.options;

    try {
      for await (const result of results) {
        this.stats.rowsRead++;

        if (!result.ok) {
          this.stats.rowsSkipped++;
          this.stats.decodeFailures[result.error.reason]++;
          onDecodeError?.(result.error);
        } else if (this.accept(result.record)) {
          this.selector.offer(result.record, candidateThemes(result.record, criteria));
        } else {
          this.stats.filteredOut++;
        }

        if (onProgress !== undefined && this.stats.rowsRead % interval === 0) {
          onProgress(this.syncCounters());
        }
      }
    } catch (error) {
      this.runState = 'aborted';
      throw error;
    }

    this.selector.seal();
    this.runState = 'complete';
    onProgress?.(this.syncCounters());
  }

  /**
   * Finalize themes one at a time, in ascending theme order
   *
   * Each collection is released as soon as its theme is emitted.
   * @throws SelectionStateError unless the stream was fully consumed and not finalized yet
   */
  finalize(): Generator<FinalizedTheme, void, undefined> {
    if (this.runState !== 'complete') {
      throw new SelectionStateError(
        this.runState === 'finalized'
          ? 'Run was already finalized'
          : `Cannot finalize: run is ${this.runState}`,
      );
    }
    this.runState = 'finalized';
    this.syncCounters();
    return this.emitThemes();
  }

  private *emitThemes(): Generator<FinalizedTheme, void, undefined> {
    const minPopularityPercentile = this.options.criteria.minPopularityPercentile;
    let remaining = this.options.limitTotal ?? Infinity;

    for (const theme of this.selector.themes()) {
      const collection = this.selector.take(theme);
      if (collection === undefined) continue;

      const banded = finalizeTheme(theme, collection, { minPopularityPercentile });
      this.stats.percentileDropped += banded.percentileDropped;

      // The total limit cuts in emitted order; exhausted themes are still released
      const finalized = truncateTheme(banded, remaining);
      this.stats.limitDropped += banded.puzzles.length - finalized.puzzles.length;
      remaining -= finalized.puzzles.length;
      if (finalized.puzzles.length === 0) continue;

      this.stats.selected += finalized.puzzles.length;
      yield finalized;
    }
  }

  private syncCounters(): Readonly<RunStats> {
    const { offers, accepted, evicted, rejected } = this.selector.counters;
    this.stats.offers = offers;
    this.stats.accepted = accepted;
    this.stats.evicted = evicted;
    this.stats.rejected = rejected;
    this.stats.themes = Math.max(this.stats.themes, this.selector.themeCount);
    return this.stats;
  }
}
