/**
 * Per-Theme Selector
 *
 * Fans each accepted record out to the collection of every candidate theme.
 * Collections are created lazily and never share state.
 */

import type { PuzzleRecord, QualityWeights } from '@tactica/types';

import { ConfigurationError, SelectionStateError } from '../errors.js';

import { computeQualityScore, DEFAULT_QUALITY_WEIGHTS, type ScoredRecord } from './quality.js';
import { ThemeCollection, type OfferOutcome } from './theme-collection.js';

export interface ThemeSelectorOptions {
  /** Per-theme capacity; undefined keeps everything */
  capacity?: number;
  weights?: QualityWeights;
}

/**
 * Offer counters, summed over all themes
 */
export interface SelectorCounters {
  offers: number;
  accepted: number;
  evicted: number;
  rejected: number;
}

export class ThemeSelector {
  private readonly collections = new Map<string, ThemeCollection>();
  private readonly capacity: number | undefined;
  private readonly weights: QualityWeights;
  private sealed = false;
  private readonly tally: SelectorCounters = { offers: 0, accepted: 0, evicted: 0, rejected: 0 };

  constructor(options: ThemeSelectorOptions = {}) {
    this.capacity = options.capacity;
    this.weights = options.weights ?? DEFAULT_QUALITY_WEIGHTS;
  }

  get counters(): Readonly<SelectorCounters> {
    return { ...this.tally };
  }

  /**
   * Number of themes holding at least one entry
   */
  get themeCount(): number {
    return this.collections.size;
  }

  /**
   * Score a record once and offer it to each theme
   *
   * @returns The outcome per theme, in the order given
   */
  offer(record: PuzzleRecord, themes: readonly string[]): OfferOutcome[] {
    const entry: ScoredRecord = { record, score: computeQualityScore(record, this.weights) };
    return themes.map((theme) => this.offerEntry(theme, entry));
  }

  /**
   * Offer an already scored entry to a single theme
   */
  offerEntry(theme: string, entry: ScoredRecord): OfferOutcome {
    if (this.sealed) {
      throw new SelectionStateError('Selector is sealed');
    }

    let collection = this.collections.get(theme);
    if (collection === undefined) {
      collection = new ThemeCollection(theme, this.capacity);
      this.collections.set(theme, collection);
    }

    const outcome = collection.offer(entry);
    this.tally.offers++;
    switch (outcome) {
      case 'inserted':
        this.tally.accepted++;
        break;
      case 'replaced':
        this.tally.accepted++;
        this.tally.evicted++;
        break;
      case 'rejected':
        this.tally.rejected++;
        break;
    }
    return outcome;
  }

  /**
   * Fold another selector's retained entries into this one
   *
   * The result is the same as offering both inputs to a single selector.
   * Only retained entries are re-offered, so the other selector's counters
   * are not carried over.
   * @throws ConfigurationError if the selectors differ in capacity or weights
   */
  merge(other: ThemeSelector): this {
    if (other.capacity !== this.capacity) {
      throw new ConfigurationError(
        `Cannot merge selectors with capacities ${String(this.capacity)} and ` +
          String(other.capacity),
        'perTheme',
      );
    }
    if (
      other.weights.popularity !== this.weights.popularity ||
      other.weights.playCount !== this.weights.playCount
    ) {
      throw new ConfigurationError(
        'Cannot merge selectors with different quality weights',
        'weights',
      );
    }

    for (const [theme, collection] of other.collections) {
      for (const entry of collection.entries()) {
        this.offerEntry(theme, entry);
      }
    }
    return this;
  }

  /**
   * Themes in ascending order
   */
  themes(): string[] {
    return [...this.collections.keys()].sort();
  }

  /**
   * Retained entries of one theme, best first, without consuming
   */
  peek(theme: string): ScoredRecord[] {
    return this.collections.get(theme)?.entries() ?? [];
  }

  /**
   * Close every collection to further offers
   */
  seal(): void {
    this.sealed = true;
    for (const collection of this.collections.values()) {
      collection.seal();
    }
  }

  /**
   * Remove a sealed collection from the selector and return it
   */
  take(theme: string): ThemeCollection | undefined {
    if (!this.sealed) {
      throw new SelectionStateError('Selector must be sealed before collections are taken');
    }
    const collection = this.collections.get(theme);
    this.collections.delete(theme);
    return collection;
  }
}
