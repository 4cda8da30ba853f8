/**
 * Theme Collection
 *
 * Bounded best-of-L store for one theme. The worst retained entry sits at
 * the top of a min-heap so each offer costs O(log L).
 */

import { SelectionStateError } from '../errors.js';

import { PriorityQueue } from './priority-queue.js';
import { compareQuality, type ScoredRecord } from './quality.js';

/**
 * Result of offering an entry to a collection
 */
export type OfferOutcome = 'inserted' | 'replaced' | 'rejected';

/**
 * Lifecycle of a collection
 */
export type CollectionState = 'open' | 'sealed' | 'consumed';

export class ThemeCollection {
  // Worst entry has the highest priority
  private readonly heap = new PriorityQueue<ScoredRecord>((a, b) => compareQuality(b, a));
  private state: CollectionState = 'open';

  /**
   * @param capacity - Maximum number of retained entries; undefined for no limit
   */
  constructor(
    readonly theme: string,
    readonly capacity?: number,
  ) {
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`Collection capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.heap.size;
  }

  get status(): CollectionState {
    return this.state;
  }

  /**
   * Offer an entry under the best-of-L rule
   *
   * When full, the entry replaces the current worst only if it is strictly
   * better.
   */
  offer(entry: ScoredRecord): OfferOutcome {
    if (this.state !== 'open') {
      throw new SelectionStateError(`Collection "${this.theme}" is ${this.state}`);
    }

    if (this.capacity === undefined || this.heap.size < this.capacity) {
      this.heap.push(entry);
      return 'inserted';
    }

    const worst = this.heap.peek();
    if (worst !== undefined && compareQuality(entry, worst) > 0) {
      this.heap.replaceTop(entry);
      return 'replaced';
    }
    return 'rejected';
  }

  /**
   * The entry that would be evicted next
   */
  worst(): ScoredRecord | undefined {
    return this.heap.peek();
  }

  /**
   * Retained entries, best first, without consuming
   */
  entries(): ScoredRecord[] {
    return this.heap.toSortedArray().reverse();
  }

  /**
   * Close the collection to further offers
   */
  seal(): void {
    if (this.state === 'open') {
      this.state = 'sealed';
    }
  }

  /**
   * Hand the retained entries over, best first
   *
   * @throws SelectionStateError if the collection is still open or was already consumed
   */
  consume(): ScoredRecord[] {
    if (this.state !== 'sealed') {
      throw new SelectionStateError(
        this.state === 'open'
          ? `Collection "${this.theme}" must be sealed before it is consumed`
          : `Collection "${this.theme}" was already consumed`,
      );
    }
    const entries = this.entries();
    this.heap.clear();
    this.state = 'consumed';
    return entries;
  }
}
