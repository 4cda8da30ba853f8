/**
 * Priority Queue
 *
 * A generic binary-heap priority queue. Items with higher priority (as
 * determined by the compare function) sit at the top.
 *
 * Time complexities:
 * - push: O(log n)
 * - pop: O(log n)
 * - replaceTop: O(log n)
 * - peek: O(1)
 */

/**
 * Generic priority queue using a binary heap
 *
 * @typeParam T - Type of items in the queue
 */
export class PriorityQueue<T> {
  private heap: T[] = [];
  private readonly compare: (a: T, b: T) => number;

  /**
   * Create a new priority queue
   *
   * @param compareFn - Comparison function. Should return:
   *   - positive if a has higher priority than b
   *   - negative if a has lower priority than b
   *   - zero if equal priority
   */
  constructor(compareFn: (a: T, b: T) => number) {
    this.compare = compareFn;
  }

  /**
   * Number of items in the queue
   */
  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  /**
   * Add an item to the queue
   */
  push(item: T): void {
    this.heap.push(item);
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the highest priority item
   *
   * @returns The highest priority item, or undefined if empty
   */
  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();

    if (this.heap.length > 0 && last !== undefined) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return top;
  }

  /**
   * Return the highest priority item without removing it
   */
  peek(): T | undefined {
    return this.heap[0];
  }

  /**
   * Replace the highest priority item in a single sift
   *
   * Cheaper than pop followed by push; on an empty queue behaves like push.
   * @returns The item that was replaced
   */
  replaceTop(item: T): T | undefined {
    const top = this.heap[0];
    if (top === undefined) {
      this.push(item);
      return undefined;
    }
    this.heap[0] = item;
    this.bubbleDown(0);
    return top;
  }

  /**
   * Get all items as an array (not in priority order)
   */
  toArray(): T[] {
    return [...this.heap];
  }

  /**
   * Get all items sorted by priority (highest first)
   */
  toSortedArray(): T[] {
    return [...this.heap].sort((a, b) => this.compare(b, a));
  }

  clear(): void {
    this.heap = [];
  }

  /**
   * Swap two heap slots
   */
  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  /**
   * Whether slot i has strictly higher priority than slot j
   */
  private outranks(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && this.compare(a, b) > 0;
  }

  /**
   * Bubble an item up to its correct position
   */
  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.outranks(index, parentIndex)) break;

      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  /**
   * Bubble an item down to its correct position
   */
  private bubbleDown(index: number): void {
    const length = this.heap.length;

    for (;;) {
      const leftChildIndex = 2 * index + 1;
      const rightChildIndex = 2 * index + 2;
      let largestIndex = index;

      if (leftChildIndex < length && this.outranks(leftChildIndex, largestIndex)) {
        largestIndex = leftChildIndex;
      }

      if (rightChildIndex < length && this.outranks(rightChildIndex, largestIndex)) {
        largestIndex = rightChildIndex;
      }

      if (largestIndex === index) break;

      this.swap(index, largestIndex);
      index = largestIndex;
    }
  }
}
