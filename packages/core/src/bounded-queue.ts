/**
 * @module bounded-queue
 * Fixed-capacity FIFO queue backed by a circular buffer.
 */

import { assertCapacity } from './validation';

/**
 * First-in first-out queue that never grows past its capacity.
 *
 * `append` and `popFront` throw a RangeError on overflow and underflow;
 * callers that treat those as normal outcomes check `isFull` / `isEmpty` first.
 * Iteration runs front (oldest) to back (newest).
 */
export class BoundedQueue<T> implements Iterable<T> {
  /** Maximum number of items held at once. */
  readonly capacity: number;

  private items: T[];
  private front = 0;
  private count = 0;

  /**
   * Create an empty queue.
   * @param capacity - Maximum number of items (positive integer).
   */
  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
    this.items = new Array<T>(capacity);
  }

  /** Number of items currently queued. */
  get length(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  /** Add an item at the back. */
  append(item: T): void {
    if (this.isFull) {
      throw new RangeError('Queue is full');
    }
    this.items[(this.front + this.count) % this.capacity] = item;
    this.count++;
  }

  /** Remove and return the item at the front. */
  popFront(): T {
    if (this.isEmpty) {
      throw new RangeError('Queue is empty');
    }
    const item = this.items[this.front];
    delete this.items[this.front];
    this.front = (this.front + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** Item at the front, or undefined when empty. */
  peekFront(): T | undefined {
    return this.isEmpty ? undefined : this.items[this.front];
  }

  /** Drop every item. */
  clear(): void {
    this.items = new Array<T>(this.capacity);
    this.front = 0;
    this.count = 0;
  }

  /** Copy of the queued items, front to back. */
  toArray(): T[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.items[(this.front + i) % this.capacity];
    }
  }
}
