/**
 * Fixed-capacity ring buffer
 *
 * Responsibilities:
 * 1. Keep at most `capacity` items, oldest evicted first on push
 * 2. Allow backfilling older items at the front while there is room
 * 3. Expose ordered copies (oldest → newest) so callers cannot mutate state
 */

// ============================================================================
// RING BUFFER
// ============================================================================

export class RingBuffer<T> {
  private items: (T | undefined)[];
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  /**
   * Append newest item, evicting the oldest when full
   */
  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.items[tail] = item;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * Insert an item older than everything stored.
   * Ignored when the buffer is full (newer data wins).
   *
   * @returns true if the item was stored
   */
  prepend(item: T): boolean {
    if (this.count >= this.capacity) {
      return false;
    }
    this.head = (this.head - 1 + this.capacity) % this.capacity;
    this.items[this.head] = item;
    this.count++;
    return true;
  }

  /**
   * All items, oldest → newest
   */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  first(): T | undefined {
    return this.count > 0 ? this.items[this.head] : undefined;
  }

  last(): T | undefined {
    return this.count > 0 ? this.items[(this.head + this.count - 1) % this.capacity] : undefined;
  }

  size(): number {
    return this.count;
  }
}
