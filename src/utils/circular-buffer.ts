/**
 * CircularBuffer — Fixed-size ring buffer with O(1) push.
 *
 * When full, new items overwrite the oldest.
 * toArray() returns items in insertion order (oldest → newest).
 */
export class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;    // next write position
  private count = 0;
  private dropped = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (capacity < 1) throw new Error('CircularBuffer capacity must be >= 1');
    this.capacity = capacity;
    this.buffer = new Array(capacity);
  }

  /**
   * Push an item. If full, overwrites the oldest item.
   */
  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.dropped++;
    }
  }

  /**
   * Returns all items in order oldest → newest.
   */
  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  get length(): number {
    return this.count;
  }

  /** Items overwritten since creation. */
  get overwritten(): number {
    return this.dropped;
  }
}
