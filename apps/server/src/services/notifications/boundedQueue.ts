/**
 * Fixed-capacity FIFO that makes room by discarding its oldest items
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(private maxSize: number) {
    if (maxSize < 1) throw new RangeError('capacity must be at least 1');
  }

  /**
   * Append an item; returns the item dropped to make room, if any
   */
  push(item: T): T | undefined {
    let dropped: T | undefined;
    if (this.items.length >= this.maxSize) dropped = this.items.shift();
    this.items.push(item);
    return dropped;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Change capacity; shrinking below the current size drops the oldest items
   */
  resize(capacity: number): T[] {
    if (capacity < 1) throw new RangeError('capacity must be at least 1');
    this.maxSize = capacity;
    const excess = Math.max(0, this.items.length - capacity);
    return this.items.splice(0, excess);
  }

  get size(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.maxSize;
  }
}
