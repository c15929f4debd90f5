/**
 * Bounded FIFO between fragment arrival and the processing loop.
 * When full, the newest item is refused; queued items are never dropped.
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  push(item: T): boolean {
    if (this.isFull) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  shift(): T | undefined {
    return this.items.shift();
  }
}
