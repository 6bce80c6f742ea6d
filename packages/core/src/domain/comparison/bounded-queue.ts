/**
 * Insertion-ordered queue that drops its oldest entry once it grows past
 * `capacity`. Equality is supplied by the caller so value objects can be stored.
 */
export class BoundedFifoQueue<T> {
  private items: T[] = [];

  constructor(
    readonly capacity: number,
    private readonly equals: (a: T, b: T) => boolean = Object.is,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Returns the evicted entry, or null. Pushing an entry already held is a no-op. */
  push(item: T): T | null {
    if (this.has(item)) return null;
    this.items.push(item);
    if (this.items.length > this.capacity) {
      return this.items.shift() ?? null;
    }
    return null;
  }

  remove(item: T): boolean {
    const idx = this.items.findIndex((existing) => this.equals(existing, item));
    if (idx === -1) return false;
    this.items.splice(idx, 1);
    return true;
  }

  has(item: T): boolean {
    return this.items.some((existing) => this.equals(existing, item));
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
