/**
 * Fixed-capacity list ordered most-recent-first.
 * Pushing beyond capacity evicts the oldest entry.
 */
export class BoundedHistory<T> {
  private readonly entries: T[];

  constructor(
    public readonly capacity: number,
    entries: readonly T[] = [],
  ) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.entries = entries.slice(0, capacity);
  }

  /**
   * Returns a new history with `value` at the front. The receiver is not modified,
   * so callers can stage the result and commit it together with other writes.
   */
  withEntry(value: T): BoundedHistory<T> {
    return new BoundedHistory(this.capacity, [value, ...this.entries]);
  }

  /** Most recent entry, if any. */
  latest(): T | undefined {
    return this.entries[0];
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): T[] {
    return [...this.entries];
  }
}
