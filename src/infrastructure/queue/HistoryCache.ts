/**
 * Bounded map that remembers insertion order and evicts the oldest entry first.
 * Re-adding a key moves it to the newest position.
 */
export class HistoryCache<V> {
  private entries: Map<string, V> = new Map();

  constructor(readonly capacity: number = 20) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Returns the keys evicted to make room
   */
  add(key: string, value: V): string[] {
    // Map iteration order is insertion order, so delete + set moves the key to the end
    this.entries.delete(key);
    this.entries.set(key, value);

    const evicted: string[] = [];
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      evicted.push(oldest.value);
    }
    return evicted;
  }

  get(key: string): V | null {
    return this.entries.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Most recent first. A limit of 0 or less returns everything.
   */
  recent(limit = 0): V[] {
    const values = Array.from(this.entries.values()).reverse();
    return limit > 0 ? values.slice(0, limit) : values;
  }

  /** Oldest first */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
