/**
 * HotCache - bounded least-recently-used map.
 *
 * Relies on Map preserving insertion order: the first key is always the
 * least recently used one.
 */
export class HotCache<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`HotCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    // Move to most-recent position
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /** Returns the evicted key, if any. */
  set(key: K, value: V): K | undefined {
    if (this.entries.has(key)) {
      this.entries.delete(key);
      this.entries.set(key, value);
      return undefined;
    }

    let evicted: K | undefined;
    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, value);
    return evicted;
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}
