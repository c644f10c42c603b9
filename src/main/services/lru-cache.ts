/**
 * Bounded least-recently-used map. Map iteration order is insertion order,
 * so the first key is always the least recently used one.
 */
export class LRUCache<K, V> {
  private entries = new Map<K, V>();

  constructor(private readonly maxEntries: number) {
    if (maxEntries < 1) {
      throw new RangeError('LRU cache needs room for at least one entry');
    }
  }

  get capacity(): number {
    return this.maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Read and refresh recency */
  get(key: K): V | undefined {
    if (!this.entries.has(key)) return undefined;
    const value = this.entries.get(key);
    this.entries.delete(key);
    if (value !== undefined) this.entries.set(key, value);
    return value;
  }

  /** Presence check that leaves recency alone */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /** Remove every entry whose key matches; returns how many went */
  deleteWhere(predicate: (key: K) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from least to most recently used */
  keys(): K[] {
    return [...this.entries.keys()];
  }
}
