/**
 * Insertion-ordered map with a fixed capacity. Writing an existing key moves
 * it to the newest position; overflowing evicts the oldest entry.
 */
export class BoundedMap<K, V> {
  private readonly entries = new Map<K, V>();
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  /**
   * Insert or refresh an entry.
   * @returns The evicted key, if any.
   */
  set(key: K, value: V): K | undefined {
    this.entries.delete(key);
    this.entries.set(key, value);
    if (this.entries.size <= this.capacity) return undefined;
    const oldest = this.entries.keys().next();
    if (oldest.done) return undefined;
    this.entries.delete(oldest.value);
    return oldest.value;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Entries oldest first. */
  toArray(): Array<[K, V]> {
    return [...this.entries];
  }
}
