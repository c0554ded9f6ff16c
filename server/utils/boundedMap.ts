/**
 * BoundedMap - a Map with a size cap (least-recently-used eviction) and an
 * optional TTL.
 *
 * Recency follows the underlying Map's insertion order: every hit re-inserts
 * the entry at the end, so the first key is always the eviction candidate.
 */
export interface BoundedMapOptions {
  maxSize: number;
  ttlMs?: number;
  /** Clock override, used by tests */
  now?: () => number;
}

interface Entry<V> {
  value: V;
  storedAt: number;
}

export class BoundedMap<K, V> {
  private map = new Map<K, Entry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number | null;
  private readonly now: () => number;

  constructor(opts: BoundedMapOptions) {
    if (opts.maxSize < 1) {
      throw new Error('[BoundedMap] maxSize must be at least 1');
    }
    this.maxSize = opts.maxSize;
    this.ttlMs = opts.ttlMs ?? null;
    this.now = opts.now ?? Date.now;
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.ttlMs !== null && this.now() - entry.storedAt > this.ttlMs;
  }

  get(key: K): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.map.delete(key);
      return undefined;
    }

    // Move to the most-recent end
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): this {
    this.map.delete(key);
    while (this.map.size >= this.maxSize) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
    }
    this.map.set(key, { value, storedAt: this.now() });
    return this;
  }

  has(key: K): boolean {
    const entry = this.map.get(key);
    if (!entry) return false;
    if (this.isExpired(entry)) {
      this.map.delete(key);
      return false;
    }
    return true;
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  /** Drop expired entries and return the live count */
  get size(): number {
    this.prune();
    return this.map.size;
  }

  prune(): void {
    for (const [key, entry] of Array.from(this.map.entries())) {
      if (this.isExpired(entry)) this.map.delete(key);
    }
  }
}
