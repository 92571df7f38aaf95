import { CachePolicy } from '../enums';

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  rejected: number;
}

/**
 * Capacity-bounded map.
 *
 * `lru` keeps recency by re-inserting on read (Map iteration order is insertion order) and evicts the
 * oldest key on overflow. `reject` never evicts and ignores inserts once full.
 *
 * Every operation runs to completion without yielding, so a read-check-insert sequence cannot
 * interleave with another caller on the same event loop.
 */
export class BoundedCache<K, V> {
  private readonly store = new Map<K, V>();
  private readonly capacity: number;
  private readonly policy: CachePolicy;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private rejected = 0;

  constructor(capacity: number, policy: CachePolicy = CachePolicy.Lru) {
    this.capacity = Math.max(0, Math.floor(capacity));
    this.policy = policy;
  }

  get size(): number {
    return this.store.size;
  }

  isEnabled(): boolean {
    return this.capacity > 0;
  }

  get(key: K): V | undefined {
    const value = this.store.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    if (this.policy === CachePolicy.Lru) {
      this.store.delete(key);
      this.store.set(key, value);
    }
    return value;
  }

  set(key: K, value: V): void {
    if (!this.isEnabled()) {
      return;
    }
    if (this.store.has(key)) {
      this.store.delete(key);
      this.store.set(key, value);
      return;
    }
    if (this.store.size >= this.capacity) {
      if (this.policy === CachePolicy.Reject) {
        this.rejected++;
        return;
      }
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        this.store.delete(oldest.value);
        this.evictions++;
      }
    }
    this.store.set(key, value);
  }

  /**
   * Returns the cached value, or computes, stores and returns it.
   */
  getOrCreate(key: K, factory: (key: K) => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = factory(key);
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.store.clear();
  }

  stats(): CacheStats {
    return {
      size: this.store.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      rejected: this.rejected,
    };
  }
}
