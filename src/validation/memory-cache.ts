import type { CacheEntry } from './types.js';

export class ExpiryCache<K, V> {
  private cache: Map<K, CacheEntry<V>>;

  constructor() {
    this.cache = new Map();
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    // Expired entries are dropped lazily on lookup
    if (entry.expiresAt <= Date.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: K, value: V, expiresAt: number): void {
    this.cache.set(key, { value, expiresAt });
  }

  expiresAt(key: K): number | undefined {
    return this.cache.get(key)?.expiresAt;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  cleanupExpired(): number {
    const now = Date.now();
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
