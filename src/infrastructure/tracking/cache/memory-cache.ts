import { LRUCache } from 'lru-cache';

export interface CacheEntry<TValue> {
  readonly value: TValue;
  readonly createdAt: number;
}

/** Session-scoped cache for listings that are expensive to refetch. */
export class MemoryCache<TValue> {
  private readonly cache: LRUCache<string, CacheEntry<TValue>>;

  public constructor(options: { maxEntries: number; ttlMs: number }) {
    this.cache = new LRUCache({
      max: options.maxEntries,
      ttl: options.ttlMs,
    });
  }

  public get(key: string): CacheEntry<TValue> | undefined {
    return this.cache.get(key);
  }

  public set(key: string, value: TValue): void {
    this.cache.set(key, { value, createdAt: Date.now() });
  }

  public async getOrLoad(key: string, load: () => Promise<TValue>): Promise<TValue> {
    const cached = this.get(key);
    if (cached) {
      return cached.value;
    }

    const value = await load();
    this.set(key, value);
    return value;
  }
}
