import { LRUCache } from 'lru-cache';
import { KeyValueCache } from '../../../core';

export interface InMemoryCacheOptions {
  /** Maximum entries kept before least-recently-used eviction */
  max?: number;
}

export interface CacheStats {
  size: number;
  inflight: number;
  hits: number;
  misses: number;
}

/**
 * LRU-backed KeyValueCache with per-entry TTL and in-flight de-duplication
 */
export class InMemoryKeyValueCache<T extends {}> implements KeyValueCache<T> {
  private cache: LRUCache<string, T>;
  private inFlight = new Map<string, Promise<T>>();
  private stats = { hits: 0, misses: 0 };

  constructor(options: InMemoryCacheOptions = {}) {
    this.cache = new LRUCache<string, T>({
      max: options.max ?? 10_000,
      ttlAutopurge: false,
    });
  }

  async get(key: string): Promise<T | undefined> {
    return this.cache.get(key);
  }

  async put(key: string, value: T, ttlSeconds: number): Promise<void> {
    this.cache.set(key, value, { ttl: ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.inFlight.delete(key);
    this.cache.delete(key);
  }

  async getOrCompute(key: string, ttlSeconds: number, producer: () => Promise<T>): Promise<T> {
    // false and 0 are legitimate cached values
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.stats.hits++;
      return cached;
    }

    const flying = this.inFlight.get(key);
    if (flying) {
      this.stats.hits++;
      return flying;
    }

    this.stats.misses++;
    const promise = producer()
      .then((result) => {
        this.cache.set(key, result, { ttl: ttlSeconds * 1000 });
        return result;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  clear(): void {
    this.cache.clear();
    this.inFlight.clear();
    this.stats = { hits: 0, misses: 0 };
  }

  getStats(): CacheStats {
    return {
      size: this.cache.size,
      inflight: this.inFlight.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
    };
  }
}
