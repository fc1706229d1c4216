/**
 * Short-lived key-value cache (sessions, health checks, certificates)
 */
export interface KeyValueCache<T extends {}> {
  get(key: string): Promise<T | undefined>;

  put(key: string, value: T, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;

  /**
   * Return the cached value or run the producer once and cache its result.
   * Concurrent callers for the same key share one producer call.
   */
  getOrCompute(key: string, ttlSeconds: number, producer: () => Promise<T>): Promise<T>;
}
