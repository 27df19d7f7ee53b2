/**
 * Key/value store behind the repository cache
 * Every method may reject; callers treat the store as advisory.
 */
export interface CacheStore {
  /**
   * @returns the stored value, or null on a miss
   */
  get(key: string): Promise<unknown>;

  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;

  /**
   * Store value only if the key is free
   * @returns whatever the key holds afterwards
   */
  getOrSet(key: string, value: unknown, ttlSeconds: number): Promise<unknown>;

  /**
   * Delete every key matching a glob (`*` wildcard)
   * @returns number of keys removed
   */
  deletePattern(pattern: string): Promise<number>;
}
