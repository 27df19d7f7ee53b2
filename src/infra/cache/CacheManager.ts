import config from '../../config/env.js';
import { MemoryCacheStore } from './MemoryCacheStore.js';
import type { CacheStore } from './types.js';

// Process-wide default store, replaced at bootstrap when Redis is configured
let defaultStore: CacheStore = new MemoryCacheStore();

export function getDefaultCacheStore(): CacheStore {
  return defaultStore;
}

export function setDefaultCacheStore(store: CacheStore): void {
  defaultStore = store;
}

/**
 * Cache Manager
 * Owned by each repository; applies the entity timeout when none is given
 */
export class CacheManager {
  constructor(
    private readonly store: CacheStore = getDefaultCacheStore(),
    readonly defaultTimeout: number = config.CACHE_TIMEOUT
  ) {}

  get(key: string): Promise<unknown> {
    return this.store.get(key);
  }

  set(key: string, value: unknown, timeout?: number): Promise<void> {
    return this.store.set(key, value, timeout ?? this.defaultTimeout);
  }

  delete(key: string): Promise<void> {
    return this.store.delete(key);
  }

  getOrSet(key: string, value: unknown, timeout?: number): Promise<unknown> {
    return this.store.getOrSet(key, value, timeout ?? this.defaultTimeout);
  }

  deletePattern(pattern: string): Promise<number> {
    return this.store.deletePattern(pattern);
  }
}
