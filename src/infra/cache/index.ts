export type { CacheStore } from './types.js';
export { MemoryCacheStore } from './MemoryCacheStore.js';
export { RedisCacheStore } from './RedisCacheStore.js';
export { CacheManager, getDefaultCacheStore, setDefaultCacheStore } from './CacheManager.js';
export {
  CacheKeyGenerator,
  COLLECTION_FAMILIES,
  DEFAULT_NAMESPACE,
  type CacheKeyScope,
  type CollectionFamily,
} from './cacheKeyGenerator.js';
