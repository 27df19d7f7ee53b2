/**
 * Startup and shutdown of the persistence stack
 *
 * INITIALIZATION ORDER MATTERS: the cache store is chosen first, then the
 * database binds every model, then the container hands out repositories.
 */
import type { AwilixContainer } from 'awilix';
import config from './config/env.js';
import logger from './infra/logger/logger.js';
import { registerDependencies, type Cradle } from './container.js';
import { MemoryCacheStore, RedisCacheStore, setDefaultCacheStore, type CacheStore } from './infra/cache/index.js';
import { initializeRedis, closeRedis } from './infra/redis/redis.js';
import { initializeDatabase, closeDatabase } from './infra/db/database.js';

/**
 * Pick the cache store for this process
 * Falls back to the in-process store when Redis cannot be reached
 */
export async function initializeCacheStore(): Promise<CacheStore> {
  if (config.CACHE_DRIVER === 'redis') {
    const client = await initializeRedis();
    if (client) {
      return new RedisCacheStore(client, `${config.SERVICE_NAME}:`);
    }
    logger.warn('Redis unavailable, using in-memory cache');
  }
  return new MemoryCacheStore();
}

export async function bootstrap(): Promise<AwilixContainer<Cradle>> {
  logger.info(
    {
      service: config.SERVICE_NAME,
      version: config.SERVICE_VERSION,
      env: config.NODE_ENV,
    },
    'Starting service...'
  );

  const cacheStore = await initializeCacheStore();
  setDefaultCacheStore(cacheStore);

  await initializeDatabase();

  return registerDependencies({ cacheStore });
}

export async function shutdown(): Promise<void> {
  await closeDatabase();
  await closeRedis();
  logger.info('Service stopped');
}
