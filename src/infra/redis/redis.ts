/**
 * Redis Client - Shared across application
 * Backs the repository cache when CACHE_DRIVER=redis
 */
import { Redis } from 'ioredis';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

// Singleton Redis client
let redisClient: Redis | null = null;

/**
 * Initialize Redis connection
 * Call this during application bootstrap
 */
export async function initializeRedis(): Promise<Redis | null> {
  if (redisClient) {
    return redisClient;
  }

  const client = new Redis({
    host: config.REDIS_SERVER,
    port: config.REDIS_PORT,
    password: config.REDIS_PASSWORD || undefined,
    db: 0,
    lazyConnect: true,
    connectTimeout: 10000,
    commandTimeout: 5000,
    maxRetriesPerRequest: 3,
  });

  try {
    await client.connect();
    redisClient = client;
    logger.info({ host: config.REDIS_SERVER, port: config.REDIS_PORT }, 'Redis connected');
    return redisClient;
  } catch (error) {
    logger.error({ err: error }, 'Redis connection failed');
    client.disconnect();
    return null;
  }
}

/**
 * Get Redis client instance
 * Returns null if Redis is not connected
 */
export function getRedisClient(): Redis | null {
  return redisClient;
}

/**
 * Check Redis connection health
 */
export async function checkRedisHealth(): Promise<{
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}> {
  if (!redisClient) {
    return { healthy: false, error: 'Redis not configured' };
  }

  try {
    const start = Date.now();
    await redisClient.ping();
    const latencyMs = Date.now() - start;

    return {
      healthy: latencyMs < 100,
      latencyMs,
    };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Close the Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit();
      logger.info('Redis connection closed');
    } catch (error) {
      logger.error({ err: error }, 'Error closing Redis');
    }
    redisClient = null;
  }
}
