import dotenv from 'dotenv';
import { envSchema } from './env.schema.js';
import type { EnvConfig } from './env.schema.js';

dotenv.config();

/**
 * Parse boolean from string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse integer from string
 */
function parseInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Build the raw config input from an environment map
 */
export function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    // Application
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    SERVICE_NAME: env.SERVICE_NAME,
    SERVICE_VERSION: env.SERVICE_VERSION,

    // Database
    DB_CLIENT: env.DB_CLIENT,
    DB_HOST: env.DB_HOST,
    DB_PORT: parseInt(env.DB_PORT),
    DB_USERNAME: env.DB_USERNAME,
    DB_PASSWORD: env.DB_PASSWORD,
    DB_NAME: env.DB_NAME,
    DB_CONNECTION_LIMIT: parseInt(env.DB_CONNECTION_LIMIT),

    // Cache
    CACHE_ENABLED: parseBoolean(env.CACHE_ENABLED, false),
    CACHE_DRIVER: env.CACHE_DRIVER,
    CACHE_TIMEOUT: parseInt(env.CACHE_TIMEOUT),
    CACHE_COLLECTION_TIMEOUT: parseInt(env.CACHE_COLLECTION_TIMEOUT),
    CACHE_COUNT_TIMEOUT: parseInt(env.CACHE_COUNT_TIMEOUT),

    // Redis
    REDIS_SERVER: env.REDIS_SERVER,
    REDIS_PORT: parseInt(env.REDIS_PORT),
    REDIS_PASSWORD: env.REDIS_PASSWORD,
  };
}

let config: EnvConfig;

try {
  config = envSchema.parse(readEnv(process.env));
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('❌ Environment validation failed:', error);
  process.exit(1);
}

export default config;
export type { EnvConfig };
