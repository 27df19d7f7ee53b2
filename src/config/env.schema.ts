import { z } from 'zod';

/**
 * Environment variable validation schema using Zod
 * All configuration is validated at startup - fail fast on misconfiguration
 */
export const envSchema = z.object({
  // ============================================
  // APPLICATION
  // ============================================
  NODE_ENV: z.enum(['development', 'production', 'staging', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SERVICE_NAME: z.string().min(1).default('kyc-questionnaire'),
  SERVICE_VERSION: z.string().default('1.0.0'),

  // ============================================
  // DATABASE
  // ============================================
  DB_CLIENT: z.enum(['mysql2', 'better-sqlite3']).default('mysql2'),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.number().int().positive().default(3306),
  DB_USERNAME: z.string().min(1).default('root'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().min(1),
  DB_CONNECTION_LIMIT: z.number().int().positive().default(10),

  // ============================================
  // CACHE
  // ============================================
  CACHE_ENABLED: z.boolean().default(false),
  CACHE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
  CACHE_TIMEOUT: z.number().int().positive().default(900), // 15 minutes
  CACHE_COLLECTION_TIMEOUT: z.number().int().positive().default(600),
  CACHE_COUNT_TIMEOUT: z.number().int().positive().default(300),

  // ============================================
  // REDIS
  // ============================================
  REDIS_SERVER: z.string().min(1).default('localhost'),
  REDIS_PORT: z.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional().default(''),
});

/**
 * Type definition for the validated environment configuration
 */
export type EnvConfig = z.infer<typeof envSchema>;
