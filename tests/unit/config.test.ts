import { describe, it, expect } from 'vitest';
import { envSchema } from '../../src/config/env.schema.js';
import { readEnv } from '../../src/config/env.js';
import { buildKnexConfig } from '../../src/infra/db/database.js';

describe('environment config', () => {
  it('should apply defaults', () => {
    const config = envSchema.parse(readEnv({ DB_NAME: 'kyc' }));

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      SERVICE_NAME: 'kyc-questionnaire',
      DB_CLIENT: 'mysql2',
      DB_PORT: 3306,
      CACHE_ENABLED: false,
      CACHE_DRIVER: 'memory',
      CACHE_TIMEOUT: 900,
      CACHE_COLLECTION_TIMEOUT: 600,
      CACHE_COUNT_TIMEOUT: 300,
      REDIS_PASSWORD: '',
    });
  });

  it('should parse booleans and integers from strings', () => {
    const config = envSchema.parse(
      readEnv({ DB_NAME: 'kyc', CACHE_ENABLED: 'TRUE', CACHE_TIMEOUT: '60', REDIS_PORT: '6380' })
    );

    expect(config.CACHE_ENABLED).toBe(true);
    expect(config.CACHE_TIMEOUT).toBe(60);
    expect(config.REDIS_PORT).toBe(6380);
  });

  it('should reject a missing database name or unknown cache driver', () => {
    expect(envSchema.safeParse(readEnv({})).success).toBe(false);
    expect(envSchema.safeParse(readEnv({ DB_NAME: 'kyc', CACHE_DRIVER: 'memcached' })).success).toBe(
      false
    );
  });
});

describe('buildKnexConfig', () => {
  it('should use a single connection for SQLite', () => {
    const config = envSchema.parse(readEnv({ DB_CLIENT: 'better-sqlite3', DB_NAME: ':memory:' }));

    expect(buildKnexConfig(config)).toEqual({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    });
  });

  it('should pass credentials to mysql2', () => {
    const config = envSchema.parse(
      readEnv({ DB_NAME: 'kyc', DB_USERNAME: 'app', DB_PASSWORD: 'test-secret' })
    );

    expect(buildKnexConfig(config)).toMatchObject({
      client: 'mysql2',
      connection: {
        host: 'localhost',
        port: 3306,
        user: 'app',
        password: 'test-secret',
        database: 'kyc',
      },
      pool: { min: 0, max: 10 },
    });
  });
});
