import { afterAll, vi } from 'vitest';

// Set test environment variables BEFORE any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.SERVICE_NAME = 'test-service';
process.env.SERVICE_VERSION = '1.0.0';

// Database (required; tests bind in-memory or SQLite managers)
process.env.DB_CLIENT = 'better-sqlite3';
process.env.DB_NAME = ':memory:';

// Cache stays off unless a test turns it on per repository
process.env.CACHE_ENABLED = 'false';
process.env.CACHE_DRIVER = 'memory';

afterAll(() => {
  vi.restoreAllMocks();
});
