import { serialize, deserialize } from 'node:v8';
import type { Redis } from 'ioredis';
import type { CacheStore } from './types.js';

const SCAN_BATCH = 100;

/**
 * Redis-backed cache store
 * Values go through v8 serialization so Dates and nested objects round-trip
 */
export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly client: Redis,
    private readonly keyPrefix = ''
  ) {}

  async get(key: string): Promise<unknown> {
    const raw = await this.client.getBuffer(this.prefixed(key));
    if (raw === null) {
      return null;
    }
    const value: unknown = deserialize(raw);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.client.set(this.prefixed(key), serialize(value), 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefixed(key));
  }

  async getOrSet(key: string, value: unknown, ttlSeconds: number): Promise<unknown> {
    const stored = await this.client.set(
      this.prefixed(key),
      serialize(value),
      'EX',
      ttlSeconds,
      'NX'
    );
    if (stored === 'OK') {
      return value;
    }
    return this.get(key);
  }

  async deletePattern(pattern: string): Promise<number> {
    const stream = this.client.scanStream({ match: this.prefixed(pattern), count: SCAN_BATCH });
    let removed = 0;

    for await (const batch of stream) {
      const keys: string[] = Array.isArray(batch) ? batch.map(String) : [];
      if (keys.length > 0) {
        removed += await this.client.del(...keys);
      }
    }

    return removed;
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
