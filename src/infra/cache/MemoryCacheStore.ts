import type { CacheStore } from './types.js';

interface MemoryEntry {
  value: unknown;
  expiresAt: number;
}

/**
 * In-process cache store
 * Values are cloned on the way in and out, so callers never share references
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string): Promise<unknown> {
    const entry = this.live(key);
    return Promise.resolve(entry ? structuredClone(entry.value) : null);
  }

  set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value: structuredClone(value),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  async getOrSet(key: string, value: unknown, ttlSeconds: number): Promise<unknown> {
    const entry = this.live(key);
    if (entry) {
      return structuredClone(entry.value);
    }
    await this.set(key, value, ttlSeconds);
    return structuredClone(value);
  }

  deletePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (matcher.test(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return Promise.resolve(removed);
  }

  /**
   * Number of live entries
   */
  get size(): number {
    return [...this.entries.keys()].filter((key) => this.live(key)).length;
  }

  clear(): void {
    this.entries.clear();
  }

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}
