import { createHash } from 'crypto';
import { isSensitiveKey } from '../../shared/utils/logSanitizer.js';

/**
 * CacheKeyGenerator - Deterministic cache keys for repository reads
 *
 * Single entity: {namespace}.{entity}.{id}[.{suffix}]
 * Collection:    {namespace}.{entity}.{suffix}
 */

export const DEFAULT_NAMESPACE = 'default';

/**
 * Collection key families dropped on every write
 */
export const COLLECTION_FAMILIES = ['all', 'count', 'paginated'] as const;

export type CollectionFamily = (typeof COLLECTION_FAMILIES)[number];

export interface CacheKeyScope {
  namespace: string;
  entity: string;
}

export class CacheKeyGenerator {
  /**
   * Derive the key scope from a model's grouping and name
   */
  static scope(modelName: string, appLabel?: string): CacheKeyScope {
    return {
      namespace: appLabel || DEFAULT_NAMESPACE,
      entity: modelName.toLowerCase(),
    };
  }

  /**
   * Generate cache key for ID-based lookups
   */
  static forEntity(scope: CacheKeyScope, id: number, suffix = ''): string {
    const base = `${scope.namespace}.${scope.entity}.${id}`;
    return suffix ? `${base}.${suffix}` : base;
  }

  /**
   * Generate cache key for a collection query
   */
  static forCollection(scope: CacheKeyScope, suffix = 'all'): string {
    return `${scope.namespace}.${scope.entity}.${suffix}`;
  }

  /**
   * Generate cache key for ranged lists
   */
  static forList(scope: CacheKeyScope, limit: number | undefined, offset: number): string {
    if (limit === undefined && offset === 0) {
      return this.forCollection(scope, 'all');
    }
    return this.forCollection(scope, `all.limit_${limit ?? 'none'}.offset_${offset}`);
  }

  /**
   * Generate cache key for counts
   * Filters are sorted by key and encoded with their value types, then hashed;
   * values of sensitive filters are hashed on their own first
   */
  static forCount(scope: CacheKeyScope, filters: object): string {
    const entries = Object.entries(filters)
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    if (entries.length === 0) {
      return this.forCollection(scope, 'count_all');
    }

    const encoded = entries.map(([key, value]) => {
      const [type, text] = typedValue(value);
      return [key, type, isSensitiveKey(key) ? digest(text) : text];
    });
    return this.forCollection(scope, `count_${digest(JSON.stringify(encoded), 16)}`);
  }

  /**
   * Exact collection keys, one per family
   */
  static collectionKeys(scope: CacheKeyScope): string[] {
    return COLLECTION_FAMILIES.map((family) => this.forCollection(scope, family));
  }

  /**
   * Patterns covering every variant of each collection family
   */
  static invalidationPatterns(scope: CacheKeyScope): string[] {
    return COLLECTION_FAMILIES.map((family) => `${this.forCollection(scope, family)}*`);
  }
}

function typedValue(value: unknown): [string, string] {
  if (value === null) return ['null', 'null'];
  if (value instanceof Date) return ['date', value.toISOString()];
  if (typeof value === 'object') return ['json', JSON.stringify(value)];
  return [typeof value, String(value)];
}

function digest(value: string, length = 8): string {
  return createHash('md5').update(value).digest('hex').substring(0, length);
}
