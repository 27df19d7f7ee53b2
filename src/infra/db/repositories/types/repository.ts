/**
 * Repository types and interfaces
 */
import type { Logger } from '../../../logger/logger.js';
import type { CacheManager } from '../../../cache/CacheManager.js';

/**
 * Construction options shared by every repository
 */
export interface RepositoryOptions {
  /** Read-through/invalidate-on-write caching; off by default */
  cacheEnabled?: boolean;
  cacheManager?: CacheManager;
  logger?: Logger;
  /** Seconds a cached list lives */
  collectionTimeout?: number;
  /** Seconds a cached count lives */
  countTimeout?: number;
}

/**
 * Cached form of an entity; rebuilt through the model on a hit
 */
export interface EntitySnapshot<F> {
  id: number;
  fields: F;
}

// Re-export from domain
export type {
  IRepository,
  PaginationResult,
  BulkDeleteOptions,
  BulkDeleteResult,
} from '../../../../domain/repositories/index.js';
