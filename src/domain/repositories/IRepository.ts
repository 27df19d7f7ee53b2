/**
 * Base Repository Interface
 * Defines the contract for all repositories
 *
 * This interface lives in the domain layer because:
 * - Domain layer defines WHAT operations are needed
 * - Infrastructure layer defines HOW they are implemented
 */
import type { Filters } from './IEntityManager.js';

/**
 * Entity IDs arrive as numbers or numeric strings (route params, queue messages)
 */
export type EntityId = number | string;

/**
 * One page of entities plus navigation metadata
 */
export interface PaginationResult<T> {
  entities: T[];
  totalCount: number;
  page: number;
  perPage: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface BulkDeleteOptions<T, F> {
  instances?: T[];
  filters?: Filters<F>;
}

export interface BulkDeleteResult<T> {
  deleted: T[];
  count: number;
}

export interface IRepository<T, F> {
  /**
   * Find entity by ID
   * @returns null when absent
   */
  getById(id: EntityId): Promise<T | null>;

  /**
   * Find all entities, optionally limited to a range
   */
  getAll(limit?: number, offset?: number): Promise<T[]>;

  /**
   * Walk every entity in batches; forward-only, not cached
   */
  iterate(batchSize?: number): AsyncGenerator<T, void, undefined>;

  create(fields: Partial<F>): Promise<T>;

  /**
   * @returns the updated entity, or null when absent
   */
  update(id: EntityId, fields: Partial<F>): Promise<T | null>;

  /**
   * @returns the deleted entity, or null when absent
   */
  delete(id: EntityId): Promise<T | null>;

  bulkCreate(instances: T[], batchSize?: number): Promise<T[]>;

  bulkUpdate(instances: T[], fieldNames: string[], batchSize?: number): Promise<T[]>;

  bulkDelete(options: BulkDeleteOptions<T, F>): Promise<BulkDeleteResult<T>>;

  count(filters?: Filters<F>): Promise<number>;

  exists(filters: Filters<F>): Promise<boolean>;

  paginate(page?: number, perPage?: number, filters?: Filters<F>): Promise<PaginationResult<T>>;

  /**
   * Drop one entity's cache entry, or every collection entry when no id is given
   */
  clearCache(id?: EntityId): Promise<void>;
}
