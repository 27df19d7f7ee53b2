import type { Logger } from '../../logger/logger.js';
import { LoggerFactory } from '../../logger/logger.js';
import config from '../../../config/env.js';
import { CacheManager } from '../../cache/CacheManager.js';
import { CacheKeyGenerator, type CacheKeyScope } from '../../cache/cacheKeyGenerator.js';
import type { BaseModel } from '../../../domain/models/BaseModel.js';
import type { ModelDescriptor } from '../../../domain/models/ModelDescriptor.js';
import type {
  BulkDeleteCriteria,
  BulkDeleteOptions,
  BulkDeleteResult,
  EntityId,
  EntityManager,
  Filters,
  IRepository,
  PaginationResult,
} from '../../../domain/repositories/index.js';
import {
  ConfigurationError,
  RepositoryOperationError,
  ValidationError,
} from '../../../shared/errors/AppError.js';
import {
  validateBatchSize,
  validateFieldNames,
  validateFields,
  validateId,
  validateInstances,
  validateLimitOffset,
  validatePagination,
} from '../../../shared/utils/validation.js';
import { sanitizeLogData } from '../../../shared/utils/logSanitizer.js';
import type { EntitySnapshot, RepositoryOptions } from './types/repository.js';

const DEFAULT_BATCH_SIZE = 100;

/**
 * Build pagination metadata for one page
 */
export function paginationResult<T>(
  entities: T[],
  totalCount: number,
  page: number,
  perPage: number
): PaginationResult<T> {
  const totalPages = Math.ceil(totalCount / perPage);
  return {
    entities,
    totalCount,
    page,
    perPage,
    totalPages,
    hasNext: page < totalPages,
    hasPrevious: page > 1,
  };
}

/**
 * Base repository
 * Validated CRUD over an entity manager with a best-effort cache in front.
 * The cache is advisory: a store failure is logged and treated as a miss,
 * and invalidation runs after each write's transaction has finished.
 */
export class BaseRepository<T extends BaseModel<F>, F extends object> implements IRepository<T, F> {
  private readonly _model: ModelDescriptor<T, F>;
  private readonly _cacheEnabled: boolean;
  private _manager: EntityManager<T, F> | null = null;

  protected readonly cacheManager: CacheManager;
  protected readonly logger: Logger;
  protected readonly collectionTimeout: number;
  protected readonly countTimeout: number;
  private readonly keyScope: CacheKeyScope;

  constructor(model: ModelDescriptor<T, F> | null | undefined, options: RepositoryOptions = {}) {
    if (!model) {
      throw new ConfigurationError('Repository must have a model defined');
    }

    this._model = model;
    this._cacheEnabled = options.cacheEnabled ?? false;
    this.cacheManager = options.cacheManager ?? new CacheManager();
    this.logger = options.logger ?? LoggerFactory.createChild({ repository: model.modelName });
    this.collectionTimeout = options.collectionTimeout ?? config.CACHE_COLLECTION_TIMEOUT;
    this.countTimeout = options.countTimeout ?? config.CACHE_COUNT_TIMEOUT;
    this.keyScope = CacheKeyGenerator.scope(model.modelName, model.appLabel);
  }

  get model(): ModelDescriptor<T, F> {
    return this._model;
  }

  /**
   * Manager bound to the model, resolved on first use
   */
  get manager(): EntityManager<T, F> {
    if (this._manager === null) {
      const manager = this._model.objects;
      if (manager === null) {
        throw new ConfigurationError(`${this._model.modelName} must have a bound manager`);
      }
      this._manager = manager;
    }
    return this._manager;
  }

  get cacheEnabled(): boolean {
    return this._cacheEnabled;
  }

  // ============================================
  // Cache keys
  // ============================================

  protected entityCacheKey(id: number): string {
    return CacheKeyGenerator.forEntity(this.keyScope, id);
  }

  // ============================================
  // Reads
  // ============================================

  async getById(id: EntityId): Promise<T | null> {
    const validatedId = validateId(id);
    const cacheKey = this.entityCacheKey(validatedId);

    return this.run(
      'Fetch by ID',
      `Failed to fetch ${this.name} by ID=${validatedId}`,
      { id: sanitizeLogData(id) },
      async () => {
        const cached = this.fromSnapshot(await this.cacheGet(cacheKey));
        if (cached) {
          this.logger.debug({ id: validatedId }, `Cache hit for ${this.name}`);
          return cached;
        }

        const instance = await this.manager.getById(validatedId);

        if (instance) {
          // Fills a free slot only; a snapshot stored meanwhile stays
          await this.cacheGetOrSet(cacheKey, this.toSnapshot(instance));
          this.logger.debug({ id: validatedId }, `Fetched ${this.name}`);
        } else {
          this.logger.debug({ id: validatedId }, `${this.name} not found`);
        }

        return instance;
      }
    );
  }

  async getAll(limit?: number, offset = 0): Promise<T[]> {
    const range = validateLimitOffset(limit, offset);
    const cacheKey = CacheKeyGenerator.forList(this.keyScope, range.limit, range.offset);

    return this.run(
      'Fetch all',
      `Failed to fetch ${this.name} instances`,
      { limit: range.limit, offset: range.offset },
      async () => {
        const cached = this.fromSnapshots(await this.cacheGet(cacheKey));
        if (cached) {
          this.logger.debug(range, `Cache hit for ${this.name} collection`);
          return cached;
        }

        const entities = await this.fetchAll(range.limit, range.offset);
        await this.cacheSet(
          cacheKey,
          entities.map((entity) => this.toSnapshot(entity)),
          this.collectionTimeout
        );

        return entities;
      }
    );
  }

  /**
   * Batched walk over every entity
   * The batch size is checked now; rows are fetched as the caller pulls them
   */
  iterate(batchSize: number = DEFAULT_BATCH_SIZE): AsyncGenerator<T, void, undefined> {
    const size = validateBatchSize(batchSize);
    return this.iterateBatches(size);
  }

  private async *iterateBatches(batchSize: number): AsyncGenerator<T, void, undefined> {
    for (let offset = 0; ; offset += batchSize) {
      const batch = await this.run(
        'Iteration',
        `Error in entities iterator for ${this.name}`,
        { batchSize, offset },
        () => this.fetchAll(batchSize, offset)
      );

      yield* batch;

      if (batch.length < batchSize) {
        return;
      }
    }
  }

  protected async fetchAll(limit: number | undefined, offset: number): Promise<T[]> {
    const entities = await this.manager.getAll({ limit, offset });
    this.logger.debug(
      { limit, offset, count: entities.length },
      `Fetched ${entities.length} ${this.name} instances`
    );
    return entities;
  }

  // ============================================
  // Writes
  // ============================================

  async create(fields: Partial<F>): Promise<T> {
    const validated = validateFields(fields, 'create');
    const sanitized = sanitizeLogData(validated);

    this.logger.debug({ data: sanitized }, `Creating ${this.name}`);

    const instance = await this.run(
      'Create',
      `Unexpected error creating ${this.name}`,
      { data: sanitized },
      () =>
        this.manager.transaction(async (tx) => {
          const created = await tx.createInstance(validated);
          if (!created) {
            throw new Error('Manager returned no instance');
          }
          return created;
        })
    );

    await this.invalidateCollectionCaches();

    this.logger.info({ id: instance.id }, `Successfully created ${this.name} with ID=${instance.id}`);
    return instance;
  }

  async update(id: EntityId, fields: Partial<F>): Promise<T | null> {
    const validatedId = validateId(id);
    const validated = validateFields(fields, 'update');
    const sanitized = sanitizeLogData(validated);

    const instance = await this.run(
      'Update',
      `Failed to update ${this.name} ID=${validatedId}`,
      { id: validatedId, data: sanitized },
      () =>
        this.manager.transaction(async (tx) => {
          const existing = await tx.getById(validatedId);
          if (!existing) {
            return null;
          }
          existing.applyFields(validated);
          await tx.saveInstance(existing, Object.keys(validated));
          return existing;
        })
    );

    if (!instance) {
      this.logger.warn({ id: validatedId }, `Update failed: ${this.name} not found`);
      return null;
    }

    await this.cacheDelete(this.entityCacheKey(validatedId));
    await this.invalidateCollectionCaches();

    this.logger.info({ id: validatedId, data: sanitized }, `Successfully updated ${this.name}`);
    return instance;
  }

  async delete(id: EntityId): Promise<T | null> {
    const validatedId = validateId(id);

    const instance = await this.run(
      'Delete',
      `Failed to delete ${this.name} ID=${validatedId}`,
      { id: validatedId },
      () =>
        this.manager.transaction(async (tx) => {
          const existing = await tx.getById(validatedId);
          if (!existing) {
            return null;
          }
          await tx.deleteInstance(existing);
          return existing;
        })
    );

    if (!instance) {
      this.logger.warn({ id: validatedId }, `Delete failed: ${this.name} not found`);
      return null;
    }

    await this.cacheDelete(this.entityCacheKey(validatedId));
    await this.invalidateCollectionCaches();

    this.logger.info({ id: validatedId }, `Successfully deleted ${this.name}`);
    return instance;
  }

  // ============================================
  // Bulk writes
  // ============================================

  async bulkCreate(instances: T[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<T[]> {
    const validated = validateInstances(instances, this._model.isInstance, 'bulk create');
    const size = validateBatchSize(batchSize);

    this.logger.debug(
      { count: validated.length, batchSize: size },
      `Starting bulk create of ${this.name} instances`
    );

    const created = await this.run(
      'Bulk create',
      `Unexpected error during bulk create of ${this.name}`,
      { count: validated.length, batchSize: size },
      () =>
        this.manager.transaction(async (tx) => {
          const result = await tx.bulkCreateInstances(validated, size);
          if (result.length === 0) {
            throw new Error('No instances were created');
          }
          return result;
        })
    );

    await this.invalidateCollectionCaches();

    this.logger.info(
      { created: created.length, requested: validated.length },
      `Successfully created ${created.length}/${validated.length} ${this.name} instances`
    );
    return created;
  }

  async bulkUpdate(
    instances: T[],
    fieldNames: string[],
    batchSize: number = DEFAULT_BATCH_SIZE
  ): Promise<T[]> {
    const validated = validateInstances(instances, this._model.isInstance, 'bulk update');
    const validatedFields = validateFieldNames(fieldNames, 'bulk update');
    const size = validateBatchSize(batchSize);
    const sanitizedFields = sanitizeLogData(validatedFields);

    this.logger.debug(
      { count: validated.length, fields: sanitizedFields },
      `Starting bulk update of ${this.name} instances`
    );

    const updated = await this.run(
      'Bulk update',
      `Unexpected error during bulk update of ${this.name} instances`,
      { count: validated.length, fields: sanitizedFields },
      () =>
        this.manager.transaction(async (tx) => {
          const result = await tx.bulkUpdateInstances(validated, validatedFields, size);
          if (result.length === 0) {
            throw new Error('No instances were updated');
          }
          return result;
        })
    );

    await this.invalidateEntityCaches(updated);
    await this.invalidateCollectionCaches();

    this.logger.info(
      { updated: updated.length, requested: validated.length, fields: sanitizedFields },
      `Successfully updated ${updated.length}/${validated.length} ${this.name} instances`
    );
    return updated;
  }

  /**
   * Delete by filters, by instances, or by instances narrowed by filters
   */
  async bulkDelete(options: BulkDeleteOptions<T, F>): Promise<BulkDeleteResult<T>> {
    const instances =
      options.instances === undefined
        ? undefined
        : validateInstances(options.instances, this._model.isInstance, 'bulk delete');
    const filters = this.normalizeFilters(options.filters);
    const hasFilters = Object.keys(filters).length > 0;

    if (!instances && !hasFilters) {
      throw new ValidationError('Either instances list or filters must be provided for bulk delete');
    }

    const criteria: BulkDeleteCriteria<F> = {};
    if (hasFilters) {
      criteria.filters = filters;
    }
    if (instances) {
      criteria.ids = instances.map((instance) => instance.id);
    }

    const sanitizedFilters = sanitizeLogData(filters);
    this.logger.debug({ filters: sanitizedFilters }, `Starting bulk delete of ${this.name} instances`);

    const deleted = await this.run(
      'Bulk delete',
      `Unexpected error during bulk delete of ${this.name} instances`,
      { filters: sanitizedFilters, ids: criteria.ids },
      () => this.manager.transaction((tx) => tx.bulkDeleteInstances(criteria))
    );

    await this.invalidateEntityCaches(deleted);
    await this.invalidateCollectionCaches();

    this.logger.info(
      { count: deleted.length, filters: sanitizedFilters },
      `Successfully deleted ${deleted.length} ${this.name} instances`
    );
    return { deleted, count: deleted.length };
  }

  // ============================================
  // Counting & existence
  // ============================================

  async count(filters: Filters<F> = {}): Promise<number> {
    const active = this.normalizeFilters(filters);
    const hasFilters = Object.keys(active).length > 0;
    const cacheKey = CacheKeyGenerator.forCount(this.keyScope, active);
    const sanitizedFilters = sanitizeLogData(active);

    return this.run(
      'Count',
      `Failed to count ${this.name} instances`,
      { filters: sanitizedFilters },
      async () => {
        const cached = await this.cacheGet(cacheKey);
        if (typeof cached === 'number') {
          this.logger.debug({ filters: sanitizedFilters }, `Cache hit for ${this.name} count`);
          return cached;
        }

        const total = hasFilters
          ? await this.manager.filterBy(active).count()
          : await this.manager.count();

        await this.cacheSet(cacheKey, total, this.countTimeout);

        this.logger.debug(
          { filters: sanitizedFilters, total },
          `Counted ${total} ${this.name} instances`
        );
        return total;
      }
    );
  }

  async exists(filters: Filters<F>): Promise<boolean> {
    const active = this.normalizeFilters(filters);
    if (Object.keys(active).length === 0) {
      throw new ValidationError('At least one filter must be provided for existence check');
    }

    const sanitizedFilters = sanitizeLogData(active);

    return this.run(
      'Existence check',
      `Failed existence check for ${this.name}`,
      { filters: sanitizedFilters },
      async () => {
        const exists = await this.manager.exists(active);
        this.logger.debug({ filters: sanitizedFilters, exists }, `Existence check for ${this.name}`);
        return exists;
      }
    );
  }

  // ============================================
  // Pagination
  // ============================================

  async paginate(
    page = 1,
    perPage = 20,
    filters: Filters<F> = {}
  ): Promise<PaginationResult<T>> {
    const validated = validatePagination(page, perPage);
    const active = this.normalizeFilters(filters);
    const hasFilters = Object.keys(active).length > 0;
    const sanitizedFilters = sanitizeLogData(active);

    const totalCount = await this.count(active);

    return this.run(
      'Pagination',
      `Failed to get paginated ${this.name} entities`,
      { page: validated.page, perPage: validated.perPage, filters: sanitizedFilters },
      async () => {
        const offset = (validated.page - 1) * validated.perPage;
        const entities = hasFilters
          ? await this.manager.filterBy(active).slice(offset, validated.perPage)
          : await this.fetchAll(validated.perPage, offset);

        const result = paginationResult(entities, totalCount, validated.page, validated.perPage);

        this.logger.debug(
          {
            page: result.page,
            perPage: result.perPage,
            total: result.totalCount,
            filters: sanitizedFilters,
          },
          `Retrieved page ${result.page} of ${this.name} entities`
        );
        return result;
      }
    );
  }

  // ============================================
  // Cache maintenance
  // ============================================

  async clearCache(id?: EntityId): Promise<void> {
    if (id !== undefined && id !== null) {
      const validatedId = validateId(id);
      await this.cacheDelete(this.entityCacheKey(validatedId));
      this.logger.debug({ id: validatedId }, `Cleared cache for ${this.name}`);
      return;
    }

    await this.invalidateCollectionCaches();
    this.logger.debug(`Cleared collection caches for ${this.name}`);
  }

  /**
   * Drop every collection family: the exact keys and all their variants
   */
  protected async invalidateCollectionCaches(): Promise<void> {
    if (!this._cacheEnabled) {
      return;
    }

    await Promise.all([
      ...CacheKeyGenerator.collectionKeys(this.keyScope).map((key) => this.cacheDelete(key)),
      ...CacheKeyGenerator.invalidationPatterns(this.keyScope).map((pattern) =>
        this.guardCache('deletePattern', pattern, (cache) => cache.deletePattern(pattern))
      ),
    ]);
  }

  protected async invalidateEntityCaches(entities: T[]): Promise<void> {
    await Promise.all(entities.map((entity) => this.cacheDelete(this.entityCacheKey(entity.id))));
  }

  // ============================================
  // Guarded cache access
  // ============================================

  protected cacheGet(key: string): Promise<unknown> {
    return this.guardCache('get', key, (cache) => cache.get(key));
  }

  protected async cacheSet(key: string, value: unknown, timeout?: number): Promise<void> {
    await this.guardCache('set', key, (cache) => cache.set(key, value, timeout));
  }

  protected async cacheGetOrSet(key: string, value: unknown, timeout?: number): Promise<unknown> {
    return this.guardCache('getOrSet', key, (cache) => cache.getOrSet(key, value, timeout));
  }

  protected async cacheDelete(key: string): Promise<void> {
    await this.guardCache('delete', key, (cache) => cache.delete(key));
  }

  /**
   * Run one cache call; a failure is logged and reads as a miss
   * Skipped entirely while caching is disabled
   */
  private async guardCache<R>(
    operation: string,
    key: string,
    action: (cache: CacheManager) => Promise<R>
  ): Promise<R | null> {
    if (!this._cacheEnabled) {
      return null;
    }

    try {
      return await action(this.cacheManager);
    } catch (error) {
      this.logger.warn(
        { err: error, key: sanitizeLogData(key) },
        `Cache ${operation} operation failed for key '${String(sanitizeLogData(key))}'`
      );
      return null;
    }
  }

  // ============================================
  // Internals
  // ============================================

  protected get name(): string {
    return this._model.modelName;
  }

  /**
   * Wrap a manager call: validation and configuration errors pass through,
   * anything else is logged once and re-raised as RepositoryOperationError
   */
  protected async run<R>(
    operation: string,
    description: string,
    context: Record<string, unknown>,
    work: () => Promise<R>
  ): Promise<R> {
    try {
      return await work();
    } catch (error) {
      if (
        error instanceof ValidationError ||
        error instanceof ConfigurationError ||
        error instanceof RepositoryOperationError
      ) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error, ...context }, `${description}: ${message}`);
      throw new RepositoryOperationError(operation, error);
    }
  }

  /**
   * Drop undefined filter values; null stays (it matches NULL columns)
   */
  protected normalizeFilters(filters: Filters<F> | null | undefined): Filters<F> {
    if (filters === null || filters === undefined) {
      return {};
    }
    if (typeof filters !== 'object' || Array.isArray(filters)) {
      throw new ValidationError('Filters must be a dictionary');
    }

    const active: Filters<F> = { ...filters };
    for (const [key, value] of Object.entries(active)) {
      if (value === undefined) {
        Reflect.deleteProperty(active, key);
      }
    }
    return active;
  }

  protected toSnapshot(entity: T): EntitySnapshot<F> {
    return { id: entity.id, fields: entity.toFields() };
  }

  /**
   * Rebuild an entity from a cached snapshot; anything unreadable is a miss
   */
  protected fromSnapshot(value: unknown): T | null {
    if (!isSnapshotShape(value)) {
      return null;
    }

    try {
      return this._model.build(this._model.parseFields(value.fields), value.id);
    } catch (error) {
      this.logger.warn({ err: error, id: value.id }, `Discarding unreadable cached ${this.name}`);
      return null;
    }
  }

  protected fromSnapshots(value: unknown): T[] | null {
    if (!Array.isArray(value)) {
      return null;
    }

    const entities: T[] = [];
    for (const item of value) {
      const entity = this.fromSnapshot(item);
      if (!entity) {
        return null;
      }
      entities.push(entity);
    }
    return entities;
  }
}

function isSnapshotShape(value: unknown): value is { id: number; fields: unknown } {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const id: unknown = Reflect.get(value, 'id');
  const fields: unknown = Reflect.get(value, 'fields');
  return typeof id === 'number' && Number.isInteger(id) && id > 0 && typeof fields === 'object' && fields !== null;
}
