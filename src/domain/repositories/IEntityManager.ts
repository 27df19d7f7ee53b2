/**
 * Entity Manager Interface
 * Persistence contract a repository delegates to
 *
 * Implementations order rows by primary key ascending wherever a range is
 * taken, so offset pages stay stable between calls.
 */

/**
 * Field filters, matched by equality
 */
export type Filters<F> = Partial<F>;

/**
 * Range for ordered fetches
 */
export interface Range {
  limit?: number;
  offset?: number;
}

/**
 * Result of filterBy, evaluated lazily
 */
export interface FilteredQuery<T> {
  count(): Promise<number>;
  first(): Promise<T | null>;
  slice(offset: number, limit?: number): Promise<T[]>;
}

/**
 * Criteria for bulk deletion; at least one must be set
 */
export interface BulkDeleteCriteria<F> {
  filters?: Filters<F>;
  ids?: number[];
}

export interface EntityManager<T, F> {
  getById(id: number): Promise<T | null>;

  getAll(range?: Range): Promise<T[]>;

  filterBy(filters: Filters<F>): FilteredQuery<T>;

  /**
   * Insert a new row
   * @returns null when nothing was created
   */
  createInstance(fields: Partial<F>): Promise<T | null>;

  /**
   * Persist the instance's current values for the named fields
   */
  saveInstance(instance: T, fieldNames: string[]): Promise<void>;

  deleteInstance(instance: T): Promise<void>;

  bulkCreateInstances(instances: T[], batchSize: number): Promise<T[]>;

  bulkUpdateInstances(instances: T[], fieldNames: string[], batchSize: number): Promise<T[]>;

  /**
   * Delete rows matching the filters and, when given, the ids
   * @returns the entities as they were before deletion
   */
  bulkDeleteInstances(criteria: BulkDeleteCriteria<F>): Promise<T[]>;

  count(filters?: Filters<F>): Promise<number>;

  exists(filters: Filters<F>): Promise<boolean>;

  /**
   * Run work as one atomic unit
   * Everything done through the given manager is rolled back if work throws
   */
  transaction<R>(work: (manager: EntityManager<T, F>) => Promise<R>): Promise<R>;
}
