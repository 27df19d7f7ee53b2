export type {
  IRepository,
  EntityId,
  PaginationResult,
  BulkDeleteOptions,
  BulkDeleteResult,
} from './IRepository.js';
export type {
  EntityManager,
  FilteredQuery,
  Filters,
  Range,
  BulkDeleteCriteria,
} from './IEntityManager.js';
