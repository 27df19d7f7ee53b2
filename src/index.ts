/**
 * KYC Questionnaire Core
 * Cached repositories and review workflow over questionnaires and submissions
 */

export { bootstrap, shutdown, initializeCacheStore } from './bootstrap.js';
export { container, registerDependencies, TOKENS, type Cradle } from './container.js';

export * from './domain/models/index.js';
export type * from './domain/repositories/index.js';

export * from './infra/cache/index.js';
export * from './infra/db/repositories/index.js';
export { InMemoryEntityManager } from './infra/db/managers/InMemoryEntityManager.js';
export {
  KnexEntityManager,
  type InsertedIdPosition,
  type KnexEntityManagerOptions,
  type TableMapping,
} from './infra/db/managers/KnexEntityManager.js';
export { bindModelManagers, buildKnexConfig, managerOptions } from './infra/db/database.js';

export * from './application/services/index.js';
export * from './shared/errors/index.js';
export {
  validateId,
  validateFields,
  validateInstances,
  validateFieldNames,
  validateBatchSize,
  validateLimitOffset,
  validatePagination,
  sanitizeLogData,
  MAX_PER_PAGE,
} from './shared/utils/index.js';
export { default as logger, LoggerFactory, type Logger } from './infra/logger/logger.js';
