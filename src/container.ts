import type { AwilixContainer } from 'awilix';
import { createContainer, asValue, asFunction, InjectionMode } from 'awilix';
import type { Logger } from './infra/logger/logger.js';
import logger from './infra/logger/logger.js';
import config from './config/env.js';
import { CacheManager, getDefaultCacheStore, type CacheStore } from './infra/cache/index.js';
import {
  QuestionnaireItemRepository,
  QuestionnaireRepository,
  QuestionRepository,
  SubmissionRepository,
  type RepositoryOptions,
} from './infra/db/repositories/index.js';
import { AdminQuestionnaireService, SubmissionReviewService } from './application/services/index.js';

/**
 * Container Cradle Interface
 * Defines all available dependencies with their types
 */
export interface Cradle {
  // Infrastructure
  logger: Logger;
  cacheStore: CacheStore;
  cacheManager: CacheManager;
  repositoryOptions: RepositoryOptions;

  // Repositories
  questionnaireRepository: QuestionnaireRepository;
  questionRepository: QuestionRepository;
  questionnaireItemRepository: QuestionnaireItemRepository;
  submissionRepository: SubmissionRepository;

  // Services
  adminQuestionnaireService: AdminQuestionnaireService;
  submissionReviewService: SubmissionReviewService;
}

/**
 * Dependency Injection Tokens
 * Use these tokens for type-safe dependency resolution
 */
export const TOKENS = {
  // Infrastructure
  Logger: 'logger',
  CacheStore: 'cacheStore',
  CacheManager: 'cacheManager',

  // Repositories
  QuestionnaireRepository: 'questionnaireRepository',
  QuestionRepository: 'questionRepository',
  QuestionnaireItemRepository: 'questionnaireItemRepository',
  SubmissionRepository: 'submissionRepository',

  // Services
  AdminQuestionnaireService: 'adminQuestionnaireService',
  SubmissionReviewService: 'submissionReviewService',
} as const;

export interface ContainerOverrides {
  cacheStore?: CacheStore;
  cacheEnabled?: boolean;
}

/**
 * Create and configure the DI container
 */
export const container: AwilixContainer<Cradle> = createContainer<Cradle>({
  injectionMode: InjectionMode.PROXY,
  strict: true,
});

/**
 * Register all dependencies in the DI container
 * Call this function once at app startup, after the models are bound.
 */
export function registerDependencies(overrides: ContainerOverrides = {}): AwilixContainer<Cradle> {
  const cacheEnabled = overrides.cacheEnabled ?? config.CACHE_ENABLED;

  // Re-registration replaces singletons built from an earlier registration
  container.cache.clear();

  container.register({
    // ============================================
    // INFRASTRUCTURE
    // ============================================
    logger: asValue(logger),
    cacheStore: asValue(overrides.cacheStore ?? getDefaultCacheStore()),
    cacheManager: asFunction(({ cacheStore }: Cradle) => new CacheManager(cacheStore)).singleton(),
    repositoryOptions: asFunction(
      ({ cacheManager }: Cradle): RepositoryOptions => ({ cacheEnabled, cacheManager })
    ).singleton(),

    // ============================================
    // REPOSITORIES
    // ============================================
    // One instance per resolution; nothing is shared between callers but the cache
    questionnaireRepository: asFunction(
      ({ repositoryOptions }: Cradle) => new QuestionnaireRepository(repositoryOptions)
    ).transient(),

    questionRepository: asFunction(
      ({ repositoryOptions }: Cradle) => new QuestionRepository(repositoryOptions)
    ).transient(),

    questionnaireItemRepository: asFunction(
      ({ repositoryOptions }: Cradle) => new QuestionnaireItemRepository(repositoryOptions)
    ).transient(),

    submissionRepository: asFunction(
      ({ repositoryOptions }: Cradle) => new SubmissionRepository(repositoryOptions)
    ).transient(),

    // ============================================
    // SERVICES
    // ============================================
    adminQuestionnaireService: asFunction(
      ({ questionnaireRepository, questionRepository, questionnaireItemRepository, logger }: Cradle) =>
        new AdminQuestionnaireService(
          questionnaireRepository,
          questionRepository,
          questionnaireItemRepository,
          logger
        )
    ).transient(),

    submissionReviewService: asFunction(
      ({ submissionRepository, questionnaireRepository, logger }: Cradle) =>
        new SubmissionReviewService(submissionRepository, questionnaireRepository, logger)
    ).transient(),
  });

  logger.info({ cacheEnabled }, 'Dependency injection container initialized');
  return container;
}
