/**
 * Database Module
 * Knex connection plus the model-to-manager bindings repositories rely on
 */
import { knex, type Knex } from 'knex';
import config, { type EnvConfig } from '../../config/env.js';
import logger from '../logger/logger.js';
import { KnexEntityManager, type KnexEntityManagerOptions } from './managers/KnexEntityManager.js';
import {
  questionnaireItemsTable,
  questionnairesTable,
  questionsTable,
  submissionsTable,
} from './tables.js';
import {
  QuestionModel,
  QuestionnaireItemModel,
  QuestionnaireModel,
  SubmissionModel,
} from '../../domain/models/index.js';

// Singleton
let db: Knex | null = null;

// ============================================
// Connection Management
// ============================================

/**
 * Knex settings for the configured client
 */
export function buildKnexConfig(env: EnvConfig): Knex.Config {
  if (env.DB_CLIENT === 'better-sqlite3') {
    return {
      client: 'better-sqlite3',
      connection: { filename: env.DB_NAME },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    };
  }

  return {
    client: 'mysql2',
    connection: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USERNAME,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
    },
    pool: {
      min: 0,
      max: env.DB_CONNECTION_LIMIT,
    },
  };
}

/**
 * Initialize database connection and bind every model to it
 */
export async function initializeDatabase(): Promise<Knex> {
  if (db) {
    return db;
  }

  const connection = knex(buildKnexConfig(config));
  await connection.raw('select 1');

  bindModelManagers(connection);
  db = connection;

  logger.info({ client: config.DB_CLIENT, database: config.DB_NAME }, 'Database connected');
  return db;
}

/**
 * Manager settings that depend on the driver
 */
export function managerOptions(client: EnvConfig['DB_CLIENT']): KnexEntityManagerOptions {
  return { insertedId: client === 'better-sqlite3' ? 'last' : 'first' };
}

/**
 * Bind a Knex-backed manager to each model
 */
export function bindModelManagers(
  connection: Knex,
  options: KnexEntityManagerOptions = managerOptions(config.DB_CLIENT)
): void {
  QuestionnaireModel.bindManager(
    new KnexEntityManager(connection, QuestionnaireModel, questionnairesTable, options)
  );
  QuestionModel.bindManager(
    new KnexEntityManager(connection, QuestionModel, questionsTable, options)
  );
  QuestionnaireItemModel.bindManager(
    new KnexEntityManager(connection, QuestionnaireItemModel, questionnaireItemsTable, options)
  );
  SubmissionModel.bindManager(
    new KnexEntityManager(connection, SubmissionModel, submissionsTable, options)
  );
}

/**
 * Get database connection
 */
export async function getDatabase(): Promise<Knex> {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

/**
 * Check database connection health
 */
export async function checkDatabaseHealth(): Promise<{
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }

  try {
    const start = Date.now();
    await db.raw('select 1');
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }

  QuestionnaireModel.unbindManager();
  QuestionModel.unbindManager();
  QuestionnaireItemModel.unbindManager();
  SubmissionModel.unbindManager();
}
