import type { Logger } from '../../infra/logger/logger.js';
import { sanitizeLogData } from '../../shared/utils/logSanitizer.js';

/**
 * Base Service
 * Logging shared by the workflow services
 */
export abstract class BaseService {
  constructor(protected readonly logger: Logger) {}

  /**
   * Log operation start
   */
  protected logStart(operation: string, input?: unknown): void {
    this.logger.info({ operation, input: sanitizeLogData(input) }, `Starting ${operation}`);
  }

  /**
   * Log operation success
   */
  protected logSuccess(operation: string, result?: unknown): void {
    this.logger.info({ operation, result }, `${operation} completed successfully`);
  }

  /**
   * Log a rejected request; the error itself is raised by the caller
   */
  protected logRejected(operation: string, reason: string): void {
    this.logger.warn({ operation, reason }, `${operation} rejected`);
  }
}
