/**
 * Error Handling Module
 *
 * Clean, simple error handling based on isOperational flag.
 */

export {
  AppError,
  ValidationError,
  NotFoundError,
  ConflictError,
  BusinessRuleError,
  ConfigurationError,
  RepositoryOperationError,
  isAppError,
  isOperationalError,
  type ErrorDetails,
} from './AppError.js';
