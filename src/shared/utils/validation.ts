/**
 * Validation Utilities
 *
 * Input checks shared by every repository. Each helper either returns the
 * canonical value or throws a ValidationError naming the operation.
 */
import { ValidationError } from '../errors/AppError.js';

/** Upper bound for a single page */
export const MAX_PER_PAGE = 1000;

const DIGITS = /^\d+$/;

/**
 * Validate and canonicalize an entity ID
 *
 * @example
 * validateId(123)   // 123
 * validateId('456') // 456
 * validateId('abc') // throws ValidationError
 */
export function validateId(id: unknown): number {
  if (id === null || id === undefined) {
    throw new ValidationError('ID cannot be empty');
  }

  let candidate = id;
  if (typeof candidate === 'string') {
    if (!candidate.trim()) {
      throw new ValidationError('ID cannot be empty string');
    }
    if (!DIGITS.test(candidate)) {
      throw new ValidationError(`Invalid ID format: '${candidate}' must be a positive integer`);
    }
    candidate = Number.parseInt(candidate, 10);
  }

  if (typeof candidate !== 'number' || !Number.isSafeInteger(candidate)) {
    throw new ValidationError(`ID must be an integer, got ${describeType(candidate)}`);
  }

  if (candidate <= 0) {
    throw new ValidationError(`ID must be positive, got ${candidate}`);
  }

  return candidate;
}

/**
 * Validate a field map for create/update
 * Entries whose value is null, undefined or '' are dropped
 */
export function validateFields<F extends object>(
  fields: Partial<F> | null | undefined,
  operation = 'operation'
): Partial<F> {
  if (fields === null || fields === undefined || typeof fields !== 'object' || Array.isArray(fields)) {
    throw new ValidationError(`No data provided for ${operation}`);
  }

  if (Object.keys(fields).length === 0) {
    throw new ValidationError(`No data provided for ${operation}`);
  }

  const cleaned: Partial<F> = { ...fields };
  for (const [key, value] of Object.entries(cleaned)) {
    if (value === null || value === undefined || value === '') {
      Reflect.deleteProperty(cleaned, key);
    }
  }

  if (Object.keys(cleaned).length === 0) {
    throw new ValidationError(`No valid data provided for ${operation} after cleaning`);
  }

  return cleaned;
}

/**
 * Validate a list of entity instances for bulk operations
 */
export function validateInstances<T>(
  instances: unknown,
  isInstance: (value: unknown) => value is T,
  operation = 'operation'
): T[] {
  if (!Array.isArray(instances)) {
    throw new ValidationError(`Instances must be a list for ${operation}`);
  }

  if (instances.length === 0) {
    throw new ValidationError(`Empty instances list provided for ${operation}`);
  }

  const validated: T[] = [];
  instances.forEach((instance: unknown, index) => {
    if (!isInstance(instance)) {
      throw new ValidationError(
        `Instance at index ${index} is not a valid entity, got ${describeType(instance)}`,
        { field: 'instances', value: index }
      );
    }
    validated.push(instance);
  });

  return validated;
}

/**
 * Validate a list of field names for bulk update
 * Returns trimmed names
 */
export function validateFieldNames(fields: unknown, operation = 'operation'): string[] {
  if (!Array.isArray(fields)) {
    throw new ValidationError(`Fields must be a list for ${operation}`);
  }

  if (fields.length === 0) {
    throw new ValidationError(`Empty fields list provided for ${operation}`);
  }

  return fields.map((field: unknown, index) => {
    if (typeof field !== 'string' || !field.trim()) {
      throw new ValidationError(
        `Field at index ${index} must be a non-empty string, got ${describeType(field)}`
      );
    }
    return field.trim();
  });
}

/**
 * Validate a batch size
 */
export function validateBatchSize(batchSize: unknown): number {
  if (!isInteger(batchSize) || batchSize <= 0) {
    throw new ValidationError(`Batch size must be a positive integer, got ${String(batchSize)}`);
  }
  return batchSize;
}

/**
 * Validate limit/offset for range fetches
 */
export function validateLimitOffset(
  limit: unknown,
  offset: unknown
): { limit: number | undefined; offset: number } {
  if (limit !== undefined && limit !== null && (!isInteger(limit) || limit <= 0)) {
    throw new ValidationError(`Limit must be a positive integer, got ${String(limit)}`);
  }

  if (!isInteger(offset) || offset < 0) {
    throw new ValidationError(`Offset must be a non-negative integer, got ${String(offset)}`);
  }

  return { limit: isInteger(limit) ? limit : undefined, offset };
}

/**
 * Validate page/perPage for pagination
 */
export function validatePagination(page: unknown, perPage: unknown): { page: number; perPage: number } {
  if (!isInteger(page) || page < 1) {
    throw new ValidationError(`Page must be a positive integer, got ${String(page)}`);
  }

  if (!isInteger(perPage) || perPage < 1) {
    throw new ValidationError(`Per-page count must be a positive integer, got ${String(perPage)}`);
  }

  if (perPage > MAX_PER_PAGE) {
    throw new ValidationError(
      `Per-page count too large, maximum is ${MAX_PER_PAGE}, got ${perPage}`
    );
  }

  return { page, perPage };
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && !Number.isInteger(value)) return 'float';
  return typeof value;
}
