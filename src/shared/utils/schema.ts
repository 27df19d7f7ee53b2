import { z } from 'zod';
import { ValidationError, type ErrorDetails } from '../errors/AppError.js';

/**
 * Format Zod issues as error details
 */
export function formatZodIssues(error: z.ZodError): ErrorDetails[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.'),
    constraint: issue.message,
  }));
}

/**
 * Parse input against a schema, raising ValidationError on failure
 */
export function parseInput<S extends z.ZodType>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatZodIssues(result.error));
  }
  return result.data;
}
