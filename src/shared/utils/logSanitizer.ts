/**
 * Log payload sanitization
 *
 * Applied to caller-supplied data (ids, filters, field maps) before any log call.
 */

export const REDACTED = '[REDACTED]';
export const TRUNCATED = '...[TRUNCATED]';
export const MAX_LOG_STRING_LENGTH = 100;

const SENSITIVE_KEY_PARTS = ['password', 'token', 'secret', 'key', 'api_key', 'auth', 'credential'];

/**
 * Whether a mapping key names a sensitive value
 */
export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

/**
 * Recursively redact sensitive keys and truncate long strings
 *
 * @example
 * sanitizeLogData({ name: 'KYC', apiKey: 'abc' }) // { name: 'KYC', apiKey: '[REDACTED]' }
 */
export function sanitizeLogData(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map((item: unknown) => sanitizeLogData(item));
  }

  if (isPlainObject(data)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeLogData(value);
    }
    return sanitized;
  }

  if (typeof data === 'string' && data.length > MAX_LOG_STRING_LENGTH) {
    return data.slice(0, MAX_LOG_STRING_LENGTH) + TRUNCATED;
  }

  return data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
