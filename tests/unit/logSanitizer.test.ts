import { describe, it, expect } from 'vitest';
import { sanitizeLogData, isSensitiveKey } from '../../src/shared/utils/logSanitizer.js';

describe('sanitizeLogData', () => {
  it('should redact sensitive keys at any depth', () => {
    const sanitized = sanitizeLogData({
      name: 'KYC',
      password: 'test-secret',
      filters: { apiKey: 'test-secret', status: 'active' },
      list: [{ authToken: 'test-secret' }],
    });

    expect(sanitized).toEqual({
      name: 'KYC',
      password: '[REDACTED]',
      filters: { apiKey: '[REDACTED]', status: 'active' },
      list: [{ authToken: '[REDACTED]' }],
    });
  });

  it('should truncate strings longer than 100 characters', () => {
    const long = 'a'.repeat(150);
    expect(sanitizeLogData(long)).toBe(`${'a'.repeat(100)}...[TRUNCATED]`);
    expect(sanitizeLogData('a'.repeat(100))).toBe('a'.repeat(100));
  });

  it('should pass scalars and class instances through', () => {
    const date = new Date('2025-01-01T00:00:00.000Z');
    expect(sanitizeLogData(42)).toBe(42);
    expect(sanitizeLogData(null)).toBeNull();
    expect(sanitizeLogData(date)).toBe(date);
  });
});

describe('isSensitiveKey', () => {
  it('should match case-insensitively on substrings', () => {
    expect(isSensitiveKey('DB_PASSWORD')).toBe(true);
    expect(isSensitiveKey('monkey')).toBe(true);
    expect(isSensitiveKey('Authorization')).toBe(true);
    expect(isSensitiveKey('name')).toBe(false);
  });
});
