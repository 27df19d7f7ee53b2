import type { Logger as PinoLogger } from 'pino';
import pino from 'pino';
import config from '../../config/env.js';

export type Logger = PinoLogger;

/**
 * Sensitive data paths to redact from logs
 * Repositories sanitize their own payloads; these paths catch anything that slips past
 */
const REDACT_PATHS = [
  // Authentication & Tokens
  'password',
  'token',
  'accessToken',
  'refreshToken',
  'apiKey',
  'api_key',
  'secret',
  'authorization',
  'credential',
  'credentials',

  // Nested one level deep (filters, fields, data)
  '*.password',
  '*.token',
  '*.apiKey',
  '*.api_key',
  '*.secret',
  '*.authorization',
  '*.credential',

  // KYC identity documents
  'nationalId',
  'passportNumber',
  'socialSecurityNumber',
  'dateOfBirth',

  // Infrastructure secrets
  'connectionString',
  'DB_PASSWORD',
  'REDIS_PASSWORD',
];

/**
 * Singleton Logger Factory
 * Creates a single logger instance for the entire application
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = this.createLogger();
    }
    return this.instance;
  }

  private static createLogger(): Logger {
    const isDevelopment = config.NODE_ENV === 'development';
    const isTest = config.NODE_ENV === 'test';

    if (isTest) {
      return pino({ level: 'silent' });
    }

    if (isDevelopment) {
      return pino({
        level: config.LOG_LEVEL,
        redact: {
          paths: REDACT_PATHS,
          censor: '[REDACTED]',
        },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false,
          },
        },
      });
    }

    return pino({
      level: config.LOG_LEVEL,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        env: config.NODE_ENV,
      },
    });
  }

  /**
   * Create a child logger with additional context
   */
  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }

  /**
   * Reset the logger instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
  }
}

const logger = LoggerFactory.getInstance();

export default logger;
export { LoggerFactory };
