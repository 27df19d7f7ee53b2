export * from './validation.js';
export * from './logSanitizer.js';
export * from './schema.js';
