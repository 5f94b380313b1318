/**
 * Utility exports barrel file.
 */
export * from './errors.js';
export * from './logger.js';
