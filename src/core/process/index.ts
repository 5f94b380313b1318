/**
 * Process exports barrel file.
 */
export * from './argv.js';
