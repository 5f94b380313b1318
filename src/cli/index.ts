/**
 * CLI exports barrel file.
 */
export * from './argtest.js';
