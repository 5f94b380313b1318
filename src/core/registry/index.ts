/**
 * Registry exports barrel file.
 */
export * from './alias-table.js';
