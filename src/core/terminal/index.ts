/**
 * Terminal exports barrel file.
 */
export * from './terminal.js';
