/**
 * Parser exports barrel file.
 */
export * from './types.js';
export * from './parser.js';
