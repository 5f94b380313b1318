/**
 * Token stream exports barrel file.
 */
export * from './token-stream.js';
