/**
 * argwise - a minimal command line argument parser.
 * Main library exports barrel file.
 */

// Parser
export * from './core/parser/index.js';

// Configuration
export * from './core/config/index.js';

// Building blocks
export * from './core/stream/index.js';
export * from './core/registry/index.js';
export * from './core/terminal/index.js';
export * from './core/process/index.js';

// Utilities
export * from './utils/index.js';
