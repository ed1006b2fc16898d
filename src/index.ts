/**
 * packscan - pack boundary checks for Ruby monorepos.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Parsing
export * from './parser/index.js';

// Scanning
export * from './core/scanner/index.js';

// Packs
export * from './core/packs/index.js';

// Cache
export * from './core/cache/index.js';

// Checking
export * from './core/checker/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
