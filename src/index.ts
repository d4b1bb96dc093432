/**
 * argmatch: command-line argument resolution.
 * Main library exports barrel file.
 */

// Tokens and styles
export * from './core/token/index.js';
export * from './core/style/index.js';

// Option registry
export * from './core/option/index.js';

// Matching
export * from './core/match/index.js';
export * from './core/invoke/index.js';

// Policies
export * from './core/policy/index.js';

// Parser facade
export * from './core/parser/index.js';

// Manifest
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
