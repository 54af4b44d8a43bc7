/**
 * patternbench: a harness that registers, runs and verifies design-pattern examples.
 * Main library exports barrel file.
 */

// Contract
export * from './core/contract/index.js';

// Registry
export * from './core/registry/index.js';

// Runner
export * from './core/runner/index.js';

// Configuration
export * from './core/config/index.js';

// Built-in examples
export * from './patterns/index.js';

// Reporting
export * from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
