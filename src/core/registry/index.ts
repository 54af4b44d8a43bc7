/**
 * Registry exports barrel file.
 */
export * from './schema.js';
export * from './example-registry.js';
