/**
 * Runner exports barrel file.
 */
export * from './types.js';
export * from './lifecycle.js';
export * from './verify.js';
export * from './runner.js';
export * from './summary.js';
