/**
 * Contract exports barrel file.
 */
export * from './types.js';
