/**
 * Built-in pattern catalogue exports.
 */
export { builtInExamples, registerBuiltInExamples, DEFAULT_SEED } from './register.js';
export type { BuiltInOptions } from './register.js';
export { getSettingsStore } from './creational/singleton.js';
export { visit } from './behavioral/visitor.js';
