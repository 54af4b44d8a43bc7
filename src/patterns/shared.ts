/**
 * Helpers shared by the built-in examples.
 */

/**
 * Return a collaborator created by setup(), or fail when setup() was skipped.
 */
export function requireSetup<T>(value: T | undefined, example: string): T {
  if (value === undefined) {
    throw new Error(`${example}: setup() has not been called`);
  }
  return value;
}
