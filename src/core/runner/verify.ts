/**
 * Output verification against an expected outcome.
 */
import { FailureMismatch } from '../../utils/errors.js';

/**
 * Compare produced lines with expected lines.
 * Returns the first mismatch, or null when they are identical.
 */
export function findMismatch(
  expected: readonly string[],
  actual: readonly string[]
): FailureMismatch | null {
  const length = Math.max(expected.length, actual.length);
  for (let i = 0; i < length; i++) {
    const want: string | undefined = expected[i];
    const got: string | undefined = actual[i];
    if (want !== got) {
      return new FailureMismatch(i + 1, want, got);
    }
  }
  return null;
}

/**
 * True for dense arrays of strings. Holes count as non-strings.
 */
export function isStringArray(value: unknown): value is readonly string[] {
  if (!Array.isArray(value)) return false;
  for (let i = 0; i < value.length; i++) {
    if (typeof value[i] !== 'string') return false;
  }
  return true;
}
