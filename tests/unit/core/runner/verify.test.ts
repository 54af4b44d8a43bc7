import { describe, it, expect } from 'vitest';
import { findMismatch, isStringArray } from '../../../../src/core/runner/verify.js';

describe('findMismatch', () => {
  it('returns null for identical lines', () => {
    expect(findMismatch(['a', 'b'], ['a', 'b'])).toBeNull();
  });

  it('returns null for two empty outputs', () => {
    expect(findMismatch([], [])).toBeNull();
  });

  it('reports the first differing line', () => {
    const mismatch = findMismatch(['a', 'b', 'c'], ['a', 'x', 'y']);

    expect(mismatch?.line).toBe(2);
    expect(mismatch?.expected).toBe('b');
    expect(mismatch?.actual).toBe('x');
    expect(mismatch?.message).toBe('line 2: expected "b", got "x"');
  });

  it('reports a missing line', () => {
    expect(findMismatch(['a', 'b'], ['a'])?.message).toBe('line 2: expected "b", got nothing');
  });

  it('reports an extra line', () => {
    expect(findMismatch([], ['surprise'])?.message).toBe('line 1: unexpected extra line "surprise"');
  });

  it('compares whitespace exactly', () => {
    expect(findMismatch(['a b'], ['a  b'])?.line).toBe(1);
  });
});

describe('isStringArray', () => {
  it('accepts string arrays', () => {
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(['a', 'b'])).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isStringArray('a')).toBe(false);
    expect(isStringArray(['a', 1])).toBe(false);
    expect(isStringArray(undefined)).toBe(false);
  });

  it('rejects arrays with holes', () => {
    expect(isStringArray(new Array<string>(2))).toBe(false);
    expect(isStringArray(['a', , 'c'])).toBe(false);
  });
});
