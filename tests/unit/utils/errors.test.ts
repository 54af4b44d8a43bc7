/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  HarnessError,
  ConfigError,
  RegistryError,
  DuplicateNameError,
  NotFoundError,
  SetupError,
  FailureMismatch,
  ErrorCodes,
  getErrorMessage,
} from '../../../src/utils/errors.js';

describe('HarnessError', () => {
  it('should create error with code and message', () => {
    const error = new HarnessError('X001', 'Test error message');

    expect(error.code).toBe('X001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('HarnessError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new HarnessError('X001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'HarnessError',
      code: 'X001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('error subclasses', () => {
  it('ConfigError keeps the given code', () => {
    const error = new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'bad config');
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('S002');
    expect(error).toBeInstanceOf(HarnessError);
  });

  it('DuplicateNameError is a RegistryError naming the example', () => {
    const error = new DuplicateNameError('Singleton');

    expect(error).toBeInstanceOf(RegistryError);
    expect(error.name).toBe('DuplicateNameError');
    expect(error.code).toBe(ErrorCodes.DUPLICATE_NAME);
    expect(error.exampleName).toBe('Singleton');
    expect(error.message).toBe('Example "Singleton" is already registered');
  });

  it('NotFoundError is a RegistryError naming the example', () => {
    const error = new NotFoundError('NoSuchPattern');

    expect(error).toBeInstanceOf(RegistryError);
    expect(error.code).toBe(ErrorCodes.NOT_FOUND);
    expect(error.message).toBe('No example registered under "NoSuchPattern"');
  });

  it('SetupError uses the setup failure code', () => {
    const error = new SetupError('database offline');
    expect(error.code).toBe(ErrorCodes.SETUP_FAILED);
    expect(error.name).toBe('SetupError');
  });
});

describe('FailureMismatch', () => {
  it('describes a changed line', () => {
    const error = new FailureMismatch(1, 'paid 15 with credit card', 'paid 10 with credit card');

    expect(error.code).toBe(ErrorCodes.OUTPUT_MISMATCH);
    expect(error.message).toBe(
      'line 1: expected "paid 15 with credit card", got "paid 10 with credit card"'
    );
    expect(error.line).toBe(1);
  });

  it('describes a missing line', () => {
    expect(new FailureMismatch(3, 'done', undefined).message).toBe('line 3: expected "done", got nothing');
  });

  it('describes an extra line', () => {
    expect(new FailureMismatch(2, undefined, 'surplus').message).toBe('line 2: unexpected extra line "surplus"');
  });
});

describe('getErrorMessage', () => {
  it('reads Error messages, strings and unknown values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('Unknown error');
  });
});
