import { describe, it, expect } from 'vitest';
import { RunLifecycle } from '../../../../src/core/runner/lifecycle.js';
import { ErrorCodes, HarnessError } from '../../../../src/utils/errors.js';

describe('RunLifecycle', () => {
  it('starts pending', () => {
    const lifecycle = new RunLifecycle();

    expect(lifecycle.state).toBe('pending');
    expect(lifecycle.trace).toEqual(['pending']);
    expect(lifecycle.isTerminal).toBe(false);
  });

  it('records every state visited', () => {
    const lifecycle = new RunLifecycle();

    lifecycle.transition('setup');
    lifecycle.transition('running');
    lifecycle.transition('failed');

    expect(lifecycle.trace).toEqual(['pending', 'setup', 'running', 'failed']);
    expect(lifecycle.isTerminal).toBe(true);
    expect(lifecycle.status()).toBe('failed');
  });

  it('allows erroring out of setup', () => {
    const lifecycle = new RunLifecycle();

    lifecycle.transition('setup');
    lifecycle.transition('errored');

    expect(lifecycle.status()).toBe('errored');
  });

  it('maps succeeded to success', () => {
    const lifecycle = new RunLifecycle();

    lifecycle.transition('setup');
    lifecycle.transition('running');
    lifecycle.transition('succeeded');

    expect(lifecycle.status()).toBe('success');
  });

  it('rejects skipping setup', () => {
    const lifecycle = new RunLifecycle();

    expect(() => lifecycle.transition('running')).toThrow('Illegal run state transition: pending → running');
    expect(lifecycle.state).toBe('pending');
  });

  it('rejects leaving a terminal state', () => {
    const lifecycle = new RunLifecycle();
    lifecycle.transition('setup');
    lifecycle.transition('errored');

    let caught: unknown;
    try {
      lifecycle.transition('running');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HarnessError);
    expect(caught).toMatchObject({ code: ErrorCodes.ILLEGAL_TRANSITION });
  });

  it('has no status before finishing', () => {
    const lifecycle = new RunLifecycle();
    lifecycle.transition('setup');

    expect(() => lifecycle.status()).toThrow('Run has not finished (state: setup)');
  });
});
