/**
 * Tests for the list command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createListCommand } from '../../../../src/cli/commands/list.js';
import { ExitCodes } from '../../../../src/cli/runtime.js';
import { logger } from '../../../../src/utils/logger.js';
import { fakeDefinition } from '../../../helpers/examples.js';
import { testRuntime } from '../../../helpers/runtime.js';

vi.mock('../../../../src/utils/logger.js', () => {
  const log = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), setLevel: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

describe('list command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  const definitions = [
    fakeDefinition('Singleton', {}, { category: 'creational' }),
    fakeDefinition('Adapter', {}, { category: 'structural' }),
    fakeDefinition('Builder', {}, { category: 'creational' }),
  ];

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('should list names and categories in registration order', async () => {
    const { runtime } = testRuntime(definitions);

    await createListCommand(runtime).parseAsync([], { from: 'user' });

    expect(consoleLogSpy.mock.calls).toEqual([
      ['Singleton\tcreational'],
      ['Adapter\tstructural'],
      ['Builder\tcreational'],
    ]);
    expect(process.exitCode).toBe(ExitCodes.SUCCESS);
  });

  it('should filter by category', async () => {
    const { runtime } = testRuntime(definitions);

    await createListCommand(runtime).parseAsync(['--category', 'creational'], { from: 'user' });

    expect(consoleLogSpy.mock.calls).toEqual([['Singleton\tcreational'], ['Builder\tcreational']]);
  });

  it('should output JSON', async () => {
    const { runtime } = testRuntime(definitions.slice(0, 2));

    await createListCommand(runtime).parseAsync(['--json'], { from: 'user' });

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual([
      { name: 'Singleton', category: 'creational' },
      { name: 'Adapter', category: 'structural' },
    ]);
  });

  it('should reject an unknown category', async () => {
    const { runtime } = testRuntime(definitions);

    await createListCommand(runtime).parseAsync(['--category', 'mystical'], { from: 'user' });

    expect(logger.error).toHaveBeenCalledWith(
      'Unknown category "mystical" (expected creational, structural or behavioral)'
    );
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(ExitCodes.FAILURE);
  });

  it('should print nothing for an empty registry', async () => {
    const { runtime } = testRuntime([]);

    await createListCommand(runtime).parseAsync([], { from: 'user' });

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(ExitCodes.SUCCESS);
  });
});
