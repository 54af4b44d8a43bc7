/**
 * Tests for the run command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createRunCommand } from '../../../../src/cli/commands/run.js';
import { ExitCodes } from '../../../../src/cli/runtime.js';
import { registerBuiltInExamples } from '../../../../src/patterns/register.js';
import { SetupError } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';
import { fakeDefinition } from '../../../helpers/examples.js';
import { testRuntime } from '../../../helpers/runtime.js';

vi.mock('../../../../src/utils/logger.js', () => {
  const log = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), setLevel: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

describe('run command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    process.exitCode = undefined;
  });

  const strategyOk = fakeDefinition('Strategy', { lines: ['paid 15 with credit card'] }, {
    expectedOutcome: ['paid 15 with credit card'],
  });
  const strategyBroken = fakeDefinition('Strategy', { lines: ['paid 10 with credit card'] }, {
    expectedOutcome: ['paid 15 with credit card'],
  });
  const singleton = fakeDefinition('Singleton', { lines: ['same instance: true'] }, { category: 'creational' });

  describe('command structure', () => {
    it('should create command with correct name and options', () => {
      const command = createRunCommand(testRuntime([]).runtime);

      expect(command.name()).toBe('run');
      const longs = command.options.map((o) => o.long);
      expect(longs).toContain('--all');
      expect(longs).toContain('--name');
      expect(longs).toContain('--format');
      expect(longs).toContain('--config');
    });
  });

  describe('--all', () => {
    it('should print one line per example and the summary', async () => {
      const { runtime } = testRuntime([singleton, strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        [
          'SUCCESS\tSingleton\tSingleton intent',
          'SUCCESS\tStrategy\tStrategy intent',
          'TOTAL=2 SUCCESS=2 FAILED=0 ERRORED=0',
        ].join('\n')
      );
      expect(process.exitCode).toBe(ExitCodes.SUCCESS);
    });

    it('should exit 1 when any example does not succeed', async () => {
      const failing = fakeDefinition('Proxy', {
        setup: () => {
          throw new SetupError('image server unavailable');
        },
      });
      const { runtime } = testRuntime([singleton, failing, strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith(
        [
          'SUCCESS\tSingleton\tSingleton intent',
          'ERRORED\tProxy\tsetup failed: image server unavailable',
          'SUCCESS\tStrategy\tStrategy intent',
          'TOTAL=3 SUCCESS=2 FAILED=0 ERRORED=1',
        ].join('\n')
      );
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });

    it('should filter by category', async () => {
      const { runtime } = testRuntime([singleton, strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all', '--category', 'creational'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith(
        'SUCCESS\tSingleton\tSingleton intent\nTOTAL=1 SUCCESS=1 FAILED=0 ERRORED=0'
      );
    });

    it('should reject an unknown category', async () => {
      const { runtime, registerExamples } = testRuntime([singleton]);

      await createRunCommand(runtime).parseAsync(['--all', '--category', 'mystical'], { from: 'user' });

      expect(logger.error).toHaveBeenCalledWith(
        'Unknown category "mystical" (expected creational, structural or behavioral)'
      );
      expect(registerExamples).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });

    it('should print JSON when asked', async () => {
      const { runtime } = testRuntime([strategyBroken]);

      await createRunCommand(runtime).parseAsync(['--all', '--format', 'json'], { from: 'user' });

      const printed = consoleLogSpy.mock.calls[0][0];
      expect(typeof printed).toBe('string');
      const report = JSON.parse(String(printed));
      expect(report.summary).toEqual({ total: 1, success: 0, failed: 1, errored: 0 });
      expect(report.results[0].failure_reason).toBe(
        'line 1: expected "paid 15 with credit card", got "paid 10 with credit card"'
      );
    });

    it('should reject an unknown format', async () => {
      const { runtime } = testRuntime([singleton]);

      await createRunCommand(runtime).parseAsync(['--all', '--format', 'xml'], { from: 'user' });

      expect(logger.error).toHaveBeenCalledWith('Unknown output format "xml" (expected compact, human or json)');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });

    it('should run every built-in example successfully', async () => {
      const { runtime } = testRuntime([]);
      runtime.registerExamples = (registry) => registerBuiltInExamples(registry);

      await createRunCommand(runtime).parseAsync(['--all'], { from: 'user' });

      const lines = String(consoleLogSpy.mock.calls[0][0]).split('\n');
      expect(lines).toHaveLength(24);
      expect(lines[23]).toBe('TOTAL=23 SUCCESS=23 FAILED=0 ERRORED=0');
      expect(process.exitCode).toBe(ExitCodes.SUCCESS);
    });
  });

  describe('--name', () => {
    it('should exit 0 for a succeeding example', async () => {
      const { runtime } = testRuntime([singleton, strategyOk]);

      await createRunCommand(runtime).parseAsync(['--name', 'Strategy'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith(
        'SUCCESS\tStrategy\tStrategy intent\nTOTAL=1 SUCCESS=1 FAILED=0 ERRORED=0'
      );
      expect(process.exitCode).toBe(ExitCodes.SUCCESS);
    });

    it('should exit 1 for a failing example', async () => {
      const { runtime } = testRuntime([strategyBroken]);

      await createRunCommand(runtime).parseAsync(['--name', 'Strategy'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith(
        'FAILED\tStrategy\tline 1: expected "paid 15 with credit card", got "paid 10 with credit card"\n' +
          'TOTAL=1 SUCCESS=0 FAILED=1 ERRORED=0'
      );
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });

    it('should exit 2 for an unknown name', async () => {
      const { runtime } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--name', 'NoSuchPattern'], { from: 'user' });

      expect(logger.error).toHaveBeenCalledWith('No example registered under "NoSuchPattern"');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCodes.NOT_FOUND);
    });

    it('should not combine with --category', async () => {
      const { runtime } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--name', 'Strategy', '--category', 'behavioral'], {
        from: 'user',
      });

      expect(logger.error).toHaveBeenCalledWith('--category can only be combined with --all');
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });
  });

  describe('usage errors', () => {
    it('should require --all or --name', async () => {
      const { runtime, registerExamples } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync([], { from: 'user' });

      expect(logger.error).toHaveBeenCalledWith('Specify exactly one of --all or --name <pattern>');
      expect(registerExamples).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });

    it('should reject both --all and --name', async () => {
      const { runtime } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all', '--name', 'Strategy'], { from: 'user' });

      expect(logger.error).toHaveBeenCalledWith('Specify exactly one of --all or --name <pattern>');
      expect(process.exitCode).toBe(ExitCodes.FAILURE);
    });
  });

  describe('registration', () => {
    it('should register once and close registration', async () => {
      const { runtime, registerExamples } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--name', 'Strategy'], { from: 'user' });
      await createRunCommand(runtime).parseAsync(['--all'], { from: 'user' });

      expect(registerExamples).toHaveBeenCalledTimes(1);
      expect(runtime.registry.isSealed).toBe(true);
    });

    it('should use debug logging with --verbose', async () => {
      const { runtime } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all', '--verbose'], { from: 'user' });

      expect(logger.setLevel).toHaveBeenCalledWith('debug');
    });

    it('should default to the configured log level', async () => {
      const { runtime } = testRuntime([strategyOk]);

      await createRunCommand(runtime).parseAsync(['--all'], { from: 'user' });

      expect(logger.setLevel).toHaveBeenCalledWith('warn');
    });
  });
});
