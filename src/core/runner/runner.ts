/**
 * Drives example execution and normalizes every outcome into a RunResult.
 */
import type { ExampleDefinition, PatternExample } from '../contract/types.js';
import type { ExampleRegistry } from '../registry/example-registry.js';
import { ErrorCodes, SetupError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { RunLifecycle } from './lifecycle.js';
import { findMismatch, isStringArray } from './verify.js';
import type { RunAllOptions, RunResult, RunState, RunnerOptions } from './types.js';

export const DEFAULT_TIME_BUDGET_MS = 1000;

const log = logger.child('runner');

interface Outcome {
  state: Extract<RunState, 'succeeded' | 'failed' | 'errored'>;
  code?: string;
  reason?: string;
}

export class ExampleRunner {
  private readonly timeBudgetMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly registry: ExampleRegistry,
    options: RunnerOptions = {}
  ) {
    this.timeBudgetMs = options.timeBudgetMs ?? DEFAULT_TIME_BUDGET_MS;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Run a single example by name.
   * Unknown names throw NotFoundError before anything executes; every other
   * failure is captured in the returned result.
   */
  runOne(name: string): RunResult {
    return this.execute(this.registry.lookup(name));
  }

  /**
   * Run every registered example sequentially, in registration order.
   * Closes registration first. One result per example, whatever the individual outcomes.
   */
  runAll(options: RunAllOptions = {}): RunResult[] {
    this.registry.seal();

    const examples = options.category
      ? this.registry.byCategory(options.category)
      : this.registry.all();

    const results: RunResult[] = [];
    for (const example of examples) {
      results.push(this.execute(example));
    }
    return results;
  }

  private execute(definition: ExampleDefinition): RunResult {
    const lifecycle = new RunLifecycle();
    const started = this.clock();
    let intent: string | undefined;
    let output: readonly string[] = [];

    const finish = (outcome: Outcome): RunResult => {
      lifecycle.transition(outcome.state);
      const result: RunResult = Object.freeze({
        name: definition.name,
        category: definition.category,
        status: lifecycle.status(),
        output: Object.freeze([...output]),
        ...(outcome.reason !== undefined ? { failureReason: outcome.reason } : {}),
        ...(outcome.code !== undefined ? { errorCode: outcome.code } : {}),
        ...(intent !== undefined ? { intent } : {}),
        durationMs: this.clock() - started,
        trace: Object.freeze([...lifecycle.trace]),
      });
      log.debug(`${definition.name}: ${lifecycle.trace.join(' → ')}`);
      return result;
    };

    lifecycle.transition('setup');
    let example: PatternExample;
    try {
      example = definition.factory();
      intent = this.describe(example, definition.name);
      example.setup();
    } catch (error) {
      return finish({
        state: 'errored',
        code: error instanceof SetupError ? error.code : ErrorCodes.SETUP_FAILED,
        reason: `setup failed: ${getErrorMessage(error)}`,
      });
    }

    lifecycle.transition('running');
    let produced: unknown;
    try {
      produced = example.run();
    } catch (error) {
      return finish({
        state: 'errored',
        code: ErrorCodes.RUN_FAILED,
        reason: `run failed: ${getErrorMessage(error)}`,
      });
    }

    if (!isStringArray(produced)) {
      return finish({
        state: 'errored',
        code: ErrorCodes.INVALID_OUTPUT,
        reason: 'run() did not return a list of strings',
      });
    }
    output = produced;

    const elapsed = this.clock() - started;
    if (elapsed > this.timeBudgetMs) {
      return finish({
        state: 'errored',
        code: ErrorCodes.TIME_BUDGET_EXCEEDED,
        reason: `exceeded time budget of ${this.timeBudgetMs}ms (took ${Math.round(elapsed)}ms)`,
      });
    }

    if (definition.expectedOutcome) {
      const mismatch = findMismatch(definition.expectedOutcome, output);
      if (mismatch) {
        return finish({ state: 'failed', code: mismatch.code, reason: mismatch.message });
      }
    }

    return finish({ state: 'succeeded' });
  }

  /**
   * Intent is reporting-only; an example whose describe() throws still runs.
   */
  private describe(example: PatternExample, name: string): string | undefined {
    try {
      return example.describe().intent;
    } catch (error) {
      log.warn(`${name}: describe() failed: ${getErrorMessage(error)}`);
      return undefined;
    }
  }
}
