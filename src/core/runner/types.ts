/**
 * Run result types.
 */
import type { Category } from '../contract/types.js';

/**
 * Lifecycle states of one example run.
 * succeeded, failed and errored are terminal.
 */
export type RunState = 'pending' | 'setup' | 'running' | 'succeeded' | 'failed' | 'errored';

export type RunStatus = 'success' | 'failed' | 'errored';

/**
 * Outcome of executing one example. Frozen at creation.
 */
export interface RunResult {
  readonly name: string;
  readonly category: Category;
  readonly status: RunStatus;
  /** Lines produced by run(); empty when run() never returned */
  readonly output: readonly string[];
  /** Present iff status is not 'success' */
  readonly failureReason?: string;
  /** Error code behind a non-success status */
  readonly errorCode?: string;
  /** One-line intent from describe(), when it could be obtained */
  readonly intent?: string;
  readonly durationMs: number;
  /** States visited, in order */
  readonly trace: readonly RunState[];
}

export interface RunSummary {
  total: number;
  success: number;
  failed: number;
  errored: number;
}

export interface RunnerOptions {
  /** Soft per-example budget for setup + run, in milliseconds */
  timeBudgetMs?: number;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
}

export interface RunAllOptions {
  /** Only run examples of this category */
  category?: Category;
}
