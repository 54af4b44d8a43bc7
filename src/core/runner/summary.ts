import type { RunResult, RunSummary } from './types.js';

/**
 * Count results by status.
 */
export function summarize(results: readonly RunResult[]): RunSummary {
  const summary: RunSummary = { total: results.length, success: 0, failed: 0, errored: 0 };
  for (const result of results) {
    if (result.status === 'success') summary.success++;
    else if (result.status === 'failed') summary.failed++;
    else summary.errored++;
  }
  return summary;
}

export function allSucceeded(results: readonly RunResult[]): boolean {
  return results.every((result) => result.status === 'success');
}
