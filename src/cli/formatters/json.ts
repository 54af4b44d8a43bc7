import type { RunResult } from '../../core/runner/types.js';
import { summarize } from '../../core/runner/summary.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private transform(result: RunResult): Record<string, unknown> {
    return {
      name: result.name,
      category: result.category,
      status: result.status,
      intent: result.intent ?? null,
      output: result.output,
      failure_reason: result.failureReason ?? null,
      error_code: result.errorCode ?? null,
      duration_ms: Math.round(result.durationMs),
      trace: result.trace,
    };
  }

  formatResult(result: RunResult): string {
    return JSON.stringify(this.transform(result), null, 2);
  }

  formatBatch(results: readonly RunResult[]): string {
    return JSON.stringify(
      {
        summary: summarize(results),
        results: results.map((result) => this.transform(result)),
      },
      null,
      2
    );
  }
}
