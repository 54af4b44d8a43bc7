/**
 * Compact output formatter for CI and scripts.
 * One tab-separated line per result, then a summary line.
 */
import type { RunResult, RunStatus } from '../../core/runner/types.js';
import { summarize } from '../../core/runner/summary.js';
import type { IFormatter } from './types.js';

const STATUS_LABELS: Record<RunStatus, string> = {
  success: 'SUCCESS',
  failed: 'FAILED',
  errored: 'ERRORED',
};

/**
 * Format: STATUS<TAB>name<TAB>detail
 * Detail is the intent on success and the failure reason otherwise.
 */
export class CompactFormatter implements IFormatter {
  formatResult(result: RunResult): string {
    const detail = result.status === 'success' ? result.intent : result.failureReason;
    return [STATUS_LABELS[result.status], singleLine(result.name), singleLine(detail ?? '')].join('\t');
  }

  formatBatch(results: readonly RunResult[]): string {
    const lines = results.map((result) => this.formatResult(result));
    const summary = summarize(results);
    lines.push(
      `TOTAL=${summary.total} SUCCESS=${summary.success} FAILED=${summary.failed} ERRORED=${summary.errored}`
    );
    return lines.join('\n');
  }
}

/**
 * Collapse whitespace runs (tabs and newlines included) so a field never breaks the line format.
 */
function singleLine(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed || '-';
}
