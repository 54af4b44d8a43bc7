/**
 * Formatter type definitions.
 */
import type { RunResult } from '../../core/runner/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show produced output lines for every result */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 * Implementations are pure: same results in, same text out.
 */
export interface IFormatter {
  /**
   * Format a single run result.
   */
  formatResult(result: RunResult): string;

  /**
   * Format a batch of results followed by a summary.
   */
  formatBatch(results: readonly RunResult[]): string;
}
