import chalk from 'chalk';
import type { RunResult, RunStatus } from '../../core/runner/types.js';
import { summarize } from '../../core/runner/summary.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatResult(result: RunResult): string {
    const lines: string[] = [];
    const status = this.colorize(result.status.toUpperCase(), STATUS_COLORS[result.status]);
    lines.push(`${this.getStatusIcon(result.status)} ${status}: ${result.name} ${this.colorize(`(${result.category})`, 'dim')}`);

    if (result.intent) {
      lines.push(`   ${this.colorize(result.intent, 'dim')}`);
    }

    if (result.failureReason) {
      const code = result.errorCode ? ` [${result.errorCode}]` : '';
      lines.push(`   ${this.colorize(`Reason${code}: ${result.failureReason}`, STATUS_COLORS[result.status])}`);
    }

    // Output is noise for passing examples unless asked for
    if (result.output.length > 0 && (this.options.verbose || result.status === 'failed')) {
      lines.push('   Output:');
      for (const line of result.output) {
        lines.push(`     | ${line}`);
      }
    }

    return lines.join('\n');
  }

  formatBatch(results: readonly RunResult[]): string {
    const lines: string[] = [];

    for (const result of results) {
      lines.push(this.formatResult(result));
      lines.push('');
    }

    lines.push(this.formatSummary(results));
    return lines.join('\n');
  }

  private formatSummary(results: readonly RunResult[]): string {
    const summary = summarize(results);
    const successText = this.colorize(`${summary.success} succeeded`, 'green');
    const failedText = this.colorize(`${summary.failed} failed`, 'red');
    const erroredText = this.colorize(`${summary.errored} errored`, 'yellow');

    return [
      '═'.repeat(60),
      `SUMMARY: ${successText}, ${failedText}, ${erroredText}`,
      `Total examples: ${summary.total}`,
    ].join('\n');
  }

  private getStatusIcon(status: RunStatus): string {
    switch (status) {
      case 'success':
        return this.colorize('✓', 'green');
      case 'failed':
        return this.colorize('✗', 'red');
      case 'errored':
        return this.colorize('⚠', 'yellow');
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

const STATUS_COLORS: Record<RunStatus, Color> = {
  success: 'green',
  failed: 'red',
  errored: 'yellow',
};
