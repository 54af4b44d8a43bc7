/**
 * CLI command that runs one or all examples and prints a report.
 */
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { isCategory, type Category } from '../../core/contract/types.js';
import { ExampleRunner } from '../../core/runner/runner.js';
import { allSucceeded } from '../../core/runner/summary.js';
import type { RunResult } from '../../core/runner/types.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import {
  ExitCodes,
  createDefaultRuntime,
  exitCodeForError,
  prepare,
  type CliRuntime,
  type CommonOptions,
  type ExitCode,
} from '../runtime.js';

export interface RunCommandOptions extends CommonOptions {
  all?: boolean;
  name?: string;
  category?: string;
  format?: string;
  color: boolean;
}

/**
 * Create the run command.
 */
export function createRunCommand(runtime: CliRuntime = createDefaultRuntime()): Command {
  return new Command('run')
    .description('Run pattern examples and report the outcome')
    .option('--all', 'Run every registered example')
    .option('--name <pattern>', 'Run a single example by name')
    .option('--category <category>', 'With --all, only run one category (creational, structural, behavioral)')
    .option('-f, --format <format>', 'Output format: compact, human, or json')
    .option('--no-color', 'Disable colors in human output')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--verbose', 'Debug logging; human format also shows every output line')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runExamples(runtime, options);
    });
}

/**
 * Execute the run command.
 * 0 when every attempted example succeeded, 1 otherwise, 2 for an unknown --name.
 */
export async function runExamples(runtime: CliRuntime, options: RunCommandOptions): Promise<ExitCode> {
  if (Boolean(options.all) === Boolean(options.name)) {
    log.error('Specify exactly one of --all or --name <pattern>');
    return ExitCodes.FAILURE;
  }

  let category: Category | undefined;
  if (options.category !== undefined) {
    if (options.name) {
      log.error('--category can only be combined with --all');
      return ExitCodes.FAILURE;
    }
    if (!isCategory(options.category)) {
      log.error(`Unknown category "${options.category}" (expected creational, structural or behavioral)`);
      return ExitCodes.FAILURE;
    }
    category = options.category;
  }

  try {
    const config = await prepare(runtime, options);

    const format = OutputFormatSchema.safeParse(options.format ?? config.output.format);
    if (!format.success) {
      log.error(`Unknown output format "${options.format}" (expected compact, human or json)`);
      return ExitCodes.FAILURE;
    }

    const runner = new ExampleRunner(runtime.registry, {
      timeBudgetMs: config.run.time_budget_ms,
    });

    let results: RunResult[];
    if (options.name) {
      results = [runner.runOne(options.name)];
    } else {
      results = runner.runAll({ category });
    }

    const formatter = createFormatter({
      format: format.data,
      colors: options.color && config.output.colors,
      verbose: Boolean(options.verbose) || config.output.verbose,
    });
    console.log(formatter.formatBatch(results));

    return allSucceeded(results) ? ExitCodes.SUCCESS : ExitCodes.FAILURE;
  } catch (error) {
    return exitCodeForError(error);
  }
}
