/**
 * List registered examples in registration order.
 */
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { isCategory } from '../../core/contract/types.js';
import { logger as log } from '../../utils/logger.js';
import {
  ExitCodes,
  createDefaultRuntime,
  exitCodeForError,
  prepare,
  type CliRuntime,
  type CommonOptions,
  type ExitCode,
} from '../runtime.js';

export interface ListCommandOptions extends CommonOptions {
  category?: string;
  json?: boolean;
}

/**
 * Create the list command.
 */
export function createListCommand(runtime: CliRuntime = createDefaultRuntime()): Command {
  return new Command('list')
    .description('List registered examples with their category')
    .option('--category <category>', 'Only list one category')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--verbose', 'Debug logging')
    .action(async (options: ListCommandOptions) => {
      process.exitCode = await listExamples(runtime, options);
    });
}

export async function listExamples(runtime: CliRuntime, options: ListCommandOptions): Promise<ExitCode> {
  const { category } = options;
  if (category !== undefined && !isCategory(category)) {
    log.error(`Unknown category "${category}" (expected creational, structural or behavioral)`);
    return ExitCodes.FAILURE;
  }

  try {
    await prepare(runtime, options);
  } catch (error) {
    return exitCodeForError(error);
  }

  const { registry } = runtime;
  const examples = Array.from(category ? registry.byCategory(category) : registry.all());

  if (options.json) {
    console.log(JSON.stringify(examples.map(({ name, category }) => ({ name, category })), null, 2));
  } else {
    for (const example of examples) {
      console.log(`${example.name}\t${example.category}`);
    }
  }
  return ExitCodes.SUCCESS;
}
