/**
 * Show one example's category and intent.
 */
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import {
  ExitCodes,
  createDefaultRuntime,
  exitCodeForError,
  prepare,
  type CliRuntime,
  type CommonOptions,
  type ExitCode,
} from '../runtime.js';

export interface ShowCommandOptions extends CommonOptions {
  json?: boolean;
}

/**
 * Create the show command.
 */
export function createShowCommand(runtime: CliRuntime = createDefaultRuntime()): Command {
  return new Command('show')
    .description('Show the category and intent of one example')
    .argument('<pattern>', 'Example name')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--verbose', 'Debug logging')
    .action(async (pattern: string, options: ShowCommandOptions) => {
      process.exitCode = await showExample(runtime, pattern, options);
    });
}

export async function showExample(
  runtime: CliRuntime,
  pattern: string,
  options: ShowCommandOptions
): Promise<ExitCode> {
  try {
    await prepare(runtime, options);
    const definition = runtime.registry.lookup(pattern);
    const { intent } = definition.factory().describe();

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            name: definition.name,
            category: definition.category,
            intent,
            expected_outcome: definition.expectedOutcome ?? null,
          },
          null,
          2
        )
      );
    } else {
      console.log(`${definition.name}\t${definition.category}\t${intent}`);
    }
    return ExitCodes.SUCCESS;
  } catch (error) {
    return exitCodeForError(error);
  }
}
