/**
 * Shared command plumbing: config loading, registration phase and exit codes.
 */
import type { Config } from '../core/config/schema.js';
import { loadConfig } from '../core/config/loader.js';
import { exampleRegistry, type ExampleRegistry } from '../core/registry/example-registry.js';
import { registerBuiltInExamples } from '../patterns/register.js';
import { NotFoundError, getErrorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  NOT_FOUND: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * What commands operate on. Tests swap in their own registry and registration step.
 */
export interface CliRuntime {
  registry: ExampleRegistry;
  /** Fills the registry once configuration is known */
  registerExamples(registry: ExampleRegistry, config: Config): void;
  cwd(): string;
}

export interface CommonOptions {
  config: string;
  verbose?: boolean;
}

export function createDefaultRuntime(): CliRuntime {
  return {
    registry: exampleRegistry,
    registerExamples: (registry, config) => registerBuiltInExamples(registry, { seed: config.run.seed }),
    cwd: () => process.cwd(),
  };
}

/**
 * Load config, apply the log level and complete the registration phase.
 * Registration happens at most once per registry; afterwards the registry is sealed.
 */
export async function prepare(runtime: CliRuntime, options: CommonOptions): Promise<Config> {
  const config = await loadConfig(runtime.cwd(), options.config);
  log.setLevel(options.verbose ? 'debug' : config.log_level);

  const { registry } = runtime;
  if (!registry.isSealed) {
    runtime.registerExamples(registry, config);
    registry.seal();
    log.debug(`Registered ${registry.size} examples`);
  }
  return config;
}

/**
 * Report a command failure and pick its exit code.
 */
export function exitCodeForError(error: unknown): ExitCode {
  log.error(getErrorMessage(error));
  return error instanceof NotFoundError ? ExitCodes.NOT_FOUND : ExitCodes.FAILURE;
}
