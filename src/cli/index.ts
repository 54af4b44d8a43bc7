import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createRunCommand } from './commands/run.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createDefaultRuntime, type CliRuntime } from './runtime.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(runtime: CliRuntime = createDefaultRuntime()): Command {
  const program = new Command()
    .name('patternbench')
    .description('Register, run and verify design-pattern examples')
    .version(readVersion());
  [createRunCommand, createListCommand, createShowCommand].forEach((cmd) => program.addCommand(cmd(runtime)));
  return program;
}

export { ExitCodes, createDefaultRuntime, type CliRuntime } from './runtime.js';
