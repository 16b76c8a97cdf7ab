/**
 * CLI Module
 *
 * Command-line interface for spanstore.
 */

import { Command } from 'commander';

import {
  registerServicesCommand,
  registerOperationsCommand,
  registerTraceCommand,
  registerFindCommand,
  registerDepsCommand,
} from './commands/index.js';

// Re-export for convenience
export * from './commands/index.js';
export * as output from './utils/output.js';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
  const program = new Command();

  program
    .name('spanstore')
    .description('Query traces and service dependencies from a span store')
    .version('0.1.0');

  registerServicesCommand(program);
  registerOperationsCommand(program);
  registerTraceCommand(program);
  registerFindCommand(program);
  registerDepsCommand(program);

  return program;
}

/**
 * Run the CLI.
 */
export async function runCli(argv?: string[]): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
