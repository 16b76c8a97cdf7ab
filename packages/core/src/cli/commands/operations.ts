/**
 * Operations Command
 *
 * Lists operation names, optionally for one service.
 */

import type { Command } from 'commander';

import * as output from '../utils/output.js';
import { describeError, withReader, type ReaderCommandOptions } from '../utils/reader.js';

/**
 * Register the operations command.
 */
export function registerOperationsCommand(program: Command): void {
  program
    .command('operations [service]')
    .description('List operation names, optionally for one service')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (service: string | undefined, options: ReaderCommandOptions) => {
      await operationsCommand(service, options);
    });
}

async function operationsCommand(
  service: string | undefined,
  options: ReaderCommandOptions
): Promise<void> {
  try {
    const operations = await withReader(options, ({ reader, signal }) =>
      reader.listOperations(service, { signal })
    );

    if (options.json) {
      output.json(operations);
      return;
    }

    if (operations.length === 0) {
      output.warning(service ? `No operations found for ${service}` : 'No operations found');
      return;
    }

    output.header(service ? `Operations of ${service} (${operations.length})` : `Operations (${operations.length})`);
    for (const operation of operations) {
      console.log(`  ${operation}`);
    }
  } catch (error) {
    output.exitWithError(describeError(error));
  }
}
