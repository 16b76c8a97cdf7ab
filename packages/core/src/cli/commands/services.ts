/**
 * Services Command
 *
 * Lists the services known to the store.
 */

import type { Command } from 'commander';

import * as output from '../utils/output.js';
import { describeError, withReader, type ReaderCommandOptions } from '../utils/reader.js';

/**
 * Register the services command.
 */
export function registerServicesCommand(program: Command): void {
  program
    .command('services')
    .description('List service names')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ReaderCommandOptions) => {
      await servicesCommand(options);
    });
}

async function servicesCommand(options: ReaderCommandOptions): Promise<void> {
  try {
    const services = await withReader(options, ({ reader, signal }) =>
      reader.listServices({ signal })
    );

    if (options.json) {
      output.json(services);
      return;
    }

    if (services.length === 0) {
      output.warning('No services found');
      return;
    }

    output.header(`Services (${services.length})`);
    for (const service of services) {
      console.log(`  ${service}`);
    }
  } catch (error) {
    output.exitWithError(describeError(error));
  }
}
