/**
 * Deps Command
 *
 * Prints service dependency links over a lookback window.
 */

import type { Command } from 'commander';

import { parseLookback } from '../../traces/criteria.js';
import * as output from '../utils/output.js';
import { describeError, withReader, type ReaderCommandOptions } from '../utils/reader.js';

/**
 * Deps command options.
 */
interface DepsOptions extends ReaderCommandOptions {
  end?: string;
  lookback?: string;
}

/**
 * Register the deps command.
 */
export function registerDepsCommand(program: Command): void {
  program
    .command('deps')
    .description('Show service dependencies (parent -> child call counts)')
    .option('-e, --end <time>', 'Window end (ISO-8601, default: now)')
    .option('-b, --lookback <window>', 'Window length, e.g. 1h, 7d (default from config)')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: DepsOptions) => {
      await depsCommand(options);
    });
}

async function depsCommand(options: DepsOptions): Promise<void> {
  try {
    const endTime = options.end ? new Date(options.end) : new Date();
    if (Number.isNaN(endTime.getTime())) {
      throw new Error(`Invalid --end: ${options.end}. Expected an ISO-8601 timestamp`);
    }

    const links = await withReader(options, ({ reader, config, signal }) => {
      const lookback = options.lookback ? parseLookback(options.lookback) : config.defaults.lookback;
      return reader.getDependencies(endTime, lookback, { signal });
    });

    if (options.json) {
      output.json(links);
      return;
    }

    if (links.length === 0) {
      output.warning('No dependencies in window');
      return;
    }

    output.header(`Dependencies (${links.length})`);
    output.table(
      links.map((link) => ({
        parent: link.parent,
        child: link.child,
        calls: link.callCount,
      }))
    );
  } catch (error) {
    output.exitWithError(describeError(error));
  }
}
