/**
 * Find Command
 *
 * Finds traces matching service, operation, time, duration and tag criteria.
 */

import type { Command } from 'commander';

import type { ResolvedQueryDefaults } from '../../config/types.js';
import { parseDuration } from '../../traces/criteria.js';
import { summarizeTrace, type TraceSummary } from '../../traces/summary.js';
import { formatTraceId } from '../../traces/trace-id.js';
import type { TraceQueryCriteria } from '../../traces/types.js';
import * as output from '../utils/output.js';
import { describeError, withReader, type ReaderCommandOptions } from '../utils/reader.js';

/**
 * Find command options.
 */
export interface FindOptions extends ReaderCommandOptions {
  service?: string;
  operation?: string;
  startMin?: string;
  startMax?: string;
  durationMin?: string;
  durationMax?: string;
  tag?: string[];
  limit?: string;
}

/**
 * Register the find command.
 */
export function registerFindCommand(program: Command): void {
  program
    .command('find')
    .description('Find traces matching criteria')
    .option('-s, --service <name>', 'Service name')
    .option('-o, --operation <name>', 'Operation name')
    .option('--start-min <time>', 'Earliest span start (ISO-8601)')
    .option('--start-max <time>', 'Latest span start (ISO-8601)')
    .option('--duration-min <duration>', 'Minimum span duration, e.g. 10ms')
    .option('--duration-max <duration>', 'Maximum span duration, e.g. 1.5s')
    .option('-t, --tag <key=value>', 'Process tag (repeatable)', collectTag, [])
    .option('-l, --limit <count>', 'Maximum number of traces')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: FindOptions) => {
      await findCommand(options);
    });
}

function collectTag(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseTimestamp(value: string, flag: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid ${flag}: ${value}. Expected an ISO-8601 timestamp`);
  }
  return date;
}

/**
 * Build trace query criteria from command options.
 */
export function buildCriteria(
  options: FindOptions,
  defaults: ResolvedQueryDefaults
): TraceQueryCriteria {
  const criteria: TraceQueryCriteria = {};

  if (options.service) criteria.serviceName = options.service;
  if (options.operation) criteria.operationName = options.operation;
  if (options.startMin) criteria.startTimeMin = parseTimestamp(options.startMin, '--start-min');
  if (options.startMax) criteria.startTimeMax = parseTimestamp(options.startMax, '--start-max');
  if (options.durationMin) criteria.durationMin = parseDuration(options.durationMin);
  if (options.durationMax) criteria.durationMax = parseDuration(options.durationMax);

  if (options.tag && options.tag.length > 0) {
    const tags: Record<string, string> = {};
    for (const pair of options.tag) {
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        throw new Error(`Invalid tag: ${pair}. Use key=value`);
      }
      tags[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
    criteria.tags = tags;
  }

  if (options.limit !== undefined) {
    const limit = parseInt(options.limit, 10);
    if (Number.isNaN(limit)) {
      throw new Error(`Invalid limit: ${options.limit}`);
    }
    criteria.numTraces = limit;
  } else {
    criteria.numTraces = defaults.numTraces;
  }

  return criteria;
}

async function findCommand(options: FindOptions): Promise<void> {
  try {
    const summaries = await withReader(options, async ({ reader, config, signal }) => {
      const criteria = buildCriteria(options, config.defaults);
      const traces = await reader.findTraces(criteria, { signal });
      return traces
        .map(summarizeTrace)
        .filter((s): s is TraceSummary => s !== null)
        .sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
    });

    if (options.json) {
      output.json(summaries.map((s) => ({ ...s, traceId: formatTraceId(s.traceId) })));
      return;
    }

    if (summaries.length === 0) {
      output.warning('No traces found');
      return;
    }

    output.header(`Traces (${summaries.length})`);
    output.table(
      summaries.map((s) => ({
        trace: formatTraceId(s.traceId),
        service: s.rootService,
        operation: output.truncate(s.rootOperation, 40),
        spans: s.spanCount,
        start: output.formatTimestamp(s.startTime),
        duration: output.formatMicros(s.duration),
      }))
    );
  } catch (error) {
    output.exitWithError(describeError(error));
  }
}
