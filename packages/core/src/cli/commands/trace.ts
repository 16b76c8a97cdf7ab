/**
 * Trace Command
 *
 * Loads one trace by id and prints its spans.
 */

import type { Command } from 'commander';

import { parseTraceId, formatTraceId } from '../../traces/trace-id.js';
import type { Trace } from '../../traces/types.js';
import * as output from '../utils/output.js';
import { describeError, withReader, type ReaderCommandOptions } from '../utils/reader.js';

/**
 * Register the trace command.
 */
export function registerTraceCommand(program: Command): void {
  program
    .command('trace <traceId>')
    .description('Show a trace by its hex id')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (traceId: string, options: ReaderCommandOptions) => {
      await traceCommand(traceId, options);
    });
}

async function traceCommand(rawId: string, options: ReaderCommandOptions): Promise<void> {
  let trace: Trace | null = null;
  try {
    const traceId = parseTraceId(rawId);
    trace = await withReader(options, ({ reader, signal }) => reader.getTrace(traceId, { signal }));
  } catch (error) {
    output.exitWithError(describeError(error));
    return;
  }

  if (!trace) {
    output.exitWithError(`Trace not found: ${rawId}`);
    return;
  }

  if (options.json) {
    output.json(trace);
    return;
  }

  printTrace(trace);
}

/**
 * Print a trace as a span table, start offsets relative to the earliest span.
 */
export function printTrace(trace: Trace): void {
  const services = new Map(trace.processMap.map((m) => [m.processId, m.process.serviceName]));
  const origin = Math.min(...trace.spans.map((s) => s.startTime.getTime()));

  output.header(
    `Trace ${formatTraceId(trace.spans[0].traceId)} (${trace.spans.length} spans, ${trace.processMap.length} processes)`
  );

  output.table(
    trace.spans.map((span) => ({
      span: span.spanId.toString(),
      service: services.get(span.processId) ?? span.processId,
      operation: output.truncate(span.operationName, 40),
      offset: output.formatMicros((span.startTime.getTime() - origin) * 1000),
      duration: output.formatMicros(span.duration),
      refs: span.references.length,
    }))
  );
}
