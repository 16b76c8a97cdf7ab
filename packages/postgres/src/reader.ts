/**
 * Postgres Span Reader
 *
 * Implements the SpanReader interface over the relational span store.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/postgres-js';
 * import postgres from 'postgres';
 * import { createSpanReader } from '@spanstore/postgres';
 *
 * const reader = createSpanReader({
 *   db: drizzle(postgres('postgres://localhost/traces')),
 *   fetchConcurrency: 8,
 * });
 *
 * const traces = await reader.findTraces({ serviceName: 'frontend' });
 * ```
 */

import type { PgQueryResultHKT } from 'drizzle-orm/pg-core';
import {
  DEFAULT_FETCH_CONCURRENCY,
  ReaderError,
  formatTraceId,
  isValidTraceId,
  normalizeCriteria,
} from '@spanstore/core';
import type {
  DependencyLink,
  ReadOptions,
  SpanReader,
  Trace,
  TraceId,
  TraceQueryCriteria,
} from '@spanstore/core';

import type { SpanDatabase } from './database.js';
import { getDependencyLinks } from './query/dependency-aggregator.js';
import { listOperationNames, listServiceNames } from './query/service-catalog.js';
import { assembleTraces, loadTrace } from './query/trace-assembler.js';
import { findTraceIds } from './query/trace-id-finder.js';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Options for creating a span reader over an existing drizzle database.
 */
export interface SpanReaderOptions<
  Q extends PgQueryResultHKT = PgQueryResultHKT,
  S extends Record<string, unknown> = Record<string, never>,
> {
  /**
   * Drizzle Postgres database. The reader never opens or closes connections
   * on it; pass `onClose` to release them with the reader.
   */
  db: SpanDatabase<Q, S>;

  /** Backend name reported by the reader. Defaults to 'postgres'. */
  name?: string;

  /**
   * Maximum concurrent per-trace fetches in findTraces.
   * Defaults to DEFAULT_FETCH_CONCURRENCY.
   */
  fetchConcurrency?: number;

  /** Log each storage operation */
  verbose?: boolean;

  /** Called by reader.close() */
  onClose?: () => Promise<void>;
}

// =============================================================================
// Reader Implementation
// =============================================================================

/**
 * Create a SpanReader over a drizzle Postgres database.
 */
export function createSpanReader<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(options: SpanReaderOptions<Q, S>): SpanReader {
  const {
    db,
    name = 'postgres',
    fetchConcurrency = DEFAULT_FETCH_CONCURRENCY,
    verbose = false,
    onClose,
  } = options;

  /**
   * Run one storage operation: refuse to start once aborted, discard the
   * result if the signal fires meanwhile, and wrap storage failures.
   */
  async function run<T>(
    operation: string,
    context: Record<string, unknown>,
    readOptions: ReadOptions | undefined,
    fn: (signal: AbortSignal | undefined) => Promise<T>,
    partial?: T
  ): Promise<T> {
    const signal = readOptions?.signal;
    signal?.throwIfAborted();

    if (verbose) {
      console.log(`[Reader] ${operation}: ${JSON.stringify(context)}`);
    }

    let result: T;
    try {
      result = await fn(signal);
    } catch (error) {
      signal?.throwIfAborted();
      if (error instanceof ReaderError) {
        throw error;
      }
      throw new ReaderError(operation, error, context, partial);
    }

    signal?.throwIfAborted();
    return result;
  }

  return {
    name,

    async listServices(readOptions?: ReadOptions): Promise<string[]> {
      return run('listServices', {}, readOptions, () => listServiceNames(db), []);
    },

    async listOperations(serviceName?: string, readOptions?: ReadOptions): Promise<string[]> {
      return run(
        'listOperations',
        serviceName ? { serviceName } : {},
        readOptions,
        () => listOperationNames(db, serviceName),
        []
      );
    },

    async getTrace(traceId: TraceId, readOptions?: ReadOptions): Promise<Trace | null> {
      // Storage keeps each half as int8; out-of-range halves would wrap onto another trace
      if (!isValidTraceId(traceId)) {
        throw new Error(
          `Invalid trace id: high=${traceId.high} low=${traceId.low}. Each half must be an unsigned 64-bit integer`
        );
      }
      return run('getTrace', { traceId: formatTraceId(traceId) }, readOptions, () =>
        loadTrace(db, traceId)
      );
    },

    async findTraceIds(
      criteria: TraceQueryCriteria,
      readOptions?: ReadOptions
    ): Promise<TraceId[]> {
      const normalized = normalizeCriteria(criteria);
      return run(
        'findTraceIds',
        describeCriteria(normalized),
        readOptions,
        () => findTraceIds(db, normalized),
        []
      );
    },

    async findTraces(criteria: TraceQueryCriteria, readOptions?: ReadOptions): Promise<Trace[]> {
      const normalized = normalizeCriteria(criteria);
      const context = describeCriteria(normalized);

      const traceIds = await run(
        'findTraces',
        context,
        readOptions,
        () => findTraceIds(db, normalized),
        []
      );

      if (verbose) {
        console.log(`[Reader] findTraces: assembling ${traceIds.length} traces`);
      }

      return run('findTraces', context, readOptions, (signal) =>
        assembleTraces(traceIds, (traceId) => loadTrace(db, traceId), {
          concurrency: fetchConcurrency,
          signal,
          operation: 'findTraces',
        })
      );
    },

    async getDependencies(
      endTime: Date,
      lookback: number,
      readOptions?: ReadOptions
    ): Promise<DependencyLink[]> {
      const context = { endTime: endTime.toISOString(), lookback };
      return run(
        'getDependencies',
        context,
        readOptions,
        () => getDependencyLinks(db, endTime, lookback),
        []
      );
    },

    async close(): Promise<void> {
      await onClose?.();
    },
  };
}

/**
 * JSON-safe view of criteria for logs and error context.
 */
function describeCriteria(criteria: TraceQueryCriteria): Record<string, unknown> {
  const described: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(criteria)) {
    if (value === undefined) continue;
    described[key] = value instanceof Date ? value.toISOString() : value;
  }
  return described;
}
