/**
 * Traces Module
 *
 * Provides the SpanReader interface for pluggable storage backends
 * and backend-agnostic trace types.
 *
 * @example
 * ```typescript
 * import type { SpanReader, Trace } from '@spanstore/core/traces';
 *
 * // Use with Postgres
 * import { createPostgresReader } from '@spanstore/postgres';
 * const reader = createPostgresReader({ url: 'postgres://localhost/traces' });
 *
 * const trace: Trace | null = await reader.getTrace(parseTraceId('4bf92f3577b34da6'));
 * ```
 */

// Reader interface
export type { SpanReader, ReadOptions, TraceQueryCriteria } from './types.js';

// Domain types (backend-agnostic)
export type {
  TraceId,
  Trace,
  Span,
  SpanRefType,
  SpanReference,
  Process,
  ProcessMapping,
  DependencyLink,
} from './types.js';

// Trace id codec
export { formatTraceId, parseTraceId, traceIdKey, isValidTraceId } from './trace-id.js';

// Summaries
export { summarizeTrace, type TraceSummary } from './summary.js';

// Criteria
export {
  normalizeCriteria,
  resolveNumTraces,
  parseDuration,
  parseLookback,
  type NormalizedCriteria,
} from './criteria.js';
