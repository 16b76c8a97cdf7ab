/**
 * @spanstore/postgres
 *
 * Postgres span reader for spanstore.
 *
 * @example
 * ```typescript
 * import { createPostgresReader } from '@spanstore/postgres';
 *
 * const reader = createPostgresReader({ url: '$DATABASE_URL' });
 *
 * const services = await reader.listServices();
 * const links = await reader.getDependencies(new Date(), 60 * 60 * 1000);
 *
 * await reader.close();
 * ```
 */

// =============================================================================
// Primary Export: SpanReader Implementation
// =============================================================================

export { createPostgresReader, getConfig, type PostgresConfig, type PostgresReaderOptions } from './client.js';

export { createSpanReader, type SpanReaderOptions } from './reader.js';

// =============================================================================
// Schema & Storage Encoding
// =============================================================================

export {
  services,
  operations,
  spans,
  spanRefs,
  type ServiceRow,
  type OperationRow,
  type SpanRow,
  type SpanRefRow,
} from './schema.js';

export {
  toStorageInt64,
  fromStorageInt64,
  toStorageTraceId,
  fromStorageTraceId,
  type SpanDatabase,
} from './database.js';

// =============================================================================
// Query Building Blocks
// (For custom readers over the same schema)
// =============================================================================

export { FilterBuilder, buildTraceFilter, renderClause, type FilterClause, type FilterColumn } from './query/filter-builder.js';

export { listServiceNames, listOperationNames } from './query/service-catalog.js';

export { findTraceIds, dedupeTraceIds } from './query/trace-id-finder.js';

export {
  assembleTrace,
  assembleTraces,
  loadTrace,
  loadTraceRows,
  type JoinedSpanRow,
  type ReferenceRow,
  type AssembleTracesOptions,
} from './query/trace-assembler.js';

export {
  getDependencyLinks,
  groupDependencyLinks,
  loadDependencyEdges,
  type DependencyEdgeRow,
} from './query/dependency-aggregator.js';

// =============================================================================
// Types (Re-exported from core for convenience)
// =============================================================================

export type {
  SpanReader,
  ReadOptions,
  Trace,
  TraceId,
  TraceQueryCriteria,
  DependencyLink,
} from '@spanstore/core';
