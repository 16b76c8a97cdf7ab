/**
 * @spanstore/core
 *
 * Backend-agnostic read API for distributed-tracing span stores.
 *
 * @example
 * ```typescript
 * // spanstore.config.ts
 * import { defineConfig } from '@spanstore/core';
 * import { createPostgresReader } from '@spanstore/postgres';
 *
 * export default defineConfig({
 *   reader: () => createPostgresReader({ url: '$DATABASE_URL' }),
 * });
 * ```
 *
 * Then run:
 * ```bash
 * npx spanstore services
 * npx spanstore find --service frontend --duration-min 10ms
 * npx spanstore deps --lookback 1h
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Configuration
// =============================================================================

export {
  defineConfig,
  loadConfig,
  findConfigFile,
  getConfigDir,
  resolveConfig,
  validateConfig,
  resolveEnvVar,
} from './config/index.js';

export type {
  SpanStoreConfig,
  ResolvedConfig,
  ReaderFactory,
  QueryDefaultsConfig,
  ResolvedQueryDefaults,
} from './config/index.js';

export {
  DEFAULT_NUM_TRACES,
  TRACE_ID_OVERFETCH_FACTOR,
  DEFAULT_FETCH_CONCURRENCY,
  DEFAULT_LOOKBACK,
} from './constants.js';

// =============================================================================
// Errors
// =============================================================================

export { ReaderError, isReaderError } from './errors.js';

// =============================================================================
// Traces (SpanReader interface)
// =============================================================================

export {
  formatTraceId,
  parseTraceId,
  traceIdKey,
  isValidTraceId,
  summarizeTrace,
  normalizeCriteria,
  resolveNumTraces,
  parseDuration,
  parseLookback,
} from './traces/index.js';

export type {
  SpanReader,
  ReadOptions,
  TraceQueryCriteria,
  NormalizedCriteria,
  TraceId,
  Trace,
  Span,
  SpanRefType,
  SpanReference,
  Process,
  ProcessMapping,
  DependencyLink,
  TraceSummary,
} from './traces/index.js';

// =============================================================================
// CLI
// =============================================================================

export { createCli, runCli } from './cli/index.js';
