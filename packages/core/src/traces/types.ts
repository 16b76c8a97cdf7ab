/**
 * Trace Reader Types
 *
 * Defines the read interface of a span store and the backend-agnostic domain
 * types it returns. Any storage backend (Postgres, ClickHouse, in-memory, etc.)
 * can implement SpanReader.
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * 128-bit trace identifier split into two unsigned 64-bit halves.
 */
export interface TraceId {
  high: bigint;
  low: bigint;
}

// =============================================================================
// Span Types
// =============================================================================

/**
 * Kind of causal edge between two spans.
 */
export type SpanRefType = 'child-of' | 'follows-from';

/**
 * Outbound reference from the span holding it to another span.
 */
export interface SpanReference {
  refType: SpanRefType;

  /** Trace of the referenced span */
  traceId: TraceId;

  /** Storage id of the referenced (child) span */
  spanId: bigint;
}

/**
 * A single timed unit of work within a trace.
 */
export interface Span {
  traceId: TraceId;

  /** Storage id of the span */
  spanId: bigint;

  operationName: string;

  /** Key into the owning trace's process map */
  processId: string;

  startTime: Date;

  /** Duration in microseconds */
  duration: number;

  references: SpanReference[];
}

/**
 * The emitting process of a span: its service and tag set.
 */
export interface Process {
  serviceName: string;
  tags: Record<string, string>;
}

/**
 * One entry of a trace's process map.
 */
export interface ProcessMapping {
  processId: string;
  process: Process;
}

/**
 * All spans sharing one trace id, plus one process entry per distinct
 * process id among them.
 */
export interface Trace {
  spans: Span[];
  processMap: ProcessMapping[];
}

/**
 * Aggregated call count between two services over a time window.
 */
export interface DependencyLink {
  parentId: number;
  parent: string;
  childId: number;
  child: string;
  callCount: number;
}

// =============================================================================
// Query Types
// =============================================================================

/**
 * Criteria for finding traces. Present fields combine with AND; absent fields
 * impose no constraint.
 */
export interface TraceQueryCriteria {
  serviceName?: string;

  operationName?: string;

  /** Lower bound (inclusive) on span start time */
  startTimeMin?: Date;

  /** Upper bound (inclusive) on span start time */
  startTimeMax?: Date;

  /** Lower bound (inclusive) on span duration, in microseconds */
  durationMin?: number;

  /** Upper bound (inclusive) on span duration, in microseconds */
  durationMax?: number;

  /** Process tags every matching span must carry */
  tags?: Record<string, string>;

  /** Maximum number of traces to return (default 10 when absent or <= 0) */
  numTraces?: number;
}

/**
 * Per-call options accepted by every reader operation.
 */
export interface ReadOptions {
  /**
   * Cancellation signal. Once aborted, no further storage work is issued and
   * pending results are discarded.
   */
  signal?: AbortSignal;
}

// =============================================================================
// Reader Interface
// =============================================================================

/**
 * Read interface of a span store.
 *
 * Implement this interface to serve traces from a new storage backend.
 * The CLI and any upstream query service only talk to this interface.
 *
 * @example
 * ```typescript
 * const reader: SpanReader = createPostgresReader({ url: '$DATABASE_URL' });
 *
 * const services = await reader.listServices();
 * const traces = await reader.findTraces({ serviceName: 'frontend', numTraces: 20 });
 * ```
 */
export interface SpanReader {
  /**
   * Backend name for display and logging, e.g. 'postgres'.
   */
  readonly name: string;

  /**
   * All known service names, ascending, without empty names.
   */
  listServices(options?: ReadOptions): Promise<string[]>;

  /**
   * All known operation names, ascending, without empty names.
   * Narrowed to the operations of one service when `serviceName` is given.
   */
  listOperations(serviceName?: string, options?: ReadOptions): Promise<string[]>;

  /**
   * Load one trace.
   *
   * @returns The trace, or null when no span carries the id
   */
  getTrace(traceId: TraceId, options?: ReadOptions): Promise<Trace | null>;

  /**
   * Resolve criteria into distinct trace ids, at most `numTraces` of them.
   */
  findTraceIds(criteria: TraceQueryCriteria, options?: ReadOptions): Promise<TraceId[]>;

  /**
   * Resolve criteria into trace ids and load each trace.
   */
  findTraces(criteria: TraceQueryCriteria, options?: ReadOptions): Promise<Trace[]>;

  /**
   * Parent to child service call counts over `[endTime - lookback, endTime]`.
   *
   * @param lookback - Window length in milliseconds
   */
  getDependencies(
    endTime: Date,
    lookback: number,
    options?: ReadOptions,
  ): Promise<DependencyLink[]>;

  /**
   * Release resources held by the reader.
   * Optional - readers over an externally managed connection have nothing to release.
   */
  close?(): Promise<void>;
}
