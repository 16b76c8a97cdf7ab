/**
 * Rebuild Trace aggregates from span rows
 */

import { and, asc, eq, inArray } from 'drizzle-orm'
import { alias, type PgQueryResultHKT } from 'drizzle-orm/pg-core'
import pLimit from 'p-limit'
import { ReaderError, formatTraceId, traceIdKey } from '@spanstore/core'
import type { ProcessMapping, Span, SpanRefType, SpanReference, Trace, TraceId } from '@spanstore/core'

import { fromStorageTraceId, toStorageTraceId, type SpanDatabase } from '../database.js'
import { operations, services, spanRefs, spans, type SpanRow } from '../schema.js'

/**
 * A span row joined to its operation and service names.
 */
export interface JoinedSpanRow {
  span: SpanRow
  operationName: string | null
  serviceName: string | null
}

/**
 * An outbound reference row with the referenced span's trace id.
 */
export interface ReferenceRow {
  spanId: bigint
  childSpanId: bigint
  refType: SpanRefType
  childTraceIdLow: bigint
  childTraceIdHigh: bigint
}

/**
 * Build a Trace from joined span rows and their outbound references.
 *
 * Spans keep row order. The process map gets one entry per distinct process
 * id; the first span seen with an id decides its service and tags.
 *
 * @returns null when there are no rows
 */
export function assembleTrace(rows: JoinedSpanRow[], references: ReferenceRow[]): Trace | null {
  if (rows.length === 0) {
    return null
  }

  const refsBySpan = new Map<bigint, SpanReference[]>()
  for (const ref of references) {
    const list = refsBySpan.get(ref.spanId) ?? []
    list.push({
      refType: ref.refType,
      traceId: fromStorageTraceId(ref.childTraceIdLow, ref.childTraceIdHigh),
      spanId: ref.childSpanId,
    })
    refsBySpan.set(ref.spanId, list)
  }

  const spanList: Span[] = []
  const processes = new Map<string, ProcessMapping>()

  for (const { span, operationName, serviceName } of rows) {
    spanList.push({
      traceId: fromStorageTraceId(span.traceIdLow, span.traceIdHigh),
      spanId: span.id,
      operationName: operationName ?? '',
      processId: span.processId,
      startTime: span.startTime,
      duration: span.duration,
      references: refsBySpan.get(span.id) ?? [],
    })

    if (!processes.has(span.processId)) {
      processes.set(span.processId, {
        processId: span.processId,
        process: {
          serviceName: serviceName ?? '',
          tags: { ...span.processTags },
        },
      })
    }
  }

  return { spans: spanList, processMap: [...processes.values()] }
}

/**
 * Fetch the rows of one trace: spans ordered by start time, then their
 * outbound references.
 */
export async function loadTraceRows<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(
  db: SpanDatabase<Q, S>,
  traceId: TraceId
): Promise<{ rows: JoinedSpanRow[]; references: ReferenceRow[] }> {
  const stored = toStorageTraceId(traceId)

  const rows = await db
    .select({
      span: spans,
      operationName: operations.operationName,
      serviceName: services.serviceName,
    })
    .from(spans)
    .leftJoin(operations, eq(operations.id, spans.operationId))
    .leftJoin(services, eq(services.id, spans.serviceId))
    .where(and(eq(spans.traceIdLow, stored.low), eq(spans.traceIdHigh, stored.high)))
    .orderBy(asc(spans.startTime), asc(spans.id))

  if (rows.length === 0) {
    return { rows, references: [] }
  }

  const childSpans = alias(spans, 'child_spans')
  const references = await db
    .select({
      spanId: spanRefs.spanId,
      childSpanId: spanRefs.childSpanId,
      refType: spanRefs.refType,
      childTraceIdLow: childSpans.traceIdLow,
      childTraceIdHigh: childSpans.traceIdHigh,
    })
    .from(spanRefs)
    .innerJoin(childSpans, eq(childSpans.id, spanRefs.childSpanId))
    .where(inArray(spanRefs.spanId, rows.map((row) => row.span.id)))
    .orderBy(asc(spanRefs.id))

  return { rows, references }
}

/**
 * Load and assemble one trace.
 */
export async function loadTrace<Q extends PgQueryResultHKT, S extends Record<string, unknown>>(
  db: SpanDatabase<Q, S>,
  traceId: TraceId
): Promise<Trace | null> {
  const { rows, references } = await loadTraceRows(db, traceId)
  return assembleTrace(rows, references)
}

export interface AssembleTracesOptions {
  /** Maximum concurrent fetches */
  concurrency: number
  signal?: AbortSignal
  /** Operation name reported in errors */
  operation?: string
}

/**
 * Assemble several traces with bounded concurrency.
 *
 * Results are collected per input position and returned in input order;
 * ids without spans are left out. Once a fetch fails, queued fetches are
 * skipped and a ReaderError carrying the traces assembled so far is thrown.
 */
export async function assembleTraces(
  traceIds: TraceId[],
  load: (traceId: TraceId) => Promise<Trace | null>,
  options: AssembleTracesOptions
): Promise<Trace[]> {
  const { concurrency, signal, operation = 'assembleTraces' } = options
  const limit = pLimit(Math.max(1, concurrency))

  const settled: Array<Trace | null | undefined> = new Array(traceIds.length)
  const state: { failure?: { traceId: TraceId; error: unknown } } = {}

  await Promise.all(
    traceIds.map((traceId, index) =>
      limit(async () => {
        if (state.failure || signal?.aborted) {
          return
        }
        try {
          settled[index] = await load(traceId)
        } catch (error) {
          state.failure ??= { traceId, error }
        }
      })
    )
  )

  signal?.throwIfAborted()

  const assembled = new Map<string, Trace>()
  traceIds.forEach((traceId, index) => {
    const trace = settled[index]
    if (trace) {
      assembled.set(traceIdKey(traceId), trace)
    }
  })
  const traces = [...assembled.values()]

  const { failure } = state
  if (failure) {
    throw new ReaderError(
      operation,
      failure.error,
      { traceId: formatTraceId(failure.traceId) },
      traces
    )
  }

  return traces
}
