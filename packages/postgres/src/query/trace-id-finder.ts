/**
 * Resolve trace query criteria into distinct trace ids
 */

import { desc, eq } from 'drizzle-orm'
import type { PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { TRACE_ID_OVERFETCH_FACTOR, traceIdKey } from '@spanstore/core'
import type { NormalizedCriteria, TraceId } from '@spanstore/core'

import { fromStorageTraceId, type SpanDatabase } from '../database.js'
import { operations, services, spans } from '../schema.js'
import { buildTraceFilter } from './filter-builder.js'

/**
 * Deduplicate trace ids, keeping first-seen order, and truncate to `limit`.
 */
export function dedupeTraceIds(traceIds: Iterable<TraceId>, limit: number): TraceId[] {
  const seen = new Map<string, TraceId>()
  for (const traceId of traceIds) {
    if (seen.size >= limit) break
    const key = traceIdKey(traceId)
    if (!seen.has(key)) {
      seen.set(key, traceId)
    }
  }
  return [...seen.values()]
}

/**
 * Find up to `criteria.numTraces` trace ids whose spans match the criteria,
 * most recent first.
 *
 * The join yields one row per matching span, so rows are over-fetched by
 * TRACE_ID_OVERFETCH_FACTOR before deduplicating to trace granularity.
 */
export async function findTraceIds<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(db: SpanDatabase<Q, S>, criteria: NormalizedCriteria): Promise<TraceId[]> {
  const filter = buildTraceFilter(criteria)

  const rows = await db
    .select({ low: spans.traceIdLow, high: spans.traceIdHigh })
    .from(spans)
    .innerJoin(operations, eq(operations.id, spans.operationId))
    .innerJoin(services, eq(services.id, spans.serviceId))
    .where(filter.toSQL())
    .orderBy(desc(spans.startTime), desc(spans.id))
    .limit(TRACE_ID_OVERFETCH_FACTOR * criteria.numTraces)

  return dedupeTraceIds(
    rows.map((row) => fromStorageTraceId(row.low, row.high)),
    criteria.numTraces
  )
}
