/**
 * Service dependency links from span references
 */

import { and, asc, eq, gte, lte } from 'drizzle-orm'
import { alias, type PgQueryResultHKT } from 'drizzle-orm/pg-core'
import type { DependencyLink } from '@spanstore/core'

import type { SpanDatabase } from '../database.js'
import { services, spanRefs, spans } from '../schema.js'

/**
 * One referencing edge with the services on both ends.
 */
export interface DependencyEdgeRow {
  parentId: number
  parent: string
  childId: number
  child: string
}

/**
 * Count edges per (parent, child) service pair.
 *
 * Links come out in the order each pair is first seen.
 */
export function groupDependencyLinks(rows: Iterable<DependencyEdgeRow>): DependencyLink[] {
  const links = new Map<string, DependencyLink>()
  for (const row of rows) {
    const key = `${row.parentId}:${row.childId}`
    const link = links.get(key)
    if (link) {
      link.callCount++
    } else {
      links.set(key, { ...row, callCount: 1 })
    }
  }
  return [...links.values()]
}

/**
 * Inclusive time window ending at `endTime`.
 */
export function dependencyWindow(endTime: Date, lookbackMs: number): { start: Date; end: Date } {
  return { start: new Date(endTime.getTime() - lookbackMs), end: endTime }
}

/**
 * Fetch every reference edge whose parent span started within the window,
 * resolving the parent and child services independently.
 */
export async function loadDependencyEdges<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(db: SpanDatabase<Q, S>, endTime: Date, lookbackMs: number): Promise<DependencyEdgeRow[]> {
  const { start, end } = dependencyWindow(endTime, lookbackMs)

  const parentSpans = alias(spans, 'parent_spans')
  const parentService = alias(services, 'parent_service')
  const childSpans = alias(spans, 'child_spans')
  const childService = alias(services, 'child_service')

  return db
    .select({
      parentId: parentService.id,
      parent: parentService.serviceName,
      childId: childService.id,
      child: childService.serviceName,
    })
    .from(spanRefs)
    .innerJoin(parentSpans, eq(parentSpans.id, spanRefs.spanId))
    .innerJoin(parentService, eq(parentService.id, parentSpans.serviceId))
    .innerJoin(childSpans, eq(childSpans.id, spanRefs.childSpanId))
    .innerJoin(childService, eq(childService.id, childSpans.serviceId))
    .where(and(gte(parentSpans.startTime, start), lte(parentSpans.startTime, end)))
    .orderBy(asc(parentService.serviceName), asc(childService.serviceName), asc(spanRefs.id))
}

/**
 * Aggregate parent to child call counts over `[endTime - lookback, endTime]`.
 */
export async function getDependencyLinks<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(db: SpanDatabase<Q, S>, endTime: Date, lookbackMs: number): Promise<DependencyLink[]> {
  return groupDependencyLinks(await loadDependencyEdges(db, endTime, lookbackMs))
}
