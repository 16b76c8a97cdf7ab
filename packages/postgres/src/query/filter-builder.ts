/**
 * Structured WHERE builder for trace queries
 *
 * Criteria become typed (column, operator, value) clauses joined with AND.
 * Values are always bound as parameters, never spliced into query text.
 */

import { and, eq, gte, lte, sql, type SQL } from 'drizzle-orm'
import type { TraceQueryCriteria } from '@spanstore/core'

import { operations, services, spans } from '../schema.js'

export type FilterClause =
  | { column: 'service_name'; operator: '='; value: string }
  | { column: 'operation_name'; operator: '='; value: string }
  | { column: 'start_time'; operator: '>=' | '<='; value: Date }
  | { column: 'duration'; operator: '>=' | '<='; value: number }
  | { column: 'process_tags'; operator: '@>'; value: Record<string, string> }

export type FilterColumn = FilterClause['column']

/**
 * Render one clause as a predicate fragment with its bound parameter.
 */
export function renderClause(clause: FilterClause): SQL {
  switch (clause.column) {
    case 'service_name':
      return eq(services.serviceName, clause.value)
    case 'operation_name':
      return eq(operations.operationName, clause.value)
    case 'start_time':
      return clause.operator === '>='
        ? gte(spans.startTime, clause.value)
        : lte(spans.startTime, clause.value)
    case 'duration':
      return clause.operator === '>='
        ? gte(spans.duration, clause.value)
        : lte(spans.duration, clause.value)
    case 'process_tags': {
      // Keys and values bind as text; the object is built server-side
      const pairs = Object.entries(clause.value).flatMap(([key, value]) => [
        sql`${key}::text`,
        sql`${value}::text`,
      ])
      return sql`${spans.processTags} @> jsonb_build_object(${sql.join(pairs, sql`, `)})`
    }
  }
}

/**
 * Accumulates clauses in evaluation order.
 */
export class FilterBuilder {
  private readonly clauses: FilterClause[] = []

  andWhere(clause: FilterClause): this {
    this.clauses.push(clause)
    return this
  }

  getClauses(): readonly FilterClause[] {
    return this.clauses
  }

  isEmpty(): boolean {
    return this.clauses.length === 0
  }

  /**
   * Fragments paired with the clause they came from, in evaluation order.
   */
  fragments(): Array<{ clause: FilterClause; fragment: SQL }> {
    return this.clauses.map((clause) => ({ clause, fragment: renderClause(clause) }))
  }

  /**
   * Conjunction of all clauses, or undefined (match everything) when empty.
   */
  toSQL(): SQL | undefined {
    return and(...this.clauses.map(renderClause))
  }
}

/**
 * Build the span-level filter for a trace query.
 *
 * Order: service, operation, start time min/max, duration min/max, tags by key.
 * Empty names and zero durations impose no constraint.
 */
export function buildTraceFilter(criteria: TraceQueryCriteria): FilterBuilder {
  const builder = new FilterBuilder()

  if (criteria.serviceName) {
    builder.andWhere({ column: 'service_name', operator: '=', value: criteria.serviceName })
  }
  if (criteria.operationName) {
    builder.andWhere({ column: 'operation_name', operator: '=', value: criteria.operationName })
  }
  if (criteria.startTimeMin) {
    builder.andWhere({ column: 'start_time', operator: '>=', value: criteria.startTimeMin })
  }
  if (criteria.startTimeMax) {
    builder.andWhere({ column: 'start_time', operator: '<=', value: criteria.startTimeMax })
  }
  if (criteria.durationMin) {
    builder.andWhere({ column: 'duration', operator: '>=', value: criteria.durationMin })
  }
  if (criteria.durationMax) {
    builder.andWhere({ column: 'duration', operator: '<=', value: criteria.durationMax })
  }
  if (criteria.tags) {
    for (const key of Object.keys(criteria.tags).sort()) {
      builder.andWhere({ column: 'process_tags', operator: '@>', value: { [key]: criteria.tags[key] } })
    }
  }

  return builder
}
