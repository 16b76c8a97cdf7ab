import { describe, it, expect } from 'vitest'
import { PgDialect } from 'drizzle-orm/pg-core'
import type { SQL } from 'drizzle-orm'
import { FilterBuilder, buildTraceFilter, renderClause } from '../query/filter-builder.js'

const dialect = new PgDialect()

// Query text and bound values only; the driver type hints are not under test
function render(fragment: SQL | undefined): { sql: string; params: unknown[] } | undefined {
  if (!fragment) return undefined
  const { sql, params } = dialect.sqlToQuery(fragment)
  return { sql, params }
}

describe('buildTraceFilter', () => {
  it('returns no predicate for empty criteria', () => {
    const filter = buildTraceFilter({})

    expect(filter.isEmpty()).toBe(true)
    expect(filter.getClauses()).toEqual([])
    expect(filter.toSQL()).toBeUndefined()
  })

  it('treats empty names and zero durations as absent', () => {
    const filter = buildTraceFilter({
      serviceName: '',
      operationName: '',
      durationMin: 0,
      durationMax: 0,
      tags: {},
    })

    expect(filter.isEmpty()).toBe(true)
  })

  it('orders clauses service, operation, start time, duration, tags', () => {
    const startTimeMin = new Date('2024-01-01T00:00:00Z')
    const startTimeMax = new Date('2024-01-02T00:00:00Z')

    const filter = buildTraceFilter({
      tags: { region: 'eu', env: 'prod' },
      durationMax: 5000,
      durationMin: 1000,
      startTimeMax,
      startTimeMin,
      operationName: 'GET /',
      serviceName: 'frontend',
    })

    expect(filter.getClauses()).toEqual([
      { column: 'service_name', operator: '=', value: 'frontend' },
      { column: 'operation_name', operator: '=', value: 'GET /' },
      { column: 'start_time', operator: '>=', value: startTimeMin },
      { column: 'start_time', operator: '<=', value: startTimeMax },
      { column: 'duration', operator: '>=', value: 1000 },
      { column: 'duration', operator: '<=', value: 5000 },
      { column: 'process_tags', operator: '@>', value: { env: 'prod' } },
      { column: 'process_tags', operator: '@>', value: { region: 'eu' } },
    ])
  })

  it('joins clauses with AND and binds values as parameters', () => {
    const query = render(
      buildTraceFilter({ serviceName: 'frontend', operationName: 'GET /' }).toSQL()
    )

    expect(query).toEqual({
      sql: '("services"."service_name" = $1 and "operations"."operation_name" = $2)',
      params: ['frontend', 'GET /'],
    })
  })

  it('renders a single clause without grouping', () => {
    const query = render(buildTraceFilter({ serviceName: 'frontend' }).toSQL())

    expect(query).toEqual({
      sql: '"services"."service_name" = $1',
      params: ['frontend'],
    })
  })

  it('never splices values into the query text', () => {
    const hostile = "x'; drop table spans; --"
    const query = render(buildTraceFilter({ serviceName: hostile }).toSQL())

    expect(query?.sql).toBe('"services"."service_name" = $1')
    expect(query?.params).toEqual([hostile])
  })
})

describe('renderClause', () => {
  it('renders inclusive duration bounds', () => {
    expect(
      render(renderClause({ column: 'duration', operator: '>=', value: 1000 }))
    ).toEqual({ sql: '"spans"."duration" >= $1', params: [1000] })

    expect(
      render(renderClause({ column: 'duration', operator: '<=', value: 5000 }))
    ).toEqual({ sql: '"spans"."duration" <= $1', params: [5000] })
  })

  it('renders the start time upper bound', () => {
    const query = render(
      renderClause({ column: 'start_time', operator: '<=', value: new Date('2024-01-01T00:00:00Z') })
    )

    expect(query?.sql).toBe('"spans"."start_time" <= $1')
  })

  it('renders tag containment with text parameters', () => {
    const query = render(
      renderClause({ column: 'process_tags', operator: '@>', value: { env: 'prod' } })
    )

    expect(query).toEqual({
      sql: '"spans"."process_tags" @> jsonb_build_object($1::text, $2::text)',
      params: ['env', 'prod'],
    })
  })
})

describe('FilterBuilder', () => {
  it('pairs each clause with its fragment', () => {
    const builder = new FilterBuilder()
      .andWhere({ column: 'service_name', operator: '=', value: 'frontend' })
      .andWhere({ column: 'duration', operator: '>=', value: 10 })

    const fragments = builder.fragments()

    expect(fragments).toHaveLength(2)
    expect(fragments[0].clause.column).toBe('service_name')
    expect(render(fragments[1].fragment)).toEqual({
      sql: '"spans"."duration" >= $1',
      params: [10],
    })
  })
})
