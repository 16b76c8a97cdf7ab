/**
 * In-process Postgres for reader tests
 *
 * PGlite runs Postgres in the test process; the schema comes from sql/schema.sql.
 */

import { readFile } from 'node:fs/promises'

import { PGlite } from '@electric-sql/pglite'
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite'
import type { SpanRefType, TraceId } from '@spanstore/core'

import { toStorageTraceId } from '../../database.js'
import { operations, services, spanRefs, spans } from '../../schema.js'

const SCHEMA_URL = new URL('../../../sql/schema.sql', import.meta.url)

export type TestDatabase = PgliteDatabase

export interface SpanInput {
  traceId: TraceId
  service: string
  operation: string
  startTime: Date
  /** Microseconds */
  duration?: number
  processId?: string
  processTags?: Record<string, string>
}

/**
 * Inserts services, operations, spans and references, creating name rows on demand.
 */
export class SpanSeeder {
  private readonly serviceIds = new Map<string, number>()
  private readonly operationIds = new Map<string, number>()

  constructor(private readonly db: TestDatabase) {}

  async service(name: string): Promise<number> {
    const existing = this.serviceIds.get(name)
    if (existing !== undefined) return existing

    const [row] = await this.db
      .insert(services)
      .values({ serviceName: name })
      .returning({ id: services.id })
    this.serviceIds.set(name, row.id)
    return row.id
  }

  async operation(name: string): Promise<number> {
    const existing = this.operationIds.get(name)
    if (existing !== undefined) return existing

    const [row] = await this.db
      .insert(operations)
      .values({ operationName: name })
      .returning({ id: operations.id })
    this.operationIds.set(name, row.id)
    return row.id
  }

  async span(input: SpanInput): Promise<bigint> {
    const stored = toStorageTraceId(input.traceId)
    const [row] = await this.db
      .insert(spans)
      .values({
        traceIdLow: stored.low,
        traceIdHigh: stored.high,
        serviceId: await this.service(input.service),
        operationId: await this.operation(input.operation),
        processId: input.processId ?? `${input.service}-process`,
        processTags: input.processTags ?? {},
        startTime: input.startTime,
        duration: input.duration ?? 1000,
      })
      .returning({ id: spans.id })
    return row.id
  }

  async reference(spanId: bigint, childSpanId: bigint, refType: SpanRefType = 'child-of'): Promise<void> {
    await this.db.insert(spanRefs).values({ spanId, childSpanId, refType })
  }
}

/**
 * Fresh database with the span store schema.
 */
export async function createTestDatabase(): Promise<{ client: PGlite; db: TestDatabase }> {
  const client = new PGlite()
  await client.exec(await readFile(SCHEMA_URL, 'utf8'))
  return { client, db: drizzle(client) }
}

/**
 * Empty every table and restart id sequences.
 */
export async function resetTestDatabase(client: PGlite): Promise<void> {
  await client.exec('TRUNCATE span_refs, spans, operations, services RESTART IDENTITY CASCADE')
}

/**
 * Trace id from its halves; the high half defaults to zero.
 */
export function traceId(low: bigint, high = 0n): TraceId {
  return { high, low }
}

/**
 * `base` shifted by `ms` milliseconds.
 */
export function at(base: Date, ms: number): Date {
  return new Date(base.getTime() + ms)
}
