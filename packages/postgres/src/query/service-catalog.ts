/**
 * Service and operation name listings
 */

import { asc, eq } from 'drizzle-orm'
import type { PgQueryResultHKT } from 'drizzle-orm/pg-core'

import type { SpanDatabase } from '../database.js'
import { operations, services, spans } from '../schema.js'

/**
 * Drop empty names, keeping order.
 */
export function nonEmptyNames(rows: Array<{ name: string | null }>): string[] {
  const names: string[] = []
  for (const row of rows) {
    if (row.name) {
      names.push(row.name)
    }
  }
  return names
}

/**
 * All service names, ascending, without empty names.
 */
export async function listServiceNames<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(db: SpanDatabase<Q, S>): Promise<string[]> {
  const rows = await db
    .select({ name: services.serviceName })
    .from(services)
    .orderBy(asc(services.serviceName))

  return nonEmptyNames(rows)
}

/**
 * Distinct operation names, ascending, without empty names.
 * With a service name, only operations that occur on that service's spans.
 */
export async function listOperationNames<
  Q extends PgQueryResultHKT,
  S extends Record<string, unknown>,
>(db: SpanDatabase<Q, S>, serviceName?: string): Promise<string[]> {
  if (!serviceName) {
    const rows = await db
      .selectDistinct({ name: operations.operationName })
      .from(operations)
      .orderBy(asc(operations.operationName))

    return nonEmptyNames(rows)
  }

  const rows = await db
    .selectDistinct({ name: operations.operationName })
    .from(operations)
    .innerJoin(spans, eq(spans.operationId, operations.id))
    .innerJoin(services, eq(services.id, spans.serviceId))
    .where(eq(services.serviceName, serviceName))
    .orderBy(asc(operations.operationName))

  return nonEmptyNames(rows)
}
