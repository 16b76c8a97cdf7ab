/**
 * Database handle and storage encodings shared by the query modules
 */

import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import type { TraceId } from '@spanstore/core'

/**
 * Any drizzle Postgres database: postgres.js in production, PGlite in tests.
 */
export type SpanDatabase<
  TQueryResult extends PgQueryResultHKT = PgQueryResultHKT,
  TFullSchema extends Record<string, unknown> = Record<string, never>,
> = PgDatabase<TQueryResult, TFullSchema>

/**
 * Encode an unsigned 64-bit half as the signed int8 stored in the table.
 */
export function toStorageInt64(value: bigint): bigint {
  return BigInt.asIntN(64, value)
}

/**
 * Decode a stored signed int8 back to the unsigned 64-bit half.
 */
export function fromStorageInt64(value: bigint): bigint {
  return BigInt.asUintN(64, value)
}

/**
 * Storage form of a trace id.
 */
export function toStorageTraceId(traceId: TraceId): { low: bigint; high: bigint } {
  return { low: toStorageInt64(traceId.low), high: toStorageInt64(traceId.high) }
}

/**
 * Trace id from stored halves.
 */
export function fromStorageTraceId(low: bigint, high: bigint): TraceId {
  return { high: fromStorageInt64(high), low: fromStorageInt64(low) }
}
