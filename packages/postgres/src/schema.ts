/**
 * Span store tables
 *
 * Drizzle definitions of the relational schema the reader queries.
 * The write path owns these tables; the reader never creates or migrates them.
 */

import {
  bigint,
  bigserial,
  integer,
  jsonb,
  pgTable,
  serial,
  text,
  timestamp,
} from 'drizzle-orm/pg-core'
import type { SpanRefType } from '@spanstore/core'

export const services = pgTable('services', {
  id: serial('id').primaryKey(),
  serviceName: text('service_name').notNull().unique(),
})

export const operations = pgTable('operations', {
  id: serial('id').primaryKey(),
  operationName: text('operation_name').notNull().unique(),
})

/**
 * One row per span. Trace id halves are stored as signed int8
 * (two's complement of the unsigned value).
 */
export const spans = pgTable('spans', {
  id: bigserial('id', { mode: 'bigint' }).primaryKey(),
  traceIdLow: bigint('trace_id_low', { mode: 'bigint' }).notNull(),
  traceIdHigh: bigint('trace_id_high', { mode: 'bigint' }).notNull(),
  operationId: integer('operation_id')
    .notNull()
    .references(() => operations.id),
  serviceId: integer('service_id')
    .notNull()
    .references(() => services.id),
  processId: text('process_id').notNull(),
  processTags: jsonb('process_tags').$type<Record<string, string>>().notNull().default({}),
  startTime: timestamp('start_time', { withTimezone: true, mode: 'date' }).notNull(),
  // microseconds
  duration: bigint('duration', { mode: 'number' }).notNull(),
})

/**
 * Causal edge from a referencing span (`span_id`) to a referenced child span.
 */
export const spanRefs = pgTable('span_refs', {
  id: bigserial('id', { mode: 'bigint' }).primaryKey(),
  spanId: bigint('span_id', { mode: 'bigint' })
    .notNull()
    .references(() => spans.id),
  childSpanId: bigint('child_span_id', { mode: 'bigint' })
    .notNull()
    .references(() => spans.id),
  refType: text('ref_type').$type<SpanRefType>().notNull().default('child-of'),
})

export type ServiceRow = typeof services.$inferSelect
export type OperationRow = typeof operations.$inferSelect
export type SpanRow = typeof spans.$inferSelect
export type SpanRefRow = typeof spanRefs.$inferSelect
