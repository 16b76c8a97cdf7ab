/**
 * Postgres connection setup
 * Opens a postgres.js pool and wraps it in a span reader
 */

import { drizzle } from 'drizzle-orm/postgres-js'
import postgres from 'postgres'
import { DEFAULT_FETCH_CONCURRENCY, resolveEnvVar } from '@spanstore/core'
import type { SpanReader } from '@spanstore/core'

import { createSpanReader } from './reader.js'

const DEFAULT_DATABASE_URL = 'postgres://localhost:5432/spanstore'
const DEFAULT_POOL_SIZE = 10

export interface PostgresConfig {
  url: string
  poolSize: number
  fetchConcurrency: number
}

function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback
  }
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`Invalid ${name}: ${value}. Expected a positive integer`)
  }
  return parsed
}

/**
 * Connection settings from the environment.
 */
export function getConfig(): PostgresConfig {
  return {
    url: process.env.SPANSTORE_DATABASE_URL || process.env.DATABASE_URL || DEFAULT_DATABASE_URL,
    poolSize: parsePositiveInt(process.env.SPANSTORE_POOL_SIZE, 'SPANSTORE_POOL_SIZE', DEFAULT_POOL_SIZE),
    fetchConcurrency: parsePositiveInt(
      process.env.SPANSTORE_FETCH_CONCURRENCY,
      'SPANSTORE_FETCH_CONCURRENCY',
      DEFAULT_FETCH_CONCURRENCY
    ),
  }
}

export interface PostgresReaderOptions {
  /**
   * Connection URL, or `$ENV_VAR` to read it from the environment.
   * Defaults to SPANSTORE_DATABASE_URL, then DATABASE_URL.
   */
  url?: string

  /** Maximum pooled connections. Defaults to SPANSTORE_POOL_SIZE or 10. */
  poolSize?: number

  /** Concurrent per-trace fetches. Defaults to SPANSTORE_FETCH_CONCURRENCY or 4. */
  fetchConcurrency?: number

  /** Log each storage operation */
  verbose?: boolean
}

/**
 * Create a span reader with its own connection pool.
 * Each concurrent trace fetch checks out a separate pooled connection;
 * reader.close() ends the pool.
 */
export function createPostgresReader(options: PostgresReaderOptions = {}): SpanReader {
  const config = getConfig()
  const url = options.url ? resolveEnvVar(options.url) : config.url
  const poolSize = options.poolSize ?? config.poolSize
  const fetchConcurrency = options.fetchConcurrency ?? config.fetchConcurrency

  const client = postgres(url, { max: poolSize })
  const db = drizzle(client)

  return createSpanReader({
    db,
    fetchConcurrency,
    verbose: options.verbose,
    onClose: () => client.end(),
  })
}
