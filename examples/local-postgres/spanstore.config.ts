/**
 * spanstore configuration for a local PostgreSQL span store.
 *
 * Load packages/postgres/sql/schema.sql into the database, then:
 *
 *   SPANSTORE_DATABASE_URL=postgres://localhost:5432/spanstore npm run services
 */

import { defineConfig } from '@spanstore/core';
import { createPostgresReader } from '@spanstore/postgres';

export default defineConfig({
  name: 'local',
  reader: () =>
    createPostgresReader({
      url: '$SPANSTORE_DATABASE_URL',
      poolSize: 5,
      fetchConcurrency: 8,
    }),
  defaults: {
    numTraces: 20,
    lookback: '1h',
  },
  verbose: true,
});
