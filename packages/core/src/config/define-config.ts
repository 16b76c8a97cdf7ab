/**
 * Define Config Helper
 *
 * Provides type-safe configuration for spanstore.config.ts files.
 */

import type { SpanStoreConfig } from './types.js';

/**
 * Define a spanstore configuration with full type safety.
 *
 * @example
 * ```typescript
 * // spanstore.config.ts
 * import { defineConfig } from '@spanstore/core';
 * import { createPostgresReader } from '@spanstore/postgres';
 *
 * export default defineConfig({
 *   reader: () => createPostgresReader({ url: '$DATABASE_URL' }),
 *   defaults: { numTraces: 20, lookback: '1h' },
 * });
 * ```
 */
export function defineConfig(config: SpanStoreConfig): SpanStoreConfig {
  return config;
}
