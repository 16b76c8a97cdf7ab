/**
 * Constants
 *
 * Centralized configuration defaults for spanstore.
 */

// =============================================================================
// Query Defaults
// =============================================================================

/** Traces returned by FindTraces when numTraces is absent or not positive */
export const DEFAULT_NUM_TRACES = 10;

/** Rows fetched per requested trace before deduplicating trace ids */
export const TRACE_ID_OVERFETCH_FACTOR = 100;

/** Concurrent per-trace fetches in FindTraces */
export const DEFAULT_FETCH_CONCURRENCY = 4;

/** Lookback window used by the deps command */
export const DEFAULT_LOOKBACK = '24h';

// =============================================================================
// Config Discovery
// =============================================================================

/** Config file names to search for (in order of priority) */
export const CONFIG_FILE_NAMES = [
  'spanstore.config.ts',
  'spanstore.config.js',
  'spanstore.config.mjs',
] as const;

/** Env file names the CLI loads (in order of priority) */
export const ENV_FILE_NAMES = ['.env', '.env.local'] as const;
