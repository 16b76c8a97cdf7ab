/**
 * spanstore Configuration Types
 *
 * Defines the schema for spanstore.config.ts files.
 */

import type { SpanReader } from '../traces/types.js';

// =============================================================================
// Reader Configuration
// =============================================================================

/**
 * Creates the reader the CLI talks to. Called once per command.
 */
export type ReaderFactory = () => SpanReader | Promise<SpanReader>;

/**
 * Defaults applied by CLI commands when an option is not given.
 */
export interface QueryDefaultsConfig {
  /** Traces returned by `find` (default: 10) */
  numTraces?: number;

  /** Lookback window for `deps`, e.g. '1h', '7d' (default: '24h') */
  lookback?: string;
}

// =============================================================================
// Main Configuration
// =============================================================================

/**
 * spanstore configuration.
 */
export interface SpanStoreConfig {
  /** Display name for the store (default: the reader's name) */
  name?: string;

  /**
   * The reader instance, or a factory creating it.
   * Prefer a factory so that commands which fail early never open a connection.
   */
  reader: SpanReader | ReaderFactory;

  /** CLI query defaults */
  defaults?: QueryDefaultsConfig;

  /** Verbose logging */
  verbose?: boolean;
}

// =============================================================================
// Resolved Configuration
// =============================================================================

/**
 * Resolved query defaults.
 */
export interface ResolvedQueryDefaults {
  numTraces: number;

  /** Lookback window in milliseconds */
  lookback: number;
}

/**
 * Configuration with defaults applied.
 */
export interface ResolvedConfig {
  name: string | undefined;
  createReader: () => Promise<SpanReader>;
  defaults: ResolvedQueryDefaults;
  verbose: boolean;
}

/**
 * Check if the configured reader is a factory rather than an instance.
 */
export function isReaderFactory(reader: SpanStoreConfig['reader']): reader is ReaderFactory {
  return typeof reader === 'function';
}
