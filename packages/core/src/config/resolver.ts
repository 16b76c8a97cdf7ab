/**
 * Config Resolver
 *
 * Resolves environment variables ($VAR syntax) and applies defaults.
 */

import { DEFAULT_LOOKBACK, DEFAULT_NUM_TRACES } from '../constants.js';
import { parseLookback } from '../traces/criteria.js';
import type { SpanStoreConfig, ResolvedConfig } from './types.js';
import { isReaderFactory } from './types.js';

/**
 * Resolve a string value that may contain $ENV_VAR references.
 *
 * @example
 * resolveEnvVar('$DATABASE_URL')  // Returns process.env.DATABASE_URL
 * resolveEnvVar('postgres://localhost/traces')  // Returns as-is
 */
export function resolveEnvVar(value: string): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const envName = value.slice(1);
  const envValue = process.env[envName];

  if (envValue === undefined) {
    throw new Error(`Environment variable ${envName} is not set (referenced as ${value})`);
  }

  return envValue;
}

/**
 * Resolve the full configuration.
 */
export function resolveConfig(config: SpanStoreConfig): ResolvedConfig {
  const { reader } = config;

  return {
    name: config.name,
    createReader: async () => (isReaderFactory(reader) ? reader() : reader),
    defaults: {
      numTraces: config.defaults?.numTraces ?? DEFAULT_NUM_TRACES,
      lookback: parseLookback(config.defaults?.lookback ?? DEFAULT_LOOKBACK),
    },
    verbose: config.verbose ?? false,
  };
}

/**
 * Validate that required configuration is present.
 */
export function validateConfig(config: SpanStoreConfig): void {
  if (!config.reader) {
    throw new Error('Config error: "reader" is required');
  }

  if (typeof config.reader !== 'function' && typeof config.reader !== 'object') {
    throw new Error('Config error: "reader" must be a SpanReader or a function returning one');
  }

  const numTraces = config.defaults?.numTraces;
  if (numTraces !== undefined && (!Number.isInteger(numTraces) || numTraces <= 0)) {
    throw new Error('Config error: "defaults.numTraces" must be a positive integer');
  }

  const lookback = config.defaults?.lookback;
  if (lookback !== undefined) {
    try {
      parseLookback(lookback);
    } catch (error) {
      throw new Error(
        `Config error: "defaults.lookback" ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
