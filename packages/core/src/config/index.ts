/**
 * Config Module
 *
 * Configuration system for @spanstore/core.
 */

export type {
  SpanStoreConfig,
  ResolvedConfig,
  ReaderFactory,
  QueryDefaultsConfig,
  ResolvedQueryDefaults,
} from './types.js';

export { isReaderFactory } from './types.js';

export { defineConfig } from './define-config.js';

export {
  resolveEnvVar,
  resolveConfig,
  validateConfig,
} from './resolver.js';

export {
  findUpward,
  findConfigFile,
  loadConfigFile,
  loadConfig,
  getConfigDir,
} from './loader.js';
