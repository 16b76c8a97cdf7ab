/**
 * Config Loader
 *
 * Locates spanstore.config.ts by walking up from a directory, imports it and
 * resolves it.
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { CONFIG_FILE_NAMES } from '../constants.js';
import { resolveConfig, validateConfig } from './resolver.js';
import type { SpanStoreConfig, ResolvedConfig } from './types.js';

/**
 * Path of the first of `fileNames` found in `startDir` or its nearest ancestor
 * containing any of them. Within one directory, names are tried in order.
 */
export function findUpward(fileNames: readonly string[], startDir = process.cwd()): string | null {
  for (let dir = resolve(startDir); ; dir = dirname(dir)) {
    const match = fileNames.map((name) => join(dir, name)).find((path) => existsSync(path));
    if (match) {
      return match;
    }
    if (dirname(dir) === dir) {
      return null;
    }
  }
}

/**
 * Nearest spanstore config file at or above `startDir` (default: cwd).
 */
export function findConfigFile(startDir?: string): string | null {
  return findUpward(CONFIG_FILE_NAMES, startDir);
}

/**
 * Directory holding the nearest config file.
 */
export function getConfigDir(startDir?: string): string | null {
  const configPath = findConfigFile(startDir);
  return configPath ? dirname(configPath) : null;
}

function isSpanStoreConfig(value: unknown): value is SpanStoreConfig {
  if (typeof value !== 'object' || value === null || !('reader' in value)) {
    return false;
  }
  return typeof value.reader === 'function' || typeof value.reader === 'object';
}

async function importDefault(absolutePath: string): Promise<unknown> {
  let module: unknown;
  try {
    module = await import(pathToFileURL(absolutePath).href);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config file ${absolutePath}: ${reason}`, { cause: error });
  }

  return typeof module === 'object' && module !== null && 'default' in module
    ? module.default
    : undefined;
}

/**
 * Import a config file and check that its default export carries a reader.
 */
export async function loadConfigFile(configPath: string): Promise<SpanStoreConfig> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const exported = await importDefault(absolutePath);
  if (!isSpanStoreConfig(exported)) {
    throw new Error(
      `${absolutePath} must default-export a config with a "reader" (use defineConfig)`
    );
  }

  return exported;
}

/**
 * Load, validate and resolve the config at `configPath`, or the nearest one
 * above the working directory.
 */
export async function loadConfig(configPath?: string): Promise<ResolvedConfig> {
  const path = configPath ?? findConfigFile();

  if (!path) {
    throw new Error(
      `No ${CONFIG_FILE_NAMES[0]} found. Create one in your project root or specify --config path.`
    );
  }

  const config = await loadConfigFile(path);
  validateConfig(config);

  return resolveConfig(config);
}
