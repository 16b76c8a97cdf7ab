/**
 * Reader lifecycle for CLI commands.
 */

import { resolve } from 'node:path';

import { loadConfig } from '../../config/index.js';
import type { ResolvedConfig } from '../../config/types.js';
import { isReaderError } from '../../errors.js';
import type { SpanReader } from '../../traces/types.js';
import * as output from './output.js';

/**
 * Options shared by every command that reads the store.
 */
export interface ReaderCommandOptions {
  config?: string;
  json?: boolean;
}

/**
 * Context handed to a command body.
 */
export interface ReaderContext {
  reader: SpanReader;
  config: ResolvedConfig;
  signal: AbortSignal;
}

/**
 * Load config, create the reader, run `fn`, and close the reader.
 * Ctrl-C aborts the running operation.
 */
export async function withReader<T>(
  options: ReaderCommandOptions,
  fn: (context: ReaderContext) => Promise<T>
): Promise<T> {
  const configPath = options.config ? resolve(options.config) : undefined;
  const config = await loadConfig(configPath);
  const reader = await config.createReader();

  if (config.verbose) {
    output.info(`Using ${config.name ?? reader.name} reader`);
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);

  try {
    return await fn({ reader, config, signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await reader.close?.();
  }
}

/**
 * Render an error for the terminal, including the storage cause of a ReaderError.
 */
export function describeError(error: unknown): string {
  if (isReaderError(error)) {
    const context = Object.keys(error.context).length > 0
      ? ` (${JSON.stringify(error.context, (_key, value: unknown) =>
          typeof value === 'bigint' ? value.toString() : value)})`
      : '';
    return `${error.message}${context}`;
  }
  return error instanceof Error ? error.message : String(error);
}
