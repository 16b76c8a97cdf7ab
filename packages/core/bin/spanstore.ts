#!/usr/bin/env tsx
/**
 * spanstore CLI
 *
 * Entry point for the spanstore command-line interface.
 */

import { config } from 'dotenv';

import { findUpward, getConfigDir } from '../src/config/loader.js';
import { runCli } from '../src/cli/index.js';
import { ENV_FILE_NAMES } from '../src/constants.js';
import { exitWithError } from '../src/cli/utils/output.js';

/**
 * Load the nearest env file at or above the config file's directory, else
 * the nearest one above cwd, else dotenv's default (.env in cwd).
 */
function loadEnvFile(): void {
  const configDir = getConfigDir();
  const envPath =
    (configDir ? findUpward(ENV_FILE_NAMES, configDir) : null) ?? findUpward(ENV_FILE_NAMES);

  config(envPath ? { path: envPath } : undefined);
}

loadEnvFile();
runCli().catch((error: unknown) => {
  exitWithError(error instanceof Error ? error.message : String(error));
});
