// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Turns an optional explicit path into config text on disk.
 */

import * as fs from 'fs';
import { getConfigPath, type FileCheck } from '../paths.js';
import { ConfigError } from './errors.js';

/**
 * Use the explicit path if given, otherwise search the standard locations.
 * Throws a `not_found` ConfigError when nothing is found.
 */
export function resolveConfigPath(
  file?: string,
  env: NodeJS.ProcessEnv = process.env,
  exists?: FileCheck
): string {
  if (file !== undefined) {
    return file;
  }
  const found = getConfigPath(env, exists);
  if (found === null) {
    throw new ConfigError('Unable to find a config file!', 'not_found');
  }
  return found;
}

/**
 * Read the whole config file. Throws an `unreadable` ConfigError.
 */
export function readConfigFile(configPath: string): string {
  try {
    return fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Unable to open ${configPath} for reading: ${error instanceof Error ? error.message : error}`,
      'unreadable',
      { cause: error }
    );
  }
}
