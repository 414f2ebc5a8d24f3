// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config file location.
 *
 * The search list is fixed; only HOME, XDG_CONFIG_HOME and XDG_CONFIG_DIRS
 * influence it. Missing variables are treated as empty strings.
 */

import { accessSync, constants } from 'node:fs';
import { logger } from './logger.js';

export type FileCheck = (path: string) => boolean;

/**
 * Whether `path` exists and is readable by this process.
 */
export function isReadable(path: string): boolean {
  try {
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Home and config base directories derived from the environment.
 * The config base is $XDG_CONFIG_HOME, or $HOME/.config when that is unset.
 */
export function getBaseDirs(env: NodeJS.ProcessEnv = process.env): { home: string; configHome: string } {
  const home = env.HOME ?? '';
  let configHome = '';
  if (env.XDG_CONFIG_HOME) {
    configHome = env.XDG_CONFIG_HOME;
  } else if (env.HOME !== undefined) {
    configHome = `${home}/.config`;
  }
  return { home, configHome };
}

/**
 * Candidate paths in priority order, before XDG_CONFIG_DIRS.
 */
export function getConfigCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
  const { home, configHome } = getBaseDirs(env);
  return [
    `${home}/.sway/config`,
    `${configHome}/sway/config`,
    '/etc/sway/config',
    `${home}/.i3/config`,
    `${configHome}/.i3/config`,
    '/etc/i3/config',
  ];
}

/**
 * Find the first readable config file, or null when there is none.
 */
export function getConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  exists: FileCheck = isReadable
): string | null {
  for (const candidate of getConfigCandidates(env)) {
    logger.debug(`Checking for config at ${candidate}`);
    if (exists(candidate)) {
      return candidate;
    }
  }

  logger.debug('Trying to find config in XDG_CONFIG_DIRS');
  const dirs = (env.XDG_CONFIG_DIRS ?? '').split(':').filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = `${dir}/sway/config`;
    logger.debug(`Checking for config at ${candidate}`);
    if (exists(candidate)) {
      return candidate;
    }
  }

  return null;
}
