// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * `check` command: load a config with dry-run hooks and summarise it.
 */

import { createDefaultRegistry } from '../commands/builtins.js';
import { ConfigManager } from '../config/manager.js';
import { getConfigPath } from '../paths.js';
import { createDryRunHooks, type DryRunHooks } from './hooks.js';
import { formatConfigSummary } from './summary.js';

export interface CheckOptions {
  /** Explicit config path; searched for when omitted */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Load a second time as a live reload */
  reload?: boolean;
  /** Run deferred commands after loading */
  activate?: boolean;
  /** Use compounding variable substitution */
  legacyVariables?: boolean;
  /** Hooks that record session requests (a fresh dry-run set by default) */
  hooks?: DryRunHooks;
}

export interface CheckResult {
  exitCode: number;
  lines: string[];
  hooks: DryRunHooks;
}

export function runCheck(options: CheckOptions = {}): CheckResult {
  const hooks = options.hooks ?? createDryRunHooks();
  const registry = createDefaultRegistry(hooks, {
    substitution: { mode: options.legacyVariables ? 'legacy' : 'strict' },
  });
  const manager = new ConfigManager({ registry, hooks, env: options.env });

  let success = manager.loadConfig(options.path);
  if (manager.config && options.activate) {
    success = manager.activate() && success;
  }
  if (manager.config && options.reload) {
    success = manager.loadConfig(manager.configPath ?? options.path) && success;
  }

  const config = manager.config;
  const report = manager.lastReport;
  if (!config || !report) {
    return { exitCode: 1, lines: [], hooks };
  }
  return {
    exitCode: success ? 0 : 1,
    lines: formatConfigSummary(config, report, manager.configPath),
    hooks,
  };
}

/**
 * `path` command: the file a load without an explicit path would use.
 */
export function runPath(env: NodeJS.ProcessEnv = process.env): { exitCode: number; path: string | null } {
  const found = getConfigPath(env);
  return { exitCode: found ? 0 : 1, path: found };
}
