// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { SessionHooks } from '../config/types.js';
import { registerActionCommands } from './action-commands.js';
import { registerExecCommands } from './exec-commands.js';
import { HandlerRegistry, type HandlerRegistryOptions } from './index.js';
import { registerLayoutCommands } from './layout-commands.js';
import { registerModeCommands } from './mode-commands.js';
import { registerOutputCommands } from './output-commands.js';
import { registerVariableCommands } from './variable-commands.js';

/**
 * A registry with every built-in config command.
 */
export function createDefaultRegistry(
  hooks: SessionHooks,
  options: HandlerRegistryOptions = {}
): HandlerRegistry {
  const registry = new HandlerRegistry(hooks, options);
  registerVariableCommands(registry);
  registerModeCommands(registry);
  registerExecCommands(registry);
  registerLayoutCommands(registry);
  registerOutputCommands(registry);
  registerActionCommands(registry);
  return registry;
}
