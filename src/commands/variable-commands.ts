// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { logger } from '../logger.js';
import { normalizeVariableName } from '../config/variables.js';
import { checkArgs, type Command, type HandlerRegistry } from './index.js';

/**
 * set - Define or redefine a $variable. The name is taken as written; the
 * value is expanded against the variables defined so far.
 */
export const setCommand: Command = {
  name: 'set',
  kind: 'anytime',
  rawArgs: true,
  description: 'Define a variable for use in later lines',
  usage: 'set $<name> <value>',
  execute: (args, { config, substitution }) => {
    if (!checkArgs(setCommand, args, 2)) return false;
    const [name, ...value] = args;
    if (!normalizeVariableName(name)) {
      logger.error(`Invalid variable name "${name}"`);
      return false;
    }
    return config.symbols.set(name, config.symbols.replace(value.join(' '), substitution));
  },
};

export function registerVariableCommands(registry: HandlerRegistry): void {
  registry.registerCommand(setCommand);
}
