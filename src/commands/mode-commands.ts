// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Mode and key binding commands.
 */

import { logger } from '../logger.js';
import { unquote } from '../config/normalize.js';
import { checkArgs, type Command, type HandlerRegistry } from './index.js';

const BLOCK_OPEN = '{';

/**
 * mode - Open a mode block (`mode "resize" {`) or switch to a known mode.
 * Bindings declared inside a block belong to that mode until the closing `}`.
 */
export const modeCommand: Command = {
  name: 'mode',
  kind: 'anytime',
  description: 'Declare a binding mode, or switch to one',
  usage: 'mode <name> [{]',
  execute: (args, { config }) => {
    if (!checkArgs(modeCommand, args, 1)) return false;

    let text = args.join(' ');
    const opensBlock = text.endsWith(BLOCK_OPEN);
    if (opensBlock) {
      text = text.slice(0, -BLOCK_OPEN.length).trim();
    }
    const name = unquote(text);
    if (!name) {
      logger.error('Mode name must not be empty');
      return false;
    }

    if (opensBlock) {
      config.modes.getOrCreate(name);
      return config.modes.enter(name);
    }
    if (!config.modes.enter(name)) {
      logger.error(`Unknown mode "${name}"`);
      return false;
    }
    return true;
  },
};

/**
 * bindsym - Bind a key combination to a command in the current mode.
 */
export const bindsymCommand: Command = {
  name: 'bindsym',
  kind: 'anytime',
  description: 'Bind a key combination to a command',
  usage: 'bindsym <modifier+key> <command>',
  execute: (args, { config }) => {
    if (!checkArgs(bindsymCommand, args, 2)) return false;

    const [combo, ...command] = args;
    const keys = combo.split('+');
    if (keys.some((key) => key.length === 0)) {
      logger.error(`Invalid key combination "${combo}"`);
      return false;
    }

    const replaced = config.modes.bind({ keys, command: command.join(' ') });
    if (replaced) {
      logger.debug(`Overwriting binding ${combo} in mode "${config.modes.current.name}" (was \`\`${replaced.command}'')`);
    }
    return true;
  },
};

export function registerModeCommands(registry: HandlerRegistry): void {
  registry.registerCommand(modeCommand);
  registry.registerCommand(bindsymCommand);
}
