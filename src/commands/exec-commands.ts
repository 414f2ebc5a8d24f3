// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Program launch commands. Both need a running session, so on the first
 * load they are queued until the session is activated.
 */

import { logger } from '../logger.js';
import { checkArgs, type Command, type HandlerRegistry } from './index.js';

/**
 * exec - Launch a program once; ignored when the config is reloaded.
 */
export const execCommand: Command = {
  name: 'exec',
  kind: 'compositor-ready',
  description: 'Launch a program at startup',
  usage: 'exec <command>',
  execute: (args, { config, hooks }) => {
    if (!checkArgs(execCommand, args, 1)) return false;
    const command = args.join(' ');
    if (config.reloading) {
      logger.debug(`Ignoring exec during reload \`\`${command}''`);
      return true;
    }
    return hooks.spawn(command);
  },
};

/**
 * exec_always - Launch a program at startup and on every reload.
 */
export const execAlwaysCommand: Command = {
  name: 'exec_always',
  kind: 'compositor-ready',
  description: 'Launch a program at startup and on every reload',
  usage: 'exec_always <command>',
  execute: (args, { hooks }) => {
    if (!checkArgs(execAlwaysCommand, args, 1)) return false;
    return hooks.spawn(args.join(' '));
  },
};

export function registerExecCommands(registry: HandlerRegistry): void {
  registry.registerCommand(execCommand);
  registry.registerCommand(execAlwaysCommand);
}
