// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Actions that only make sense as the target of a key binding. The parser
 * rejects them as top-level config lines.
 */

import type { Command, HandlerRegistry } from './index.js';

function action(name: string, description: string, usage: string): Command {
  return {
    name,
    kind: 'keybinding',
    description,
    usage,
    execute: (args, { hooks }) => hooks.performAction(name, args),
  };
}

export const actionCommands: Command[] = [
  action('kill', 'Close the focused window', 'kill'),
  action('focus', 'Move focus', 'focus <direction|parent|child|mode_toggle>'),
  action('move', 'Move the focused container', 'move <direction|scratchpad|workspace <name>>'),
  action('layout', 'Change the layout of the focused container', 'layout <splith|splitv|stacking|tabbed>'),
  action('split', 'Split the focused container', 'split <h|v|horizontal|vertical>'),
  action('fullscreen', 'Toggle fullscreen', 'fullscreen'),
  action('reload', 'Reload the config file', 'reload'),
  action('exit', 'End the session', 'exit'),
];

export function registerActionCommands(registry: HandlerRegistry): void {
  for (const command of actionCommands) {
    registry.registerCommand(command);
  }
}
