// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Layout and pointer settings.
 */

import { logger } from '../logger.js';
import type { LayoutKind } from '../config/types.js';
import { checkArgs, parseToggle, type Command, type HandlerRegistry } from './index.js';

const ORIENTATIONS: readonly LayoutKind[] = ['horizontal', 'vertical', 'auto'];
const WORKSPACE_LAYOUTS: readonly LayoutKind[] = ['default', 'stacking', 'tabbed'];

function parseLayout(value: string, allowed: readonly LayoutKind[]): LayoutKind | undefined {
  const lower = value.toLowerCase();
  return allowed.find((layout) => layout === lower);
}

function parseGap(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  return parseInt(value, 10);
}

/**
 * gaps - Set inner and/or outer gaps in pixels.
 */
export const gapsCommand: Command = {
  name: 'gaps',
  kind: 'anytime',
  description: 'Set the gaps between and around windows',
  usage: 'gaps [inner|outer] <pixels>',
  execute: (args, { config }) => {
    if (!checkArgs(gapsCommand, args, 1)) return false;

    if (args.length === 1) {
      const amount = parseGap(args[0]);
      if (amount === undefined) {
        logger.error(`Invalid gaps amount "${args[0]}"`);
        return false;
      }
      config.gapsInner = amount;
      config.gapsOuter = amount;
      return true;
    }

    const [which, value] = args;
    const amount = parseGap(value);
    if (amount === undefined) {
      logger.error(`Invalid gaps amount "${value}"`);
      return false;
    }
    switch (which.toLowerCase()) {
      case 'inner':
        config.gapsInner = amount;
        return true;
      case 'outer':
        config.gapsOuter = amount;
        return true;
      default:
        logger.error(`Invalid gaps command (expected inner or outer, got "${which}")`);
        return false;
    }
  },
};

export const floatingModifierCommand: Command = {
  name: 'floating_modifier',
  kind: 'anytime',
  description: 'Modifier held to drag floating windows',
  usage: 'floating_modifier <modifier>',
  execute: (args, { config }) => {
    if (!checkArgs(floatingModifierCommand, args, 1)) return false;
    config.floatingModifier = args[0];
    return true;
  },
};

export const defaultOrientationCommand: Command = {
  name: 'default_orientation',
  kind: 'anytime',
  description: 'Orientation of new workspaces',
  usage: 'default_orientation horizontal|vertical|auto',
  execute: (args, { config }) => {
    if (!checkArgs(defaultOrientationCommand, args, 1)) return false;
    const orientation = parseLayout(args[0], ORIENTATIONS);
    if (!orientation) {
      logger.error(`Invalid orientation "${args[0]}"`);
      return false;
    }
    config.defaultOrientation = orientation;
    return true;
  },
};

export const workspaceLayoutCommand: Command = {
  name: 'workspace_layout',
  kind: 'anytime',
  description: 'Layout of new workspaces',
  usage: 'workspace_layout default|stacking|tabbed',
  execute: (args, { config }) => {
    if (!checkArgs(workspaceLayoutCommand, args, 1)) return false;
    const layout = parseLayout(args[0], WORKSPACE_LAYOUTS);
    if (!layout) {
      logger.error(`Invalid workspace layout "${args[0]}"`);
      return false;
    }
    config.defaultLayout = layout;
    return true;
  },
};

export const focusFollowsMouseCommand: Command = {
  name: 'focus_follows_mouse',
  kind: 'anytime',
  description: 'Move focus to the window under the pointer',
  usage: 'focus_follows_mouse yes|no',
  execute: (args, { config }) => {
    if (!checkArgs(focusFollowsMouseCommand, args, 1)) return false;
    const enabled = parseToggle(args[0]);
    if (enabled === undefined) {
      logger.error(`Invalid focus_follows_mouse value "${args[0]}"`);
      return false;
    }
    config.focusFollowsMouse = enabled;
    return true;
  },
};

export const mouseWarpingCommand: Command = {
  name: 'mouse_warping',
  kind: 'anytime',
  description: 'Warp the pointer when focus moves to another output',
  usage: 'mouse_warping output|none',
  execute: (args, { config }) => {
    if (!checkArgs(mouseWarpingCommand, args, 1)) return false;
    switch (args[0].toLowerCase()) {
      case 'output':
        config.mouseWarping = true;
        return true;
      case 'none':
        config.mouseWarping = false;
        return true;
      default:
        logger.error(`Invalid mouse_warping value "${args[0]}"`);
        return false;
    }
  },
};

export const autoBackAndForthCommand: Command = {
  name: 'workspace_auto_back_and_forth',
  kind: 'anytime',
  description: 'Switching to the current workspace returns to the previous one',
  usage: 'workspace_auto_back_and_forth yes|no',
  execute: (args, { config }) => {
    if (!checkArgs(autoBackAndForthCommand, args, 1)) return false;
    const enabled = parseToggle(args[0]);
    if (enabled === undefined) {
      logger.error(`Invalid workspace_auto_back_and_forth value "${args[0]}"`);
      return false;
    }
    config.autoBackAndForth = enabled;
    return true;
  },
};

export function registerLayoutCommands(registry: HandlerRegistry): void {
  registry.registerCommand(gapsCommand);
  registry.registerCommand(floatingModifierCommand);
  registry.registerCommand(defaultOrientationCommand);
  registry.registerCommand(workspaceLayoutCommand);
  registry.registerCommand(focusFollowsMouseCommand);
  registry.registerCommand(mouseWarpingCommand);
  registry.registerCommand(autoBackAndForthCommand);
}
