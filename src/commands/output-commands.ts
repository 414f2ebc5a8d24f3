// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Output configuration and workspace-to-output assignment.
 */

import { logger } from '../logger.js';
import { unquote } from '../config/normalize.js';
import type { OutputConfig } from '../config/types.js';
import { checkArgs, type Command, type HandlerRegistry } from './index.js';

const OUTPUT_KEYWORD = 'output';

function parseResolution(value: string): { width: number; height: number } | undefined {
  const match = /^(\d+)x(\d+)$/i.exec(value);
  if (!match) return undefined;
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

function parsePosition(value: string): { x: number; y: number } | undefined {
  const match = /^(-?\d+),(-?\d+)$/.exec(value);
  if (!match) return undefined;
  return { x: parseInt(match[1], 10), y: parseInt(match[2], 10) };
}

/**
 * Apply `resolution`, `position`, `enable` and `disable` options in order.
 * Returns false on the first invalid option; earlier options stay applied.
 */
export function applyOutputOptions(output: OutputConfig, options: string[]): boolean {
  for (let i = 0; i < options.length; i++) {
    const option = options[i].toLowerCase();
    switch (option) {
      case 'enable':
        output.enabled = true;
        break;
      case 'disable':
        output.enabled = false;
        break;
      case 'resolution':
      case 'res': {
        const size = options[i + 1] === undefined ? undefined : parseResolution(options[i + 1]);
        if (!size) {
          logger.error(`Invalid resolution for output ${output.name} (expected <width>x<height>)`);
          return false;
        }
        output.width = size.width;
        output.height = size.height;
        i++;
        break;
      }
      case 'position':
      case 'pos': {
        const position = options[i + 1] === undefined ? undefined : parsePosition(options[i + 1]);
        if (!position) {
          logger.error(`Invalid position for output ${output.name} (expected <x>,<y>)`);
          return false;
        }
        output.x = position.x;
        output.y = position.y;
        i++;
        break;
      }
      default:
        logger.error(`Unknown output option "${options[i]}"`);
        return false;
    }
  }
  return true;
}

/**
 * output - Configure a display. Repeated declarations update the same entry.
 */
export const outputCommand: Command = {
  name: 'output',
  kind: 'anytime',
  description: 'Configure an output',
  usage: 'output <name> [resolution <w>x<h>] [position <x>,<y>] [enable|disable]',
  execute: (args, { config }) => {
    if (!checkArgs(outputCommand, args, 1)) return false;

    const [rawName, ...options] = args;
    const name = unquote(rawName);
    let output = config.outputConfigs.find((oc) => oc.name === name);
    if (!output) {
      output = { name, enabled: true, width: -1, height: -1, x: -1, y: -1 };
      config.outputConfigs.push(output);
    }
    return applyOutputOptions(output, options);
  },
};

/**
 * workspace - `workspace <name> output <output>` pins a workspace to an
 * output. Without `output` it switches workspace, which needs a session.
 */
export const workspaceCommand: Command = {
  name: 'workspace',
  kind: 'anytime',
  description: 'Assign a workspace to an output, or switch workspace',
  usage: 'workspace <name> [output <output>]',
  execute: (args, { config, hooks }) => {
    if (!checkArgs(workspaceCommand, args, 1)) return false;

    const keyword = args.findIndex((arg, i) => i > 0 && arg.toLowerCase() === OUTPUT_KEYWORD);
    if (keyword === -1) {
      if (!config.active) {
        logger.error(`Cannot switch to workspace ${args.join(' ')} before the session is running`);
        return false;
      }
      return hooks.performAction(workspaceCommand.name, args);
    }

    if (keyword !== args.length - 2) {
      logger.error(`Invalid workspace command. Usage: ${workspaceCommand.usage}`);
      return false;
    }

    const workspace = unquote(args.slice(0, keyword).join(' '));
    const output = unquote(args[keyword + 1]);
    const existing = config.workspaceOutputs.find((wo) => wo.workspace === workspace);
    if (existing) {
      existing.output = output;
    } else {
      config.workspaceOutputs.push({ workspace, output });
    }
    logger.debug(`Assigning workspace ${workspace} to output ${output}`);
    return true;
  },
};

export function registerOutputCommands(registry: HandlerRegistry): void {
  registry.registerCommand(outputCommand);
  registry.registerCommand(workspaceCommand);
}
