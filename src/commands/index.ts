// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command registry for config directives.
 */

import { logger } from '../logger.js';
import { splitArgs } from '../config/normalize.js';
import type {
  CommandRegistry,
  HandlerInfo,
  SessionHooks,
  SwayConfig,
} from '../config/types.js';
import type { SubstitutionOptions } from '../config/variables.js';

export interface CommandContext {
  config: SwayConfig;
  hooks: SessionHooks;
  /** The directive after variable substitution */
  line: string;
  substitution: SubstitutionOptions;
}

export interface Command extends HandlerInfo {
  description: string;
  usage: string;
  /** Run on the raw line, without $variable substitution */
  rawArgs?: boolean;
  execute: (args: string[], context: CommandContext) => boolean;
}

export interface HandlerRegistryOptions {
  substitution?: SubstitutionOptions;
}

export class HandlerRegistry implements CommandRegistry {
  private readonly commands: Map<string, Command> = new Map();
  private readonly substitution: SubstitutionOptions;

  constructor(
    private readonly hooks: SessionHooks,
    options: HandlerRegistryOptions = {}
  ) {
    this.substitution = options.substitution ?? {};
  }

  registerCommand(command: Command): void {
    this.commands.set(command.name.toLowerCase(), command);
  }

  /**
   * Command names match case-insensitively.
   */
  findHandler(token: string): Command | undefined {
    return this.commands.get(token.toLowerCase());
  }

  /** Commands in registration order */
  getAllCommands(): Command[] {
    return Array.from(this.commands.values());
  }

  handleCommand(line: string, config: SwayConfig): boolean {
    const command = this.findHandler(splitArgs(line)[0] ?? '');
    if (!command) {
      logger.error(`Unknown command \`\`${line}''`);
      return false;
    }

    const expanded = command.rawArgs ? line : config.symbols.replace(line, this.substitution);
    const args = splitArgs(expanded).slice(1);
    return command.execute(args, {
      config,
      hooks: this.hooks,
      line: expanded,
      substitution: this.substitution,
    });
  }
}

/**
 * Log and reject a command called with too few arguments.
 */
export function checkArgs(command: Command, args: string[], min: number): boolean {
  if (args.length >= min) return true;
  logger.error(
    `Invalid ${command.name} command (expected at least ${min} argument${min === 1 ? '' : 's'}, got ${args.length}). Usage: ${command.usage}`
  );
  return false;
}

/**
 * Parse yes/no style toggles. Returns undefined for anything else.
 */
export function parseToggle(value: string): boolean | undefined {
  switch (value.toLowerCase()) {
    case 'yes':
    case 'true':
    case 'on':
    case 'enable':
      return true;
    case 'no':
    case 'false':
    case 'off':
    case 'disable':
      return false;
    default:
      return undefined;
  }
}
