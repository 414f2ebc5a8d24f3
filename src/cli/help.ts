// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Listing of the directives a registry understands.
 */

import chalk from 'chalk';
import type { Command } from '../commands/index.js';

const KIND_NOTES: Record<Command['kind'], string> = {
  anytime: '',
  'compositor-ready': ' (runs once the session starts)',
  keybinding: ' (key bindings only)',
};

export function formatCommandList(commands: readonly Command[]): string[] {
  const width = Math.max(0, ...commands.map((c) => c.usage.length));
  return commands.map(
    (command) =>
      `  ${command.usage.padEnd(width)}  ${chalk.dim(`- ${command.description}${KIND_NOTES[command.kind]}`)}`
  );
}
