// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Human-readable summary of a loaded configuration.
 */

import chalk from 'chalk';
import type { ParseReport, SwayConfig } from '../config/types.js';

function heading(title: string, count: number): string {
  return chalk.bold(`${title} (${count}):`);
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function formatConfigSummary(
  config: SwayConfig,
  report: ParseReport,
  configPath: string | null
): string[] {
  const lines: string[] = [];

  if (configPath) {
    lines.push(`${chalk.bold('Config:')} ${configPath}`);
  }

  const variables = config.symbols.entries();
  if (variables.length > 0) {
    lines.push(heading('Variables', variables.length));
    for (const variable of variables) {
      lines.push(`  $${variable.name} = ${variable.value}`);
    }
  }

  const modes = config.modes.modes;
  lines.push(heading('Modes', modes.length));
  for (const mode of modes) {
    lines.push(`  ${chalk.cyan(mode.name)} (${plural(mode.bindings.length, 'binding')})`);
    for (const binding of mode.bindings) {
      lines.push(chalk.dim(`    ${binding.keys.join('+')} → ${binding.command}`));
    }
  }

  if (config.outputConfigs.length > 0) {
    lines.push(heading('Outputs', config.outputConfigs.length));
    for (const output of config.outputConfigs) {
      const parts = [output.name];
      if (output.width !== -1) parts.push(`${output.width}x${output.height}`);
      if (output.x !== -1) parts.push(`at ${output.x},${output.y}`);
      if (!output.enabled) parts.push('(disabled)');
      lines.push(`  ${parts.join(' ')}`);
    }
  }

  if (config.workspaceOutputs.length > 0) {
    lines.push(heading('Workspaces', config.workspaceOutputs.length));
    for (const assignment of config.workspaceOutputs) {
      lines.push(`  ${assignment.workspace} → ${assignment.output}`);
    }
  }

  const queued = config.cmdQueue.toArray();
  if (queued.length > 0) {
    lines.push(heading('Deferred commands', queued.length));
    for (const command of queued) {
      lines.push(`  ${command}`);
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push(heading('Problems', report.diagnostics.length));
    for (const diagnostic of report.diagnostics) {
      const color = diagnostic.kind === 'command-failed' ? chalk.red : chalk.yellow;
      lines.push(color(`  line ${diagnostic.line}: ${diagnostic.message}`) + chalk.dim(` \`\`${diagnostic.text}''`));
    }
  }

  lines.push(
    report.success
      ? chalk.green(`✓ ${plural(report.linesRead, 'line')} loaded`)
      : chalk.red(`✗ ${plural(report.linesRead, 'line')} loaded with failures`)
  );
  return lines;
}
