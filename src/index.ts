#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * sway-config - inspect session config files
 *
 * Commands:
 *   check [path]    Load a config file and print what it defines
 *   path            Print the config file that would be loaded
 *   commands        List the directives a config file may use
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createDryRunHooks, formatCommandList, runCheck, runPath } from './cli/index.js';
import { createDefaultRegistry } from './commands/builtins.js';
import { logger, parseLogLevel } from './logger.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('sway-config')
  .description('Locate, parse and check session config files')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('--verbose', 'Show per-pass summaries')
  .option('--debug', 'Show path probes and deferred commands')
  .option('--trace', 'Show every dispatched line')
  .hook('preAction', () => {
    logger.setLevel(parseLogLevel(program.opts()));
  });

program
  .command('check [path]')
  .description('Load a config file and print what it defines')
  .option('-r, --reload', 'Load the file a second time as a live reload')
  .option('-a, --activate', 'Run deferred commands after loading')
  .option('--legacy-variables', 'Use compounding $variable substitution')
  .action((path: string | undefined, opts: { reload?: boolean; activate?: boolean; legacyVariables?: boolean }) => {
    const result = runCheck({
      path,
      reload: opts.reload,
      activate: opts.activate,
      legacyVariables: opts.legacyVariables,
    });
    for (const line of result.lines) {
      console.log(line);
    }
    process.exitCode = result.exitCode;
  });

program
  .command('path')
  .description('Print the config file that would be loaded')
  .action(() => {
    const result = runPath();
    if (result.path) {
      console.log(result.path);
    } else {
      console.error(chalk.red('No config file found'));
    }
    process.exitCode = result.exitCode;
  });

program
  .command('commands')
  .description('List the directives a config file may use')
  .action(() => {
    const registry = createDefaultRegistry(createDryRunHooks());
    console.log(chalk.bold('Config directives:'));
    for (const line of formatCommandList(registry.getAllCommands())) {
      console.log(line);
    }
  });

program.parse();
