// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config Manager
 *
 * Owns the live configuration. A load or reload always builds a fresh store,
 * parses into it, publishes it, and only then tears down the previous one,
 * so anyone reading `manager.config` sees either the old store or the
 * complete new one.
 */

import { logger } from '../logger.js';
import type { FileCheck } from '../paths.js';
import { ConfigError, isConfigError } from './errors.js';
import { readConfigFile, resolveConfigPath } from './loader.js';
import { parseConfig, runCommand } from './parser.js';
import { createConfig, disposeConfig } from './store.js';
import type { CommandRegistry, ParseReport, SessionHooks, SwayConfig } from './types.js';

export interface ConfigManagerOptions {
  registry: CommandRegistry;
  hooks: SessionHooks;
  /** Environment used for path resolution (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Readability check used for path resolution */
  fileCheck?: FileCheck;
}

export class ConfigManager {
  private readonly registry: CommandRegistry;
  private readonly hooks: SessionHooks;
  private readonly env: NodeJS.ProcessEnv;
  private readonly fileCheck?: FileCheck;

  private live: SwayConfig | null = null;
  private report: ParseReport | null = null;
  private path: string | null = null;
  private parsing = false;

  constructor(options: ConfigManagerOptions) {
    this.registry = options.registry;
    this.hooks = options.hooks;
    this.env = options.env ?? process.env;
    this.fileCheck = options.fileCheck;
  }

  /** The live configuration, or null before the first load */
  get config(): SwayConfig | null {
    return this.live;
  }

  /** Report of the most recent parse pass */
  get lastReport(): ParseReport | null {
    return this.report;
  }

  /** Path of the most recently loaded file */
  get configPath(): string | null {
    return this.path;
  }

  /**
   * Locate and read a config file, then parse it. The parse counts as a
   * reload when a configuration is already live.
   *
   * Returns false without touching the live store when no file can be found
   * or read.
   */
  loadConfig(file?: string): boolean {
    logger.verbose('Loading config');

    let configPath: string;
    let text: string;
    try {
      this.assertIdle();
      this.hooks.inputInit();
      configPath = resolveConfigPath(file, this.env, this.fileCheck);
      text = readConfigFile(configPath);
    } catch (error) {
      if (isConfigError(error)) {
        logger.error(error.message);
        return false;
      }
      throw error;
    }

    this.path = configPath;
    return this.readConfig(text, this.live !== null);
  }

  /**
   * Parse `text` into a new store and make it live.
   *
   * With `isActive`, commands that need a running session execute right away
   * instead of being queued, and the layout is recomputed afterwards.
   * The new store is published even when some lines fail; the return value
   * reports whether every line succeeded.
   */
  readConfig(text: string, isActive: boolean): boolean {
    try {
      this.assertIdle();
    } catch (error) {
      if (isConfigError(error)) {
        logger.error(error.message);
        return false;
      }
      throw error;
    }

    const previous = this.live;
    const config = createConfig();

    if (isActive) {
      logger.debug('Performing configuration file reload');
      config.reloading = true;
      config.active = true;
    }

    let report: ParseReport;
    this.parsing = true;
    try {
      report = parseConfig(text, config, this.registry);
    } finally {
      this.parsing = false;
    }

    this.live = config;
    this.report = report;

    if (isActive) {
      config.reloading = false;
      this.hooks.arrangeWindows(-1, -1);
    }
    if (previous) {
      disposeConfig(previous);
    }

    return report.success;
  }

  /**
   * Mark the live configuration active and run the commands that were
   * queued while the session was starting, in source order.
   */
  activate(): boolean {
    const config = this.live;
    if (!config) {
      logger.warn('No configuration loaded; nothing to activate');
      return false;
    }

    config.active = true;
    let success = true;
    for (const command of config.cmdQueue.drain()) {
      logger.debug(`Running deferred command \`\`${command}''`);
      if (!runCommand(this.registry, command, config)) {
        logger.error(`Deferred command failed \`\`${command}''`);
        success = false;
      }
    }
    return success;
  }

  private assertIdle(): void {
    if (this.parsing) {
      throw new ConfigError(
        'Configuration reload requested while a reload is in progress',
        'reload_in_progress'
      );
    }
  }
}
