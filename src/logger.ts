// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for config loading.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - errors, warnings and load results */
  NORMAL = 0,
  /** Verbose - per-pass summaries */
  VERBOSE = 1,
  /** Debug - path probes, deferred commands, failing lines */
  DEBUG = 2,
  /** Trace - every dispatched line */
  TRACE = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  normal: LogLevel.NORMAL,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
};

/**
 * Parse log level from CLI options, falling back to the
 * SWAY_CONFIG_LOG_LEVEL environment variable.
 */
export function parseLogLevel(
  options: {
    verbose?: boolean;
    debug?: boolean;
    trace?: boolean;
  },
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  const fromEnv = env.SWAY_CONFIG_LOG_LEVEL?.trim().toLowerCase();
  if (fromEnv && Object.hasOwn(LEVEL_NAMES, fromEnv)) {
    return LEVEL_NAMES[fromEnv];
  }
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a config line as it is dispatched, at TRACE level.
   */
  configLine(lineNumber: number, line: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${String(lineNumber).padStart(4)} | ${this.sanitize(line)}`));
    }
  }

  /**
   * Log the outcome of a parse pass at VERBOSE level.
   */
  parseSummary(lines: number, deferred: number, problems: number, duration: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const status = problems > 0
        ? chalk.yellow(`${problems} problem${problems === 1 ? '' : 's'}`)
        : chalk.green('no problems');
      console.log(
        chalk.dim(`[Config] ${lines} lines, ${deferred} deferred, `) +
        status +
        chalk.dim(` (${duration.toFixed(1)}ms)`)
      );
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
