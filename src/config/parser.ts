// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config Parser
 *
 * Runs one pass over config text: every line is normalized, classified
 * against the command registry, and then executed, deferred or rejected.
 * A bad line never stops the pass.
 */

import { logger } from '../logger.js';
import { isModeClose, normalizeLine, splitArgs } from './normalize.js';
import type {
  CommandRegistry,
  ConfigDiagnostic,
  DiagnosticKind,
  ParseReport,
  SwayConfig,
} from './types.js';

type LineOutcome = 'skipped' | 'executed' | 'deferred' | ConfigDiagnostic;

/**
 * Split text into lines, without the empty entry after a final newline.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse `text` into `config`, dispatching through `registry`.
 *
 * Commands that need a running session are queued on `config.cmdQueue`
 * unless `config.active` is already set.
 */
export function parseConfig(
  text: string,
  config: SwayConfig,
  registry: CommandRegistry
): ParseReport {
  const started = performance.now();
  const lines = splitLines(text);
  const diagnostics: ConfigDiagnostic[] = [];
  let success = true;
  let deferred = 0;

  for (let index = 0; index < lines.length; index++) {
    const outcome = dispatchLine(lines[index], index + 1, config, registry);
    if (outcome === 'deferred') {
      deferred++;
    } else if (typeof outcome === 'object') {
      diagnostics.push(outcome);
      if (outcome.kind === 'command-failed') {
        success = false;
        config.failed = true;
      }
    }
  }

  logger.parseSummary(lines.length, deferred, diagnostics.length, performance.now() - started);
  return { success, linesRead: lines.length, deferred, diagnostics };
}

/**
 * Normalize and route a single raw line.
 */
export function dispatchLine(
  raw: string,
  lineNumber: number,
  config: SwayConfig,
  registry: CommandRegistry
): LineOutcome {
  const line = normalizeLine(raw);
  if (!line) return 'skipped';

  if (isModeClose(line)) {
    config.modes.resetToDefault();
    return 'skipped';
  }

  logger.configLine(lineNumber, line);
  const [name] = splitArgs(line);
  const handler = registry.findHandler(name);

  if (!handler) {
    logger.error(`Invalid command \`\`${line}''`);
    return diagnostic(lineNumber, line, 'unknown-command', `Unknown command "${name}"`);
  }

  if (handler.kind === 'keybinding') {
    logger.error(`Invalid command during config \`\`${line}''`);
    return diagnostic(
      lineNumber,
      line,
      'invalid-in-config',
      `"${handler.name}" can only be used in a key binding`
    );
  }

  if (handler.kind === 'compositor-ready' && !config.active) {
    logger.debug(`Deferring command \`\`${line}''`);
    config.cmdQueue.enqueue(line);
    return 'deferred';
  }

  if (!runCommand(registry, line, config)) {
    logger.debug(`Config load failed for line \`\`${line}''`);
    return diagnostic(lineNumber, line, 'command-failed', `"${handler.name}" failed`);
  }
  return 'executed';
}

/**
 * Execute a directive, treating a thrown error as a failed command.
 */
export function runCommand(registry: CommandRegistry, line: string, config: SwayConfig): boolean {
  try {
    return registry.handleCommand(line, config);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Command \`\`${line}'' threw: ${err.message}`, err);
    return false;
  }
}

function diagnostic(
  line: number,
  text: string,
  kind: DiagnosticKind,
  message: string
): ConfigDiagnostic {
  return { line, text, kind, message };
}
