// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * Locating, parsing and hot-reloading the session config file:
 *
 * - types.ts          - Type definitions (SwayConfig, CommandRegistry, ...)
 * - loader.ts         - Path resolution and file reading
 * - normalize.ts      - Comment stripping and tokenizing
 * - variables.ts      - $variable table and substitution
 * - modes.ts          - Binding modes
 * - deferred-queue.ts - Commands waiting for a running session
 * - store.ts          - Store defaults and disposal
 * - parser.ts         - The per-line dispatch pass
 * - manager.ts        - Load, reload and activation
 *
 * Usage:
 *   import { ConfigManager } from './config/index.js';
 *   const manager = new ConfigManager({ registry, hooks });
 *   manager.loadConfig();
 */

export type {
  Variable,
  Binding,
  Mode,
  OutputConfig,
  WorkspaceOutput,
  LayoutKind,
  SwayConfig,
  HandlerKind,
  HandlerInfo,
  CommandRegistry,
  SessionHooks,
  DiagnosticKind,
  ConfigDiagnostic,
  ParseReport,
} from './types.js';

export { ConfigError, isConfigError } from './errors.js';
export type { ConfigErrorKind } from './errors.js';

export { resolveConfigPath, readConfigFile } from './loader.js';

export { normalizeLine, stripComments, splitArgs, unquote } from './normalize.js';

export {
  VARIABLE_MARKER,
  VariableTable,
  doVarReplacement,
  normalizeVariableName,
} from './variables.js';
export type { SubstitutionMode, SubstitutionOptions } from './variables.js';

export { DEFAULT_MODE, ModeStore } from './modes.js';
export { DeferredQueue } from './deferred-queue.js';
export { createConfig, disposeConfig } from './store.js';
export { parseConfig, dispatchLine, splitLines } from './parser.js';

export { ConfigManager } from './manager.js';
export type { ConfigManagerOptions } from './manager.js';

export { getConfigPath, getConfigCandidates } from '../paths.js';
