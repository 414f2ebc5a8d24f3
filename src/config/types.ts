// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Shared type definitions for the config store, the command registry seen by
 * the parser, and the session collaborators invoked around a load.
 */

import type { DeferredQueue } from './deferred-queue.js';
import type { ModeStore } from './modes.js';
import type { VariableTable } from './variables.js';

export interface Variable {
  /** Name without the leading `$` marker */
  name: string;
  value: string;
}

export interface Binding {
  /** Key combination, e.g. ['Mod4', 'Shift', 'q'] */
  keys: string[];
  command: string;
}

export interface Mode {
  name: string;
  bindings: Binding[];
}

export interface OutputConfig {
  name: string;
  enabled: boolean;
  /** -1 when unset */
  width: number;
  height: number;
  x: number;
  y: number;
}

export interface WorkspaceOutput {
  workspace: string;
  output: string;
}

export type LayoutKind = 'none' | 'default' | 'stacking' | 'tabbed' | 'horizontal' | 'vertical' | 'auto';

/**
 * The aggregate configuration built by one parse pass.
 */
export interface SwayConfig {
  symbols: VariableTable;
  modes: ModeStore;
  workspaceOutputs: WorkspaceOutput[];
  outputConfigs: OutputConfig[];
  cmdQueue: DeferredQueue;

  floatingModifier: string | null;
  defaultLayout: LayoutKind;
  defaultOrientation: LayoutKind;

  // Flags
  focusFollowsMouse: boolean;
  mouseWarping: boolean;
  reloading: boolean;
  active: boolean;
  failed: boolean;
  autoBackAndForth: boolean;

  gapsInner: number;
  gapsOuter: number;

  /** Set once the store has been replaced and torn down */
  disposed: boolean;
}

/**
 * When a command may run.
 * - `anytime`: runs while the config is parsed and at runtime
 * - `compositor-ready`: needs a running session; queued during the first load
 * - `keybinding`: only valid as the target of a binding
 */
export type HandlerKind = 'anytime' | 'compositor-ready' | 'keybinding';

/**
 * Handler metadata as seen by the parser.
 */
export interface HandlerInfo {
  name: string;
  kind: HandlerKind;
}

/**
 * The command registry the parser dispatches into.
 */
export interface CommandRegistry {
  findHandler(token: string): HandlerInfo | undefined;
  /** Execute one directive against the given store. Returns success. */
  handleCommand(line: string, config: SwayConfig): boolean;
}

/**
 * Runtime collaborators invoked around a load.
 */
export interface SessionHooks {
  /** Called at the start of every load, before path resolution */
  inputInit(): void;
  /** Full layout recompute; -1 means "use the output size" */
  arrangeWindows(width: number, height: number): void;
  /** Launch a program for exec / exec_always */
  spawn(command: string): boolean;
  /** Perform a keybinding-only action (focus, move, kill, ...) */
  performAction(action: string, args: string[]): boolean;
}

export type DiagnosticKind = 'unknown-command' | 'invalid-in-config' | 'command-failed';

export interface ConfigDiagnostic {
  /** 1-based line number in the source */
  line: number;
  /** The normalized line */
  text: string;
  kind: DiagnosticKind;
  message: string;
}

/**
 * Outcome of one parse pass.
 */
export interface ParseReport {
  success: boolean;
  linesRead: number;
  deferred: number;
  diagnostics: ConfigDiagnostic[];
}
