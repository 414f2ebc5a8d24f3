// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Mode Store
 *
 * Named binding sets. The `default` mode is created with the store and is
 * never removed, so `current` always points at a member of `modes`.
 */

import type { Binding, Mode } from './types.js';

export const DEFAULT_MODE = 'default';

export class ModeStore {
  private readonly list: Mode[] = [];
  readonly defaultMode: Mode;
  private currentMode: Mode;

  constructor() {
    this.defaultMode = { name: DEFAULT_MODE, bindings: [] };
    this.list.push(this.defaultMode);
    this.currentMode = this.defaultMode;
  }

  get current(): Mode {
    return this.currentMode;
  }

  /** Modes in declaration order, `default` first */
  get modes(): readonly Mode[] {
    return this.list;
  }

  find(name: string): Mode | undefined {
    return this.list.find((mode) => mode.name === name);
  }

  /**
   * Look up a mode, creating it when it does not exist yet.
   */
  getOrCreate(name: string): Mode {
    let mode = this.find(name);
    if (!mode) {
      mode = { name, bindings: [] };
      this.list.push(mode);
    }
    return mode;
  }

  /**
   * Make an existing mode current. Returns false if it is unknown.
   */
  enter(name: string): boolean {
    const mode = this.find(name);
    if (!mode) return false;
    this.currentMode = mode;
    return true;
  }

  resetToDefault(): void {
    this.currentMode = this.defaultMode;
  }

  /**
   * Add a binding to the current mode. A binding with the same keys is
   * replaced in place. Returns the replaced binding, if any.
   */
  bind(binding: Binding): Binding | undefined {
    const bindings = this.currentMode.bindings;
    const index = bindings.findIndex((b) => sameKeys(b.keys, binding.keys));
    if (index === -1) {
      bindings.push(binding);
      return undefined;
    }
    const previous = bindings[index];
    bindings[index] = binding;
    return previous;
  }

  /**
   * Drop every binding and every mode but `default`.
   */
  clear(): void {
    for (const mode of this.list) {
      mode.bindings.length = 0;
    }
    this.list.length = 0;
    this.list.push(this.defaultMode);
    this.currentMode = this.defaultMode;
  }
}

/**
 * Key combinations compare case-insensitively and regardless of order.
 */
function sameKeys(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  const left = a.map((k) => k.toLowerCase()).sort();
  const right = b.map((k) => k.toLowerCase()).sort();
  return left.every((key, i) => key === right[i]);
}
