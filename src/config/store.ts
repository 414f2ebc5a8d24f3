// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config Store
 *
 * Creation of a store with defaults and teardown of a replaced one.
 */

import { DeferredQueue } from './deferred-queue.js';
import { ModeStore } from './modes.js';
import type { SwayConfig } from './types.js';
import { VariableTable } from './variables.js';

/**
 * Create an empty store: no symbols, outputs or queued commands, a single
 * `default` mode that is current, mouse focus and warping enabled.
 */
export function createConfig(): SwayConfig {
  return {
    symbols: new VariableTable(),
    modes: new ModeStore(),
    workspaceOutputs: [],
    outputConfigs: [],
    cmdQueue: new DeferredQueue(),

    floatingModifier: null,
    defaultLayout: 'none',
    defaultOrientation: 'none',

    focusFollowsMouse: true,
    mouseWarping: true,
    reloading: false,
    active: false,
    failed: false,
    autoBackAndForth: false,

    gapsInner: 0,
    gapsOuter: 0,

    disposed: false,
  };
}

/**
 * Tear down a store that is no longer live. Every owned collection is
 * emptied so stale references cannot observe old state.
 */
export function disposeConfig(config: SwayConfig): void {
  config.symbols.clear();
  config.modes.clear();
  config.cmdQueue.clear();
  config.workspaceOutputs.length = 0;
  config.outputConfigs.length = 0;
  config.disposed = true;
}
