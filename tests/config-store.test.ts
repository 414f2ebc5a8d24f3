// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { createConfig, disposeConfig } from '../src/config/store.js';
import { DEFAULT_MODE, ModeStore } from '../src/config/modes.js';
import { DeferredQueue } from '../src/config/deferred-queue.js';

describe('createConfig', () => {
  it('starts with defaults', () => {
    const config = createConfig();
    expect(config.focusFollowsMouse).toBe(true);
    expect(config.mouseWarping).toBe(true);
    expect(config.reloading).toBe(false);
    expect(config.active).toBe(false);
    expect(config.failed).toBe(false);
    expect(config.autoBackAndForth).toBe(false);
    expect(config.gapsInner).toBe(0);
    expect(config.gapsOuter).toBe(0);
    expect(config.floatingModifier).toBeNull();
    expect(config.defaultLayout).toBe('none');
    expect(config.defaultOrientation).toBe('none');
    expect(config.disposed).toBe(false);
  });

  it('starts with empty collections and only the default mode', () => {
    const config = createConfig();
    expect(config.symbols.size).toBe(0);
    expect(config.cmdQueue.size).toBe(0);
    expect(config.workspaceOutputs).toEqual([]);
    expect(config.outputConfigs).toEqual([]);
    expect(config.modes.modes).toEqual([{ name: DEFAULT_MODE, bindings: [] }]);
    expect(config.modes.current).toBe(config.modes.modes[0]);
  });

  it('creates independent stores', () => {
    const a = createConfig();
    const b = createConfig();
    a.symbols.set('$mod', 'Mod4');
    a.modes.bind({ keys: ['q'], command: 'kill' });
    expect(b.symbols.size).toBe(0);
    expect(b.modes.current.bindings).toEqual([]);
  });
});

describe('disposeConfig', () => {
  it('empties every owned collection', () => {
    const config = createConfig();
    config.symbols.set('$mod', 'Mod4');
    config.modes.getOrCreate('resize');
    config.modes.enter('resize');
    config.modes.bind({ keys: ['Left'], command: 'resize shrink width 10px' });
    config.cmdQueue.enqueue('exec mako');
    config.workspaceOutputs.push({ workspace: '1', output: 'DP-1' });
    config.outputConfigs.push({ name: 'DP-1', enabled: true, width: -1, height: -1, x: -1, y: -1 });

    disposeConfig(config);

    expect(config.disposed).toBe(true);
    expect(config.symbols.size).toBe(0);
    expect(config.cmdQueue.size).toBe(0);
    expect(config.workspaceOutputs).toEqual([]);
    expect(config.outputConfigs).toEqual([]);
    expect(config.modes.modes).toEqual([{ name: DEFAULT_MODE, bindings: [] }]);
    expect(config.modes.current.name).toBe(DEFAULT_MODE);
  });
});

describe('ModeStore', () => {
  it('always keeps the current mode among its modes', () => {
    const store = new ModeStore();
    expect(store.modes).toContain(store.current);
    store.getOrCreate('resize');
    store.enter('resize');
    expect(store.modes).toContain(store.current);
    store.clear();
    expect(store.modes).toContain(store.current);
  });

  it('creates a mode only once', () => {
    const store = new ModeStore();
    const first = store.getOrCreate('resize');
    const second = store.getOrCreate('resize');
    expect(second).toBe(first);
    expect(store.modes.map((m) => m.name)).toEqual(['default', 'resize']);
  });

  it('refuses to enter an unknown mode', () => {
    const store = new ModeStore();
    expect(store.enter('missing')).toBe(false);
    expect(store.current).toBe(store.defaultMode);
  });

  it('returns to the default mode', () => {
    const store = new ModeStore();
    store.getOrCreate('resize');
    store.enter('resize');
    store.resetToDefault();
    expect(store.current.name).toBe('default');
  });

  it('binds into the current mode', () => {
    const store = new ModeStore();
    store.getOrCreate('resize');
    store.enter('resize');
    store.bind({ keys: ['Escape'], command: 'mode default' });
    expect(store.find('resize')?.bindings).toEqual([{ keys: ['Escape'], command: 'mode default' }]);
    expect(store.defaultMode.bindings).toEqual([]);
  });

  it('replaces a binding with the same keys in any order or case', () => {
    const store = new ModeStore();
    expect(store.bind({ keys: ['Mod4', 'q'], command: 'kill' })).toBeUndefined();
    const replaced = store.bind({ keys: ['Q', 'mod4'], command: 'exit' });
    expect(replaced).toEqual({ keys: ['Mod4', 'q'], command: 'kill' });
    expect(store.current.bindings).toEqual([{ keys: ['Q', 'mod4'], command: 'exit' }]);
  });
});

describe('DeferredQueue', () => {
  it('keeps commands in insertion order', () => {
    const queue = new DeferredQueue();
    queue.enqueue('exec mako');
    queue.enqueue('exec_always kanshi');
    expect(queue.size).toBe(2);
    expect(queue.toArray()).toEqual(['exec mako', 'exec_always kanshi']);
  });

  it('drains everything at once', () => {
    const queue = new DeferredQueue();
    queue.enqueue('exec a');
    queue.enqueue('exec b');
    expect(queue.drain()).toEqual(['exec a', 'exec b']);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('returns copies from toArray', () => {
    const queue = new DeferredQueue();
    queue.enqueue('exec a');
    queue.toArray().push('exec b');
    expect(queue.size).toBe(1);
  });
});
