// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseConfig, splitLines } from '../src/config/parser.js';
import { createConfig } from '../src/config/store.js';
import type { CommandRegistry, HandlerKind, SwayConfig } from '../src/config/types.js';

/**
 * Registry that records executed lines. Commands succeed unless listed in
 * `failing`; commands listed in `throwing` raise.
 */
function fakeRegistry(
  kinds: Record<string, HandlerKind>,
  options: { failing?: string[]; throwing?: string[] } = {}
) {
  const handled: string[] = [];
  const registry: CommandRegistry = {
    findHandler: (token) => (token in kinds ? { name: token, kind: kinds[token] } : undefined),
    handleCommand: (line) => {
      handled.push(line);
      const name = line.split(/\s+/)[0];
      if (options.throwing?.includes(name)) {
        throw new Error(`${name} exploded`);
      }
      return !options.failing?.includes(name);
    },
  };
  return { registry, handled };
}

const KINDS: Record<string, HandlerKind> = {
  set: 'anytime',
  gaps: 'anytime',
  exec: 'compositor-ready',
  exec_always: 'compositor-ready',
  kill: 'keybinding',
};

describe('parseConfig', () => {
  let config: SwayConfig;

  beforeEach(() => {
    config = createConfig();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('executes ordinary commands once without queueing', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    const report = parseConfig('gaps 4\n', config, registry);
    expect(handled).toEqual(['gaps 4']);
    expect(config.cmdQueue.size).toBe(0);
    expect(report).toEqual({ success: true, linesRead: 1, deferred: 0, diagnostics: [] });
  });

  it('queues session commands before the session is active', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    const report = parseConfig('  exec mako   # notifications\nexec_always kanshi\n', config, registry);
    expect(handled).toEqual([]);
    expect(config.cmdQueue.toArray()).toEqual(['exec mako', 'exec_always kanshi']);
    expect(report.deferred).toBe(2);
    expect(report.success).toBe(true);
  });

  it('keeps deferred commands in source order among other lines', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    parseConfig('exec a\ngaps 1\nexec b\nset $x y\nexec c', config, registry);
    expect(config.cmdQueue.toArray()).toEqual(['exec a', 'exec b', 'exec c']);
    expect(handled).toEqual(['gaps 1', 'set $x y']);
  });

  it('runs session commands immediately when active', () => {
    config.active = true;
    const { registry, handled } = fakeRegistry(KINDS);
    parseConfig('exec mako', config, registry);
    expect(handled).toEqual(['exec mako']);
    expect(config.cmdQueue.size).toBe(0);
  });

  it('rejects keybinding-only commands without failing the load', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    const report = parseConfig('kill', config, registry);
    expect(handled).toEqual([]);
    expect(config.cmdQueue.size).toBe(0);
    expect(config.failed).toBe(false);
    expect(report.success).toBe(true);
    expect(report.diagnostics).toEqual([
      {
        line: 1,
        text: 'kill',
        kind: 'invalid-in-config',
        message: '"kill" can only be used in a key binding',
      },
    ]);
    expect(console.error).toHaveBeenCalledWith("Error: Invalid command during config ``kill''");
  });

  it('reports unknown commands without failing the load', () => {
    const { registry } = fakeRegistry(KINDS);
    const report = parseConfig('gaps 2\nfrobnicate now', config, registry);
    expect(config.failed).toBe(false);
    expect(report.success).toBe(true);
    expect(report.diagnostics).toEqual([
      {
        line: 2,
        text: 'frobnicate now',
        kind: 'unknown-command',
        message: 'Unknown command "frobnicate"',
      },
    ]);
    expect(console.error).toHaveBeenCalledWith("Error: Invalid command ``frobnicate now''");
  });

  it('marks the load failed and keeps going after a failing command', () => {
    const { registry, handled } = fakeRegistry(KINDS, { failing: ['gaps'] });
    const report = parseConfig('gaps wide\nset $a b', config, registry);
    expect(handled).toEqual(['gaps wide', 'set $a b']);
    expect(config.failed).toBe(true);
    expect(report.success).toBe(false);
    expect(report.diagnostics).toEqual([
      { line: 1, text: 'gaps wide', kind: 'command-failed', message: '"gaps" failed' },
    ]);
  });

  it('treats a throwing handler as a failed command', () => {
    const { registry, handled } = fakeRegistry(KINDS, { throwing: ['set'] });
    const report = parseConfig('set $a b\ngaps 1', config, registry);
    expect(handled).toEqual(['set $a b', 'gaps 1']);
    expect(report.success).toBe(false);
    expect(report.diagnostics.map((d) => d.kind)).toEqual(['command-failed']);
  });

  it('skips comments and blank lines silently', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    const report = parseConfig('# comment only\n\n   \n', config, registry);
    expect(handled).toEqual([]);
    expect(report.diagnostics).toEqual([]);
    expect(report.linesRead).toBe(3);
    expect(console.error).not.toHaveBeenCalled();
  });

  it('returns to the default mode on a closing brace', () => {
    config.modes.getOrCreate('resize');
    config.modes.enter('resize');
    const { registry, handled } = fakeRegistry(KINDS);
    parseConfig('}  # end of resize', config, registry);
    expect(config.modes.current.name).toBe('default');
    expect(handled).toEqual([]);
  });

  it('accepts CRLF line endings', () => {
    const { registry, handled } = fakeRegistry(KINDS);
    parseConfig('gaps 1\r\ngaps 2\r\n', config, registry);
    expect(handled).toEqual(['gaps 1', 'gaps 2']);
  });
});

describe('splitLines', () => {
  it('drops the empty entry after a final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
    expect(splitLines('')).toEqual([]);
  });
});
