// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getBaseDirs, getConfigCandidates, getConfigPath, isReadable } from '../src/paths.js';

function fakeFiles(existing: string[]) {
  const probed: string[] = [];
  const exists = (candidate: string): boolean => {
    probed.push(candidate);
    return existing.includes(candidate);
  };
  return { probed, exists };
}

describe('getBaseDirs', () => {
  it('derives the config home from HOME', () => {
    expect(getBaseDirs({ HOME: '/home/u' })).toEqual({ home: '/home/u', configHome: '/home/u/.config' });
  });

  it('prefers XDG_CONFIG_HOME', () => {
    expect(getBaseDirs({ HOME: '/home/u', XDG_CONFIG_HOME: '/cfg' })).toEqual({
      home: '/home/u',
      configHome: '/cfg',
    });
  });

  it('treats missing variables as empty', () => {
    expect(getBaseDirs({})).toEqual({ home: '', configHome: '' });
    expect(getBaseDirs({ XDG_CONFIG_HOME: '/cfg' })).toEqual({ home: '', configHome: '/cfg' });
  });
});

describe('getConfigCandidates', () => {
  it('lists candidates in priority order', () => {
    expect(getConfigCandidates({ HOME: '/home/u' })).toEqual([
      '/home/u/.sway/config',
      '/home/u/.config/sway/config',
      '/etc/sway/config',
      '/home/u/.i3/config',
      '/home/u/.config/.i3/config',
      '/etc/i3/config',
    ]);
  });

  it('uses XDG_CONFIG_HOME for the config-relative entries', () => {
    const candidates = getConfigCandidates({ HOME: '/home/u', XDG_CONFIG_HOME: '/cfg' });
    expect(candidates[1]).toBe('/cfg/sway/config');
    expect(candidates[4]).toBe('/cfg/.i3/config');
  });
});

describe('getConfigPath', () => {
  it('falls through to the first existing candidate', () => {
    const { exists } = fakeFiles(['/home/u/.i3/config']);
    expect(getConfigPath({ HOME: '/home/u' }, exists)).toBe('/home/u/.i3/config');
  });

  it('stops at the first match', () => {
    const { probed, exists } = fakeFiles(['/etc/sway/config', '/home/u/.i3/config']);
    expect(getConfigPath({ HOME: '/home/u' }, exists)).toBe('/etc/sway/config');
    expect(probed).toEqual([
      '/home/u/.sway/config',
      '/home/u/.config/sway/config',
      '/etc/sway/config',
    ]);
  });

  it('searches XDG_CONFIG_DIRS in order, skipping empty entries', () => {
    const { probed, exists } = fakeFiles(['/b/sway/config']);
    expect(getConfigPath({ HOME: '/home/u', XDG_CONFIG_DIRS: '/a::/b' }, exists)).toBe('/b/sway/config');
    expect(probed.slice(6)).toEqual(['/a/sway/config', '/b/sway/config']);
  });

  it('returns null when nothing exists', () => {
    const { probed, exists } = fakeFiles([]);
    expect(getConfigPath({ HOME: '/home/u', XDG_CONFIG_DIRS: '/a' }, exists)).toBeNull();
    expect(probed).toHaveLength(7);
  });

  describe('on disk', () => {
    let home: string;

    beforeEach(() => {
      home = fs.mkdtempSync(path.join(os.tmpdir(), 'sway-config-paths-'));
    });

    afterEach(() => {
      fs.rmSync(home, { recursive: true, force: true });
    });

    it('finds a readable file under HOME', () => {
      fs.mkdirSync(path.join(home, '.sway'));
      fs.writeFileSync(path.join(home, '.sway', 'config'), 'gaps 4\n');
      expect(getConfigPath({ HOME: home })).toBe(`${home}/.sway/config`);
    });

    it('reports readability', () => {
      const file = path.join(home, 'config');
      expect(isReadable(file)).toBe(false);
      fs.writeFileSync(file, '');
      expect(isReadable(file)).toBe(true);
    });
  });
});
