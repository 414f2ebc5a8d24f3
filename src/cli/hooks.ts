// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Session hooks for running the config subsystem without a compositor.
 * Nothing is launched or moved; requests are recorded and logged.
 */

import { logger } from '../logger.js';
import type { SessionHooks } from '../config/types.js';

export interface DryRunHooks extends SessionHooks {
  readonly spawned: string[];
  readonly actions: Array<{ action: string; args: string[] }>;
  readonly arrangeCount: number;
}

export function createDryRunHooks(): DryRunHooks {
  const spawned: string[] = [];
  const actions: Array<{ action: string; args: string[] }> = [];
  let arrangeCount = 0;

  return {
    spawned,
    actions,
    get arrangeCount() {
      return arrangeCount;
    },
    inputInit() {
      logger.trace('Input subsystem initialized');
    },
    arrangeWindows(width, height) {
      arrangeCount++;
      logger.debug(`Arranging windows (${width}, ${height})`);
    },
    spawn(command) {
      spawned.push(command);
      logger.debug(`Would launch \`\`${command}''`);
      return true;
    },
    performAction(action, args) {
      actions.push({ action, args });
      logger.debug(`Would perform ${[action, ...args].join(' ')}`);
      return true;
    },
  };
}
