// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI utilities module.
 */

export {
  type CheckOptions,
  type CheckResult,
  runCheck,
  runPath,
} from './check.js';

export { type DryRunHooks, createDryRunHooks } from './hooks.js';

export { formatCommandList } from './help.js';

export { formatConfigSummary } from './summary.js';
