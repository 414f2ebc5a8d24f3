// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export type ConfigErrorKind = 'not_found' | 'unreadable' | 'reload_in_progress';

/**
 * A failure that prevents a config file from being loaded at all.
 * Problems with individual lines are reported as diagnostics instead.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public kind: ConfigErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
