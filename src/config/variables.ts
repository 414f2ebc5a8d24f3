// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Variable Table
 *
 * User-defined `$name` symbols and the substitution pass run over command
 * text before it is executed.
 */

import type { Variable } from './types.js';

export const VARIABLE_MARKER = '$';

/**
 * - `strict`: longest name wins at each marker, replaced text is not
 *   rescanned, and `$$` yields a literal `$`.
 * - `legacy`: every variable in definition order is tried at each marker
 *   against the string as rewritten so far; replacements can compound and
 *   inserted text is rescanned. There is no escape.
 */
export type SubstitutionMode = 'strict' | 'legacy';

export interface SubstitutionOptions {
  mode?: SubstitutionMode;
}

/**
 * Strip the leading marker from a variable name as written in `set $name`.
 */
export function normalizeVariableName(name: string): string {
  return name.startsWith(VARIABLE_MARKER) ? name.slice(VARIABLE_MARKER.length) : name;
}

export class VariableTable {
  private variables: Variable[] = [];

  /**
   * Define a variable, replacing the value of an existing one.
   * Returns false for an empty name.
   */
  set(name: string, value: string): boolean {
    const key = normalizeVariableName(name);
    if (!key) return false;
    const existing = this.variables.find((v) => v.name === key);
    if (existing) {
      existing.value = value;
    } else {
      this.variables.push({ name: key, value });
    }
    return true;
  }

  get(name: string): string | undefined {
    const key = normalizeVariableName(name);
    return this.variables.find((v) => v.name === key)?.value;
  }

  get size(): number {
    return this.variables.length;
  }

  /** Variables in definition order */
  entries(): readonly Variable[] {
    return this.variables;
  }

  replace(str: string, options?: SubstitutionOptions): string {
    return doVarReplacement(str, this.variables, options);
  }

  clear(): void {
    this.variables = [];
  }
}

/**
 * Substitute `$name` occurrences in `str`. Markers with no matching
 * variable are left untouched.
 */
export function doVarReplacement(
  str: string,
  variables: readonly Variable[],
  options: SubstitutionOptions = {}
): string {
  if (!str.includes(VARIABLE_MARKER)) return str;
  return options.mode === 'legacy'
    ? replaceLegacy(str, variables)
    : replaceStrict(str, variables);
}

function replaceStrict(str: string, variables: readonly Variable[]): string {
  let result = '';
  let i = 0;
  while (i < str.length) {
    if (str[i] !== VARIABLE_MARKER) {
      result += str[i];
      i++;
      continue;
    }
    if (str[i + 1] === VARIABLE_MARKER) {
      result += VARIABLE_MARKER;
      i += 2;
      continue;
    }

    let match: Variable | undefined;
    for (const variable of variables) {
      if (
        variable.name &&
        str.startsWith(variable.name, i + 1) &&
        (!match || variable.name.length > match.name.length)
      ) {
        match = variable;
      }
    }

    if (match) {
      result += match.value;
      i += 1 + match.name.length;
    } else {
      result += VARIABLE_MARKER;
      i++;
    }
  }
  return result;
}

function replaceLegacy(str: string, variables: readonly Variable[]): string {
  for (let i = 0; i < str.length; i++) {
    if (str[i] !== VARIABLE_MARKER) continue;
    for (const variable of variables) {
      // The marker may have been replaced by an earlier variable
      if (str[i] === VARIABLE_MARKER && variable.name && str.startsWith(variable.name, i + 1)) {
        str = str.slice(0, i) + variable.value + str.slice(i + 1 + variable.name.length);
      }
    }
  }
  return str;
}
