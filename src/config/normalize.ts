// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Line normalization and tokenizing for config text.
 */

export const COMMENT_CHAR = '#';
export const MODE_CLOSE = '}';

/**
 * Cut a line at the first `#` that is not inside double or single quotes.
 */
export function stripComments(line: string): string {
  let inString = false;
  let inCharacter = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"' && !inCharacter) {
      inString = !inString;
    } else if (ch === "'" && !inString) {
      inCharacter = !inCharacter;
    } else if (ch === COMMENT_CHAR && !inString && !inCharacter) {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Trim, drop comments, trim again. Returns '' for lines with no directive.
 */
export function normalizeLine(raw: string): string {
  return stripComments(raw.trim()).trim();
}

/**
 * Split a directive on runs of whitespace.
 */
export function splitArgs(line: string): string[] {
  return line.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Remove one pair of matching surrounding quotes.
 */
export function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

export function isModeClose(line: string): boolean {
  return line.startsWith(MODE_CLOSE);
}
