/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Token } from './types.js';

const NEEDS_QUOTING = /[\s"\\]/;

function isWhitespace(char: string): boolean {
  return char.trim() === '';
}

/**
 * Splits a command line into whitespace separated tokens. Double quotes
 * group text containing whitespace; `\"` and `\\` are escapes. An
 * unterminated quote runs to the end of the line, so a line that is still
 * being typed always splits.
 */
export function splitQuoted(line: string): Token[] {
  const tokens: Token[] = [];

  let text = '';
  let quoted = false;
  let inQuotes = false;
  let start = -1;

  const flush = (end: number): void => {
    if (start !== -1) {
      tokens.push({ text, quoted, start, end });
    }
    text = '';
    quoted = false;
    start = -1;
  };

  let i = 0;
  while (i < line.length) {
    const char = line[i] ?? '';

    if (!inQuotes && isWhitespace(char)) {
      flush(i);
      i += 1;
      continue;
    }

    if (start === -1) {
      start = i;
    }

    if (char === '\\') {
      const next = line[i + 1];
      if (next === '"' || next === '\\') {
        text += next;
        i += 2;
        continue;
      }
      text += char;
      i += 1;
      continue;
    }

    if (char === '"') {
      inQuotes = !inQuotes;
      quoted = true;
      i += 1;
      continue;
    }

    text += char;
    i += 1;
  }

  flush(line.length);
  return tokens;
}

/**
 * Index of the first `{` outside a quoted span, or -1. Uses the same
 * quote and escape rules as {@link splitQuoted}.
 */
export function findUnquotedBrace(line: string): number {
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '\\') {
      const next = line[i + 1];
      if (next === '"' || next === '\\') {
        i += 1;
      }
      continue;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
      continue;
    }
    if (char === '{' && !inQuotes) {
      return i;
    }
  }
  return -1;
}

/**
 * True when the scan of `line` finishes inside an open quoted span.
 */
export function endsInsideQuotes(line: string): boolean {
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '\\') {
      const next = line[i + 1];
      if (next === '"' || next === '\\') {
        i += 1;
      }
      continue;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
    }
  }
  return inQuotes;
}

/**
 * Renders a tool or resource name so that {@link splitQuoted} reads it
 * back as a single token.
 */
export function quoteName(name: string): string {
  if (!NEEDS_QUOTING.test(name)) {
    return name;
  }
  return `"${name.replace(/["\\]/g, (match) => `\\${match}`)}"`;
}
