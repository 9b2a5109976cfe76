/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  endsInsideQuotes,
  findUnquotedBrace,
  splitQuoted,
} from './quotedTokens.js';
import type { CommandLineSegments } from './types.js';

/**
 * Separates a line into its verb, the tokens that precede the JSON
 * argument and the raw JSON fragment itself. The fragment is handed on
 * verbatim; only the text before it is tokenized.
 */
export function segmentCommandLine(line: string): CommandLineSegments {
  const braceIndex = findUnquotedBrace(line);
  const prefix = braceIndex === -1 ? line : line.slice(0, braceIndex);
  const preJsonTokens = splitQuoted(prefix);

  const lastChar = prefix[prefix.length - 1];
  const endsWithWhitespace =
    lastChar !== undefined &&
    lastChar.trim() === '' &&
    !endsInsideQuotes(prefix);

  return {
    verb: preJsonTokens[0]?.text ?? '',
    preJsonTokens,
    jsonFragment: braceIndex === -1 ? undefined : line.slice(braceIndex),
    jsonStart: braceIndex,
    endsWithWhitespace,
  };
}
