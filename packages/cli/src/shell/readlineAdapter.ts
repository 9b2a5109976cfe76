/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Candidate, Completer } from '@mcp-shell/core';

/** What a node:readline completer returns: the hits and the text they extend. */
export type ReadlineCompletion = [string[], string];

/**
 * Adapts candidates to readline, which only appends text: every hit is
 * written relative to the start of the widest replaced span, and hits
 * that do not extend what was typed there are dropped. A case-insensitive
 * match keeps the letters as typed.
 */
export function toReadlineCompletion(
  line: string,
  candidates: readonly Candidate[],
): ReadlineCompletion {
  if (candidates.length === 0) {
    return [[], line];
  }

  const widest = Math.min(
    0,
    ...candidates.map((candidate) => candidate.replaceFromOffset),
  );
  const start = Math.max(0, line.length + widest);
  const substring = line.slice(start);
  const typed = substring.toLowerCase();

  const hits: string[] = [];
  for (const candidate of candidates) {
    const keep = line.slice(
      start,
      Math.max(start, line.length + candidate.replaceFromOffset),
    );
    const hit = keep + candidate.insertionText;
    if (!hit.toLowerCase().startsWith(typed)) {
      continue;
    }
    const adjusted = substring + hit.slice(substring.length);
    if (!hits.includes(adjusted)) {
      hits.push(adjusted);
    }
  }
  return [hits, substring];
}

/** Wraps a completer for node:readline, which passes the line up to the cursor. */
export function createReadlineCompleter(
  completer: Completer,
): (line: string) => ReadlineCompletion {
  return (line) => toReadlineCompletion(line, completer(line, line.length));
}
