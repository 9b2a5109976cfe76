/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import type { ArgumentSchema } from '../schema/argumentSchema.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  EMPTY_OBJECT_HINT,
  OPEN_OBJECT_HINT,
  generateCandidates,
} from './candidates.js';
import { segmentCommandLine } from './commandLine.js';
import { analyzeJsonFragment } from './jsonContext.js';
import { quoteName } from './quotedTokens.js';
import type {
  Candidate,
  CompletionSnapshot,
  SchemaLookup,
} from './types.js';

const logger = DebugLogger.getLogger('mcp-shell:completion');

/** Verbs whose argument is a tool name followed by JSON arguments. */
export const TOOL_VERBS: ReadonlySet<string> = new Set([
  'call',
  'tool-details',
]);

/** Verbs whose argument is a resource name. */
export const RESOURCE_VERBS: ReadonlySet<string> = new Set(['read']);

export type Completer = (line: string, cursor: number) => Candidate[];

function backOffset(length: number): number {
  return length === 0 ? 0 : -length;
}

function lookupSafely(
  lookup: SchemaLookup,
  name: string,
): ArgumentSchema | undefined {
  try {
    return lookup(name);
  } catch (error) {
    logger.debug(
      () => `schema lookup for ${name} failed: ${getErrorMessage(error)}`,
    );
    return undefined;
  }
}

function matchWord(text: string, snapshot: CompletionSnapshot): Candidate[] {
  const word = /\S*$/.exec(text)?.[0] ?? '';
  const typed = word.toLowerCase();
  const replaceFromOffset = backOffset(word.length);

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  for (const name of [
    ...snapshot.commands,
    ...snapshot.toolNames,
    ...snapshot.resourceNames,
  ]) {
    if (seen.has(name) || !name.toLowerCase().startsWith(typed)) {
      continue;
    }
    seen.add(name);
    candidates.push({
      insertionText: quoteName(name),
      displayLabel: name,
      replaceFromOffset,
    });
  }
  return candidates;
}

function dispatch(text: string, snapshot: CompletionSnapshot): Candidate[] {
  const segments = segmentCommandLine(text);
  const tokens = segments.preJsonTokens;
  const verb = segments.verb.toLowerCase();
  const takesTool = TOOL_VERBS.has(verb);
  const takesResource = RESOURCE_VERBS.has(verb);

  const verbStillTyped =
    tokens.length <= 1 &&
    !segments.endsWithWhitespace &&
    segments.jsonFragment === undefined;
  if ((!takesTool && !takesResource) || verbStillTyped) {
    return matchWord(text, snapshot);
  }

  const names = takesTool ? snapshot.toolNames : snapshot.resourceNames;
  const nameToken = tokens[1];
  if (!nameToken) {
    if (segments.jsonFragment !== undefined) {
      return [];
    }
    return names.map((name) => ({
      insertionText: quoteName(name),
      displayLabel: name,
      replaceFromOffset: 0,
    }));
  }

  const nameComplete =
    tokens.length > 2 ||
    segments.endsWithWhitespace ||
    segments.jsonFragment !== undefined;
  if (!nameComplete) {
    const typed = nameToken.text.toLowerCase();
    const replaceFromOffset = backOffset(text.length - nameToken.start);
    return names
      .filter((name) => name.toLowerCase().startsWith(typed))
      .map((name) => ({
        insertionText: quoteName(name),
        displayLabel: name,
        replaceFromOffset,
      }));
  }

  if (takesResource) {
    return matchWord(text, snapshot);
  }
  if (tokens.length > 2) {
    return [];
  }

  const toolName = nameToken.text;
  if (!snapshot.toolNames.includes(toolName)) {
    return [OPEN_OBJECT_HINT, EMPTY_OBJECT_HINT];
  }

  const schema = lookupSafely(snapshot.lookupSchema, toolName);
  const { position, usedKeys } = analyzeJsonFragment(
    segments.jsonFragment ?? '',
  );
  logger.debug(() => `${toolName}: ${position.kind}`);
  return generateCandidates(position, schema, usedKeys);
}

/**
 * Completion candidates for `line` with the cursor at `cursor`. Only the
 * text before the cursor is considered. Never throws: any failure is
 * logged and yields no candidates.
 */
export function complete(
  line: string,
  cursor: number,
  snapshot: CompletionSnapshot,
): Candidate[] {
  return completeWith(line, cursor, () => snapshot);
}

function completeWith(
  line: string,
  cursor: number,
  provider: () => CompletionSnapshot,
): Candidate[] {
  try {
    const end = Math.max(0, Math.min(cursor, line.length));
    return dispatch(line.slice(0, end), provider());
  } catch (error) {
    logger.debug(() => `completion failed: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Binds the dispatcher to a snapshot provider. The provider is asked for
 * the current snapshot on every call.
 */
export function createCompleter(
  provider: () => CompletionSnapshot,
): Completer {
  return (line, cursor) => completeWith(line, cursor, provider);
}
