/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ArgumentSchema } from '../schema/argumentSchema.js';

/**
 * A unit of a split command line. `start` and `end` are raw offsets into
 * the line the token was read from (`end` is exclusive), so a caller can
 * replace exactly the characters the user typed, quotes included.
 */
export interface Token {
  readonly text: string;
  readonly quoted: boolean;
  readonly start: number;
  readonly end: number;
}

export interface CommandLineSegments {
  /** First token of the line, or '' for a blank line. */
  readonly verb: string;
  /** Tokens before the JSON fragment, the verb included. */
  readonly preJsonTokens: readonly Token[];
  /** Text from the first unquoted `{` to the end of the line. */
  readonly jsonFragment: string | undefined;
  /** Offset of `jsonFragment` in the line, -1 when there is none. */
  readonly jsonStart: number;
  /** True when the text before the fragment ends in unquoted whitespace. */
  readonly endsWithWhitespace: boolean;
}

export type JsonPosition =
  | { readonly kind: 'empty' }
  | { readonly kind: 'atObjectOpen' }
  | { readonly kind: 'afterComma' }
  | {
      readonly kind: 'insidePropertyName';
      readonly partial: string;
      readonly path: readonly string[];
    }
  | { readonly kind: 'insideNestedObject'; readonly path: readonly string[] }
  | { readonly kind: 'needsClosingBraces'; readonly count: number }
  | { readonly kind: 'unstructured' };

export type JsonPositionKind = JsonPosition['kind'];

export interface JsonFragmentAnalysis {
  readonly position: JsonPosition;
  /** Keys already written in the innermost open object. */
  readonly usedKeys: ReadonlySet<string>;
}

export interface Candidate {
  readonly insertionText: string;
  readonly displayLabel: string;
  /** Where the insertion starts, relative to the cursor. Always <= 0. */
  readonly replaceFromOffset: number;
}

export type SchemaLookup = (name: string) => ArgumentSchema | undefined;

/**
 * Read-only view of what the shell currently knows about the server.
 * Taken by reference for the duration of a single completion call.
 */
export interface CompletionSnapshot {
  readonly commands: readonly string[];
  readonly toolNames: readonly string[];
  readonly resourceNames: readonly string[];
  readonly lookupSchema: SchemaLookup;
}
