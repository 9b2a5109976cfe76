/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  JsonFragmentAnalysis,
  JsonPosition,
} from './types.js';

type Expectation = 'key' | 'colon' | 'value' | 'separator';

interface ContainerFrame {
  readonly type: 'object' | 'array';
  /** Property whose value this container is; undefined for the root and array items. */
  readonly property: string | undefined;
  readonly keys: string[];
  expect: Expectation;
  pendingKey: string | undefined;
}

interface OpenString {
  readonly role: 'key' | 'value';
  readonly text: string;
}

interface FragmentScan {
  readonly frames: readonly ContainerFrame[];
  readonly openString: OpenString | undefined;
  readonly lastStructural: string | undefined;
  readonly openBraces: number;
  readonly closeBraces: number;
}

const NO_KEYS: ReadonlySet<string> = new Set();

function markValueWritten(frame: ContainerFrame | undefined): void {
  if (frame?.type === 'object' && frame.expect === 'value') {
    frame.expect = 'separator';
  }
}

function valueOwner(frame: ContainerFrame | undefined): string | undefined {
  if (frame?.type === 'object' && frame.expect === 'value') {
    return frame.pendingKey;
  }
  return undefined;
}

/**
 * Single pass over a partial JSON text. Tracks strings (with escapes),
 * the stack of open containers and what each open object expects next.
 * Never fails: characters that make no sense at their position are
 * skipped.
 */
function scanFragment(fragment: string): FragmentScan {
  const frames: ContainerFrame[] = [];
  let openBraces = 0;
  let closeBraces = 0;
  let lastStructural: string | undefined;

  let stringRole: OpenString['role'] | undefined;
  let stringText = '';
  let escaped = false;

  for (const char of fragment) {
    const top = frames[frames.length - 1];

    if (stringRole !== undefined) {
      if (escaped) {
        escaped = false;
        stringText += char;
      } else if (char === '\\') {
        escaped = true;
        stringText += char;
      } else if (char === '"') {
        if (stringRole === 'key' && top?.type === 'object') {
          top.pendingKey = stringText;
          top.expect = 'colon';
        } else {
          markValueWritten(top);
        }
        stringRole = undefined;
      } else {
        stringText += char;
      }
      continue;
    }

    if (char.trim() === '') {
      continue;
    }
    lastStructural = char;

    switch (char) {
      case '"':
        stringRole =
          top?.type === 'object' && top.expect === 'key' ? 'key' : 'value';
        stringText = '';
        break;
      case '{':
        openBraces += 1;
        frames.push({
          type: 'object',
          property: valueOwner(top),
          keys: [],
          expect: 'key',
          pendingKey: undefined,
        });
        markValueWritten(top);
        break;
      case '[':
        frames.push({
          type: 'array',
          property: valueOwner(top),
          keys: [],
          expect: 'value',
          pendingKey: undefined,
        });
        markValueWritten(top);
        break;
      case '}':
        closeBraces += 1;
        if (top?.type === 'object') {
          frames.pop();
        }
        break;
      case ']':
        if (top?.type === 'array') {
          frames.pop();
        }
        break;
      case ':':
        if (top?.type === 'object' && top.expect === 'colon') {
          if (top.pendingKey !== undefined) {
            top.keys.push(top.pendingKey);
          }
          top.expect = 'value';
        }
        break;
      case ',':
        if (top?.type === 'object') {
          top.expect = 'key';
          top.pendingKey = undefined;
        }
        break;
      default:
        markValueWritten(top);
    }
  }

  return {
    frames,
    openString:
      stringRole === undefined ? undefined : { role: stringRole, text: stringText },
    lastStructural,
    openBraces,
    closeBraces,
  };
}

/**
 * Property names leading from the root object to the innermost open
 * container, or undefined when the chain runs through an array.
 */
function propertyPath(
  frames: readonly ContainerFrame[],
): readonly string[] | undefined {
  const path: string[] = [];
  for (const frame of frames.slice(1)) {
    if (frame.type !== 'object' || frame.property === undefined) {
      return undefined;
    }
    path.push(frame.property);
  }
  return path;
}

function result(
  position: JsonPosition,
  usedKeys: ReadonlySet<string> = NO_KEYS,
): JsonFragmentAnalysis {
  return { position, usedKeys };
}

/**
 * Classifies where a partially typed JSON argument leaves the cursor and
 * collects the keys already written in the innermost open object.
 *
 * The checks run in a fixed priority order so that the most specific
 * state wins: an unclosed nested object is also unbalanced, but it must
 * route to nested property completion rather than to a closing hint.
 */
export function analyzeJsonFragment(fragment: string): JsonFragmentAnalysis {
  const trimmed = fragment.trim();
  if (trimmed === '') {
    return result({ kind: 'empty' });
  }
  if (trimmed === '{') {
    return result({ kind: 'atObjectOpen' });
  }

  const scan = scanFragment(fragment);
  const { frames } = scan;
  const top = frames[frames.length - 1];
  const usedKeys: ReadonlySet<string> =
    top?.type === 'object' ? new Set(top.keys) : NO_KEYS;

  if (frames.some((frame) => frame.type === 'array')) {
    return result({ kind: 'unstructured' });
  }

  if (
    scan.openString === undefined &&
    frames.length === 1 &&
    scan.lastStructural === ','
  ) {
    return result({ kind: 'afterComma' }, usedKeys);
  }

  if (scan.openString !== undefined) {
    const path = propertyPath(frames);
    if (scan.openString.role === 'key' && top !== undefined && path) {
      return result(
        { kind: 'insidePropertyName', partial: scan.openString.text, path },
        usedKeys,
      );
    }
    return result({ kind: 'unstructured' });
  }

  if (top !== undefined && frames.length > 1 && top.expect === 'key') {
    const path = propertyPath(frames);
    if (path) {
      return result({ kind: 'insideNestedObject', path }, usedKeys);
    }
    return result({ kind: 'unstructured' });
  }

  if (scan.openBraces > scan.closeBraces) {
    return result(
      { kind: 'needsClosingBraces', count: scan.openBraces - scan.closeBraces },
      usedKeys,
    );
  }

  return result({ kind: 'unstructured' });
}

export function classifyJsonFragment(fragment: string): JsonPosition {
  return analyzeJsonFragment(fragment).position;
}
