/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  endsInsideQuotes,
  findUnquotedBrace,
  quoteName,
  splitQuoted,
} from './quotedTokens.js';

describe('splitQuoted', () => {
  it('splits on runs of whitespace and records offsets', () => {
    expect(splitQuoted('  call\t  x ')).toEqual([
      { text: 'call', quoted: false, start: 2, end: 6 },
      { text: 'x', quoted: false, start: 9, end: 10 },
    ]);
  });

  it('keeps whitespace inside quotes', () => {
    expect(splitQuoted('call "tool with spaces" now')).toEqual([
      { text: 'call', quoted: false, start: 0, end: 4 },
      { text: 'tool with spaces', quoted: true, start: 5, end: 23 },
      { text: 'now', quoted: false, start: 24, end: 27 },
    ]);
  });

  it('runs an unterminated quote to the end of the line', () => {
    expect(splitQuoted('read "resource with spaces')).toEqual([
      { text: 'read', quoted: false, start: 0, end: 4 },
      { text: 'resource with spaces', quoted: true, start: 5, end: 26 },
    ]);
  });

  it('joins adjacent quoted and unquoted text', () => {
    expect(splitQuoted('ab"c d"')).toEqual([
      { text: 'abc d', quoted: true, start: 0, end: 7 },
    ]);
  });

  it('keeps an empty quoted token', () => {
    expect(splitQuoted('x ""')).toEqual([
      { text: 'x', quoted: false, start: 0, end: 1 },
      { text: '', quoted: true, start: 2, end: 4 },
    ]);
  });

  it('treats backslash-quote and double backslash as escapes', () => {
    expect(splitQuoted('say \\"hi\\" back\\\\slash').map((t) => t.text)).toEqual([
      'say',
      '"hi"',
      'back\\slash',
    ]);
  });

  it('keeps any other backslash literally', () => {
    expect(splitQuoted('a\\b c\\').map((t) => t.text)).toEqual(['a\\b', 'c\\']);
  });

  it('returns nothing for a blank line', () => {
    expect(splitQuoted('   ')).toEqual([]);
  });
});

describe('findUnquotedBrace', () => {
  it('skips braces inside quoted names', () => {
    expect(findUnquotedBrace('call "a{b" {"x"')).toBe(11);
  });

  it('returns -1 without a brace', () => {
    expect(findUnquotedBrace('read readme')).toBe(-1);
  });
});

describe('endsInsideQuotes', () => {
  it('detects an open quote', () => {
    expect(endsInsideQuotes('read "abc')).toBe(true);
    expect(endsInsideQuotes('read "abc"')).toBe(false);
    expect(endsInsideQuotes('read \\"abc')).toBe(false);
  });
});

describe('quoteName', () => {
  it('leaves plain names alone', () => {
    expect(quoteName('example:echo')).toBe('example:echo');
  });

  it('quotes names with whitespace and escapes quotes', () => {
    expect(quoteName('with space')).toBe('"with space"');
    expect(quoteName('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteName('back\\slash')).toBe('"back\\\\slash"');
  });

  it('produces text that splits back into the name', () => {
    for (const name of ['with space', 'say "hi"', 'back\\slash', 'tab\there']) {
      expect(splitQuoted(quoteName(name)).map((t) => t.text)).toEqual([name]);
    }
  });
});
