/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { decodeArgumentSchema } from '../schema/argumentSchema.js';
import { greetingArgsSchema } from '../test-utils/fixtures.js';
import { generateCandidates } from './candidates.js';
import type { Candidate } from './types.js';

const schema = decodeArgumentSchema(greetingArgsSchema);
const none: ReadonlySet<string> = new Set();

function at(insertionText: string, displayLabel = insertionText): Candidate {
  return { insertionText, displayLabel, replaceFromOffset: 0 };
}

const NAME = at('"name": ""', '"name": "..." - Name of the person to greet');
const INCLUDE_DETAILS = at(
  '"include_details": true',
  '"include_details": true/false - Add server details to the greeting',
);
const PREFERENCES = at('"preferences": {}', '"preferences": {}');

describe('generateCandidates', () => {
  it('offers a required-fields template before the brace hints', () => {
    expect(generateCandidates({ kind: 'empty' }, schema, none)).toEqual([
      at('{ "name": "", "include_details": true }', 'Template with required fields'),
      at('{'),
      at('{}'),
    ]);
  });

  it('offers typed properties in schema order at an open brace', () => {
    expect(generateCandidates({ kind: 'atObjectOpen' }, schema, none)).toEqual([
      NAME,
      INCLUDE_DETAILS,
      PREFERENCES,
      at('"'),
    ]);
  });

  it('leaves out used keys after a comma', () => {
    expect(
      generateCandidates({ kind: 'afterComma' }, schema, new Set(['name'])),
    ).toEqual([INCLUDE_DETAILS, PREFERENCES, at('"')]);
  });

  it('completes the rest of a property name', () => {
    expect(
      generateCandidates(
        { kind: 'insidePropertyName', partial: 'inc', path: [] },
        schema,
        none,
      ),
    ).toEqual([at('lude_details": ', 'include_details')]);
  });

  it('offers every unused name for an empty partial', () => {
    const candidates = generateCandidates(
      { kind: 'insidePropertyName', partial: '', path: [] },
      schema,
      new Set(['include_details']),
    );

    expect(candidates.map((c) => c.displayLabel)).toEqual(['name', 'preferences']);
  });

  it('completes names inside nested objects', () => {
    expect(
      generateCandidates(
        { kind: 'insidePropertyName', partial: 'f', path: ['preferences'] },
        schema,
        none,
      ),
    ).toEqual([at('ormal": ', 'formal')]);
  });

  it('offers the nested properties of an object', () => {
    expect(
      generateCandidates(
        { kind: 'insideNestedObject', path: ['preferences'] },
        schema,
        none,
      ),
    ).toEqual([
      at('"language": ""', '"language": "..." - one of: en, fr'),
      at('"formal": true', '"formal": true/false'),
      at('"'),
    ]);
  });

  it('still offers the key hint when every nested property is used', () => {
    expect(
      generateCandidates(
        { kind: 'insideNestedObject', path: ['preferences'] },
        schema,
        new Set(['language', 'formal']),
      ),
    ).toEqual([at('"')]);
  });

  it('offers nothing for a path that is not an object', () => {
    expect(
      generateCandidates({ kind: 'insideNestedObject', path: ['name'] }, schema, none),
    ).toEqual([]);
    expect(
      generateCandidates(
        { kind: 'insideNestedObject', path: ['missing'] },
        schema,
        none,
      ),
    ).toEqual([]);
  });

  it('closes every open object in one candidate', () => {
    expect(
      generateCandidates({ kind: 'needsClosingBraces', count: 3 }, schema, none),
    ).toEqual([at(' } } }', 'close JSON object')]);
  });

  it('offers nothing while a value is being typed', () => {
    expect(generateCandidates({ kind: 'unstructured' }, schema, none)).toEqual([]);
  });

  it('offers only structural hints without a schema', () => {
    expect(generateCandidates({ kind: 'empty' }, undefined, none)).toEqual([
      at('{'),
      at('{}'),
    ]);
    expect(generateCandidates({ kind: 'atObjectOpen' }, undefined, none)).toEqual([
      at('"'),
    ]);
    expect(
      generateCandidates(
        { kind: 'insidePropertyName', partial: 'n', path: [] },
        undefined,
        none,
      ),
    ).toEqual([]);
  });

  it('leaves the value open for other property kinds', () => {
    const counted = decodeArgumentSchema({
      type: 'object',
      properties: {
        count: { type: 'integer' },
        mode: { enum: [1, true] },
      },
      required: ['id'],
    });

    expect(generateCandidates({ kind: 'atObjectOpen' }, counted, none)).toEqual([
      at('"count": ', '"count"'),
      at('"mode": ', '"mode" - one of: 1, true'),
      at('"'),
    ]);
    expect(generateCandidates({ kind: 'empty' }, counted, none)[0]).toEqual(
      at('{ "id": "" }', 'Template with required fields'),
    );
  });
});
