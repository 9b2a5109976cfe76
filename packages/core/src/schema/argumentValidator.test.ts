/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { validateArguments } from './argumentValidator.js';

const schema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    age: { type: 'integer', minimum: 0 },
    email: { type: 'string', format: 'email' },
  },
  required: ['name'],
  'x-ui-hint': 'ignored',
};

describe('validateArguments', () => {
  it('accepts conforming arguments', () => {
    expect(validateArguments(schema, { name: 'Ada', age: 36 })).toEqual([]);
  });

  it('reports every problem with its location', () => {
    expect(validateArguments(schema, { age: 'old' })).toEqual([
      "arguments must have required property 'name'",
      'arguments/age must be integer',
    ]);
  });

  it('checks formats', () => {
    expect(
      validateArguments(schema, { name: 'Ada', email: 'not-an-address' }),
    ).toEqual(['arguments/email must match format "email"']);
  });

  it('skips validation without a schema object', () => {
    expect(validateArguments(undefined, { anything: true })).toEqual([]);
    expect(validateArguments([], {})).toEqual([]);
  });

  it('reports a schema that cannot be compiled', () => {
    const problems = validateArguments({ type: 'nonsense' }, {});

    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^schema could not be compiled: /);
  });
});
