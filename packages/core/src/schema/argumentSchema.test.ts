/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  ANY_SCHEMA,
  decodeArgumentSchema,
  resolveSchemaPath,
} from './argumentSchema.js';

const greetingSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', description: 'Who to greet' },
    include_details: { type: 'boolean' },
    preferences: {
      type: 'object',
      properties: {
        language: { type: 'string', enum: ['en', 'fr'] },
        formal: { type: 'boolean' },
      },
    },
    count: { type: 'integer' },
  },
  required: ['name', 'include_details'],
};

describe('decodeArgumentSchema', () => {
  it('keeps property order, required order and descriptions', () => {
    const schema = decodeArgumentSchema(greetingSchema);

    expect(schema.kind).toBe('object');
    expect([...schema.properties.keys()]).toEqual([
      'name',
      'include_details',
      'preferences',
      'count',
    ]);
    expect(schema.required).toEqual(['name', 'include_details']);
    expect(schema.properties.get('name')?.description).toBe('Who to greet');
  });

  it('maps integer to number and skips null in type lists', () => {
    const schema = decodeArgumentSchema({
      properties: {
        count: { type: 'integer' },
        label: { type: ['null', 'string'] },
        blank: { type: ['null'] },
      },
    });

    expect(schema.kind).toBe('object');
    expect(schema.properties.get('count')?.kind).toBe('number');
    expect(schema.properties.get('label')?.kind).toBe('string');
    expect(schema.properties.get('blank')?.kind).toBe('any');
  });

  it('decodes nested properties and enums', () => {
    const preferences = decodeArgumentSchema(greetingSchema).properties.get(
      'preferences',
    );

    expect(preferences?.kind).toBe('object');
    expect(preferences?.properties.get('language')?.enum).toEqual(['en', 'fr']);
  });

  it('treats anything that is not a schema as any', () => {
    expect(decodeArgumentSchema(null)).toBe(ANY_SCHEMA);
    expect(decodeArgumentSchema('object')).toBe(ANY_SCHEMA);
    expect(decodeArgumentSchema({ type: 42 })).toBe(ANY_SCHEMA);
    expect(decodeArgumentSchema({ type: 'tuple' }).kind).toBe('any');
    expect(decodeArgumentSchema({ type: 'constructor' }).kind).toBe('any');
    expect(decodeArgumentSchema({ type: 'toString' }).kind).toBe('any');
  });

  it('returns frozen schemas', () => {
    const schema = decodeArgumentSchema(greetingSchema);

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.required)).toBe(true);
  });
});

describe('resolveSchemaPath', () => {
  const schema = decodeArgumentSchema(greetingSchema);

  it('returns the schema itself for an empty path', () => {
    expect(resolveSchemaPath(schema, [])).toBe(schema);
  });

  it('walks nested properties', () => {
    expect(resolveSchemaPath(schema, ['preferences', 'formal'])?.kind).toBe(
      'boolean',
    );
  });

  it('returns undefined for a missing step', () => {
    expect(resolveSchemaPath(schema, ['preferences', 'missing'])).toBeUndefined();
    expect(resolveSchemaPath(schema, ['name', 'inner'])).toBeUndefined();
  });
});
