/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export type SchemaKind =
  | 'string'
  | 'boolean'
  | 'number'
  | 'object'
  | 'array'
  | 'any';

/**
 * The part of a JSON Schema that drives completion. Property order is the
 * order of the source schema.
 */
export interface ArgumentSchema {
  readonly kind: SchemaKind;
  readonly properties: ReadonlyMap<string, ArgumentSchema>;
  readonly required: readonly string[];
  readonly enum?: readonly unknown[];
  readonly description?: string;
}

const schemaNode = z.object({
  type: z.union([z.string(), z.array(z.string())]).optional(),
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional(),
  enum: z.array(z.unknown()).optional(),
  description: z.string().optional(),
});

type SchemaNode = z.infer<typeof schemaNode>;

const KIND_BY_TYPE: ReadonlyMap<string, SchemaKind> = new Map<string, SchemaKind>([
  ['string', 'string'],
  ['boolean', 'boolean'],
  ['number', 'number'],
  ['integer', 'number'],
  ['object', 'object'],
  ['array', 'array'],
]);

export const ANY_SCHEMA: ArgumentSchema = Object.freeze({
  kind: 'any',
  properties: new Map<string, ArgumentSchema>(),
  required: Object.freeze([]),
});

function kindOf(node: SchemaNode): SchemaKind {
  const types = typeof node.type === 'string' ? [node.type] : (node.type ?? []);
  const declared = types.find((type) => type !== 'null');
  if (declared === undefined) {
    return node.properties ? 'object' : 'any';
  }
  return KIND_BY_TYPE.get(declared) ?? 'any';
}

/**
 * Decodes a raw JSON Schema into a frozen {@link ArgumentSchema}. Parts
 * that do not look like a schema decode as `any`; nothing is thrown.
 */
export function decodeArgumentSchema(raw: unknown): ArgumentSchema {
  const parsed = schemaNode.safeParse(raw);
  if (!parsed.success) {
    return ANY_SCHEMA;
  }
  const node = parsed.data;

  const properties = new Map<string, ArgumentSchema>();
  for (const [name, child] of Object.entries(node.properties ?? {})) {
    properties.set(name, decodeArgumentSchema(child));
  }

  return Object.freeze({
    kind: kindOf(node),
    properties,
    required: Object.freeze([...(node.required ?? [])]),
    ...(node.enum ? { enum: Object.freeze([...node.enum]) } : {}),
    ...(node.description !== undefined
      ? { description: node.description }
      : {}),
  });
}

/**
 * Walks `path` through nested `properties`. Returns undefined as soon as a
 * step is missing.
 */
export function resolveSchemaPath(
  schema: ArgumentSchema,
  path: readonly string[],
): ArgumentSchema | undefined {
  let current: ArgumentSchema | undefined = schema;
  for (const name of path) {
    current = current.properties.get(name);
    if (!current) {
      return undefined;
    }
  }
  return current;
}
