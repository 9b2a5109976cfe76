/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  resolveSchemaPath,
  type ArgumentSchema,
} from '../schema/argumentSchema.js';
import type { Candidate, JsonPosition } from './types.js';

function hint(text: string, label: string = text): Candidate {
  return { insertionText: text, displayLabel: label, replaceFromOffset: 0 };
}

export const OPEN_OBJECT_HINT = hint('{');
export const EMPTY_OBJECT_HINT = hint('{}');
export const OPEN_KEY_HINT = hint('"');

export const REQUIRED_TEMPLATE_LABEL = 'Template with required fields';
export const CLOSE_OBJECT_LABEL = 'close JSON object';

function valueTemplate(schema: ArgumentSchema): string {
  switch (schema.kind) {
    case 'string':
      return '""';
    case 'boolean':
      return 'true';
    case 'object':
      return '{}';
    default:
      return '';
  }
}

function labelValue(schema: ArgumentSchema): string {
  switch (schema.kind) {
    case 'string':
      return ': "..."';
    case 'boolean':
      return ': true/false';
    case 'object':
      return ': {}';
    default:
      return '';
  }
}

function describe(schema: ArgumentSchema): string {
  const parts: string[] = [];
  if (schema.description) {
    parts.push(schema.description);
  }
  if (schema.enum && schema.enum.length > 0) {
    parts.push(
      `one of: ${schema.enum.map((value) => (typeof value === 'string' ? value : JSON.stringify(value))).join(', ')}`,
    );
  }
  return parts.length > 0 ? ` - ${parts.join('; ')}` : '';
}

function propertyCandidates(
  schema: ArgumentSchema,
  usedKeys: ReadonlySet<string>,
): Candidate[] {
  const candidates: Candidate[] = [];
  for (const [name, property] of schema.properties) {
    if (usedKeys.has(name)) {
      continue;
    }
    const key = JSON.stringify(name);
    candidates.push({
      insertionText: `${key}: ${valueTemplate(property)}`,
      displayLabel: `${key}${labelValue(property)}${describe(property)}`,
      replaceFromOffset: 0,
    });
  }
  return candidates;
}

function requiredTemplate(schema: ArgumentSchema): Candidate | undefined {
  const required = schema.required.slice(0, 2);
  if (required.length === 0) {
    return undefined;
  }
  const fields = required.map((name) => {
    const value =
      schema.properties.get(name)?.kind === 'boolean' ? 'true' : '""';
    return `${JSON.stringify(name)}: ${value}`;
  });
  return hint(`{ ${fields.join(', ')} }`, REQUIRED_TEMPLATE_LABEL);
}

/**
 * Candidates for a classified JSON position. Schema-derived candidates
 * come first in schema property order, then the fixed structural hints.
 * Without a schema only the structural hints are offered.
 */
export function generateCandidates(
  position: JsonPosition,
  schema: ArgumentSchema | undefined,
  usedKeys: ReadonlySet<string>,
): Candidate[] {
  switch (position.kind) {
    case 'empty': {
      const template = schema ? requiredTemplate(schema) : undefined;
      return [
        ...(template ? [template] : []),
        OPEN_OBJECT_HINT,
        EMPTY_OBJECT_HINT,
      ];
    }
    case 'atObjectOpen':
      return [
        ...(schema ? propertyCandidates(schema, new Set()) : []),
        OPEN_KEY_HINT,
      ];
    case 'afterComma':
      return [
        ...(schema ? propertyCandidates(schema, usedKeys) : []),
        OPEN_KEY_HINT,
      ];
    case 'insidePropertyName': {
      const target = schema ? resolveSchemaPath(schema, position.path) : undefined;
      if (!target) {
        return [];
      }
      const candidates: Candidate[] = [];
      for (const name of target.properties.keys()) {
        if (usedKeys.has(name) || !name.startsWith(position.partial)) {
          continue;
        }
        candidates.push({
          insertionText: `${name.slice(position.partial.length)}": `,
          displayLabel: name,
          replaceFromOffset: 0,
        });
      }
      return candidates;
    }
    case 'insideNestedObject': {
      const target = schema ? resolveSchemaPath(schema, position.path) : undefined;
      if (target?.kind !== 'object') {
        return [];
      }
      return [...propertyCandidates(target, usedKeys), OPEN_KEY_HINT];
    }
    case 'needsClosingBraces':
      return [hint(' }'.repeat(position.count), CLOSE_OBJECT_LABEL)];
    case 'unstructured':
      return [];
    default: {
      const unreachable: never = position;
      return unreachable;
    }
  }
}
