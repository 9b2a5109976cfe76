/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ArgumentSchema,
  ResourceContent,
  ToolContent,
} from '@mcp-shell/core';

/** Pretty-prints text holding a JSON object or array; other text is kept. */
export function formatText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return text;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return JSON.stringify(parsed, null, 2);
  } catch (_error) {
    return text;
  }
}

export function formatToolContent(content: ToolContent): string {
  return content.kind === 'text'
    ? formatText(content.text)
    : JSON.stringify(content.value, null, 2);
}

export function formatResourceContent(content: ResourceContent): string {
  return content.kind === 'text'
    ? content.text
    : `<binary data (${content.byteLength} bytes)>`;
}

function formatEnum(values: readonly unknown[]): string {
  return values
    .map((value) => (typeof value === 'string' ? value : JSON.stringify(value)))
    .join(', ');
}

function describeProperty(name: string, property: ArgumentSchema): string {
  let line = `${name} (${property.kind})`;
  if (property.description) {
    line += ` - ${property.description}`;
  }
  if (property.enum && property.enum.length > 0) {
    line += ` [one of: ${formatEnum(property.enum)}]`;
  }
  return line;
}

/**
 * One line per argument, required ones first, each group in schema order.
 * Nested object properties are indented under their parent.
 */
export function describeArguments(
  schema: ArgumentSchema,
  indent = '',
): string[] {
  const lines: string[] = [];
  const entries = [...schema.properties];
  const groups: Array<[string, Array<[string, ArgumentSchema]>]> = [
    ['Required', entries.filter(([name]) => schema.required.includes(name))],
    ['Optional', entries.filter(([name]) => !schema.required.includes(name))],
  ];
  for (const [title, properties] of groups) {
    if (properties.length === 0) {
      continue;
    }
    lines.push(`${indent}${title}:`);
    for (const [name, property] of properties) {
      lines.push(`${indent}  ${describeProperty(name, property)}`);
      if (property.kind === 'object' && property.properties.size > 0) {
        lines.push(...describeArguments(property, `${indent}    `));
      }
    }
  }
  return lines;
}
