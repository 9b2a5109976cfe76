/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export interface ToolDescriptor {
  readonly name: string;
  readonly description?: string;
  /** JSON Schema of the arguments as advertised in the tool listing. */
  readonly inputSchema: Readonly<Record<string, unknown>>;
  /** Name of a resource holding a fuller argument schema. */
  readonly argsSchemaResource?: string;
}

export interface ResourceDescriptor {
  readonly name: string;
  readonly uri: string;
  readonly title?: string;
  readonly description?: string;
  readonly mimeType?: string;
}

export type ToolContent =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'other'; readonly value: unknown };

export interface ToolCallResult {
  readonly content: readonly ToolContent[];
  readonly isError: boolean;
  readonly structuredContent?: Readonly<Record<string, unknown>>;
}

export type ResourceContent =
  | {
      readonly kind: 'text';
      readonly uri: string;
      readonly mimeType?: string;
      readonly text: string;
    }
  | {
      readonly kind: 'blob';
      readonly uri: string;
      readonly mimeType?: string;
      readonly byteLength: number;
    };

export const toolDescriptorSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()),
    _meta: z
      .object({ args_schema_resource: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .transform(
    (tool): ToolDescriptor => ({
      name: tool.name,
      inputSchema: tool.inputSchema,
      ...(tool.description !== undefined
        ? { description: tool.description }
        : {}),
      ...(tool._meta?.args_schema_resource !== undefined
        ? { argsSchemaResource: tool._meta.args_schema_resource }
        : {}),
    }),
  );

export const resourceDescriptorSchema = z.object({
  name: z.string(),
  uri: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const textPartSchema = z.object({ type: z.literal('text'), text: z.string() });

export const toolCallResultSchema = z
  .object({
    content: z.array(z.unknown()).default([]),
    isError: z.boolean().default(false),
    structuredContent: z.record(z.unknown()).optional(),
  })
  .transform(
    (result): ToolCallResult => ({
      content: result.content.map((part): ToolContent => {
        const text = textPartSchema.safeParse(part);
        return text.success
          ? { kind: 'text', text: text.data.text }
          : { kind: 'other', value: part };
      }),
      isError: result.isError,
      ...(result.structuredContent
        ? { structuredContent: result.structuredContent }
        : {}),
    }),
  );

export const resourceContentSchema = z.union([
  z
    .object({
      uri: z.string(),
      mimeType: z.string().optional(),
      text: z.string(),
    })
    .transform(
      (content): ResourceContent => ({ kind: 'text', ...content }),
    ),
  z
    .object({
      uri: z.string(),
      mimeType: z.string().optional(),
      blob: z.string(),
    })
    .transform(
      ({ blob, ...content }): ResourceContent => ({
        kind: 'blob',
        ...content,
        byteLength: Buffer.from(blob, 'base64').length,
      }),
    ),
]);
