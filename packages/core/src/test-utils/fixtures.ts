/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FakeServerOptions } from './fakeMcpServer.js';

export const GREETING_TOOL = 'example:greetingJson';
export const GREETING_SCHEMA_RESOURCE = 'example:greetingJson:args:schema';

/** Argument schema served through the schema resource. */
export const greetingArgsSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', description: 'Name of the person to greet' },
    include_details: {
      type: 'boolean',
      description: 'Add server details to the greeting',
    },
    preferences: {
      type: 'object',
      properties: {
        language: { type: 'string', enum: ['en', 'fr'] },
        formal: { type: 'boolean' },
      },
    },
  },
  required: ['name', 'include_details'],
};

/**
 * A server with a greeting tool whose full schema lives in a resource, a
 * plain echo tool, a tool and a resource with spaces in their names, and
 * a binary resource.
 */
export function createGreetingServerOptions(): FakeServerOptions {
  return {
    tools: [
      {
        name: GREETING_TOOL,
        description: 'Greet someone and return structured JSON',
        inputSchema: {
          type: 'object',
          properties: { name: { type: 'string' } },
        },
        meta: { args_schema_resource: GREETING_SCHEMA_RESOURCE },
        respond: (args) => ({
          content: [
            {
              type: 'text',
              text: JSON.stringify({ greeting: `Hello, ${String(args.name)}!` }),
            },
          ],
        }),
      },
      {
        name: 'example:echo',
        description: 'Echo the text back',
        inputSchema: {
          type: 'object',
          properties: { text: { type: 'string', description: 'Text to echo' } },
          required: ['text'],
        },
        respond: (args) => ({
          content: [{ type: 'text', text: String(args.text) }],
        }),
      },
      {
        name: 'say hello',
        inputSchema: {
          type: 'object',
          properties: { to: { type: 'string' } },
        },
      },
    ],
    resources: [
      {
        name: 'readme',
        uri: 'file:///readme.txt',
        description: 'A short text',
        mimeType: 'text/plain',
        text: 'Hello from the readme',
      },
      {
        name: 'resource with spaces',
        uri: 'file:///spaces.txt',
        mimeType: 'text/plain',
        text: 'spaced out',
      },
      {
        name: 'logo',
        uri: 'file:///logo.png',
        mimeType: 'image/png',
        blob: 'AAECAw==',
      },
      {
        name: GREETING_SCHEMA_RESOURCE,
        uri: `file:///${GREETING_SCHEMA_RESOURCE}.json`,
        mimeType: 'application/schema+json',
        text: JSON.stringify(greetingArgsSchema),
      },
    ],
  };
}
