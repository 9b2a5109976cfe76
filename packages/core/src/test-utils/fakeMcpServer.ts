/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { McpSession } from '../session/mcpSession.js';

export interface FakeTool {
  name: string;
  description?: string;
  inputSchema: {
    type: 'object';
    properties?: Record<string, object>;
    required?: string[];
  };
  meta?: Record<string, unknown>;
  respond?: (args: Record<string, unknown>) => CallToolResult;
}

export interface FakeResource {
  name: string;
  uri: string;
  description?: string;
  mimeType?: string;
  text?: string;
  /** Base64 content; used when `text` is absent. */
  blob?: string;
}

export interface FakeServerOptions {
  tools: FakeTool[];
  /** Omit to run a server without resource support. */
  resources?: FakeResource[];
}

export interface RecordedCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface FakeServerConnection {
  session: McpSession;
  server: Server;
  calls: RecordedCall[];
  options: FakeServerOptions;
}

function echo(args: Record<string, unknown>): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(args) }] };
}

/**
 * Starts an MCP server in process and opens a session to it over the
 * SDK's linked in-memory transports. `options` may be mutated between
 * `refresh()` calls to simulate a changing server.
 */
export async function connectToFakeServer(
  options: FakeServerOptions,
  timeoutMs = 5000,
): Promise<FakeServerConnection> {
  const calls: RecordedCall[] = [];
  const server = new Server(
    { name: 'fake-server', version: '1.0.0' },
    {
      capabilities: {
        tools: {},
        ...(options.resources ? { resources: {} } : {}),
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: options.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      ...(tool.meta ? { _meta: tool.meta } : {}),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const tool = options.tools.find((t) => t.name === request.params.name);
    if (!tool) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Unknown tool: ${request.params.name}`,
      );
    }
    const args = request.params.arguments ?? {};
    calls.push({ name: tool.name, arguments: args });
    return (tool.respond ?? echo)(args);
  });

  if (options.resources) {
    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: (options.resources ?? []).map((resource) => ({
        name: resource.name,
        uri: resource.uri,
        description: resource.description,
        mimeType: resource.mimeType,
      })),
    }));

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const resource = (options.resources ?? []).find(
        (r) => r.uri === request.params.uri,
      );
      if (!resource) {
        throw new McpError(
          ErrorCode.InvalidParams,
          `Unknown resource: ${request.params.uri}`,
        );
      }
      return {
        contents: [
          resource.text !== undefined
            ? {
                uri: resource.uri,
                mimeType: resource.mimeType,
                text: resource.text,
              }
            : {
                uri: resource.uri,
                mimeType: resource.mimeType,
                blob: resource.blob ?? '',
              },
        ],
      };
    });
  }

  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const session = await McpSession.open(clientTransport, timeoutMs);
  return { session, server, calls, options };
}
