/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { CompletionSnapshot } from '../completion/types.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { SchemaCache } from '../schema/schemaCache.js';
import {
  UnknownResourceError,
  UnknownToolError,
  getErrorMessage,
} from '../utils/errors.js';
import {
  resourceContentSchema,
  resourceDescriptorSchema,
  toolCallResultSchema,
  toolDescriptorSchema,
  type ResourceContent,
  type ResourceDescriptor,
  type ToolCallResult,
  type ToolDescriptor,
} from './types.js';

const logger = DebugLogger.getLogger('mcp-shell:session');

export const CLIENT_INFO = { name: 'mcp-shell', version: '0.1.0' } as const;

export interface McpSessionOptions {
  url: string;
  timeoutMs: number;
}

function decodeAll<T>(
  items: readonly unknown[],
  decode: (item: unknown) => { success: true; data: T } | { success: false },
  what: string,
): T[] {
  const decoded: T[] = [];
  for (const item of items) {
    const result = decode(item);
    if (result.success) {
      decoded.push(result.data);
    } else {
      logger.warn(() => `skipping malformed ${what}: ${JSON.stringify(item)}`);
    }
  }
  return decoded;
}

/**
 * A connection to one MCP server plus what the shell knows about it:
 * the tool and resource catalog and the argument schema of every tool.
 */
export class McpSession {
  private toolList: readonly ToolDescriptor[] = [];
  private resourceList: readonly ResourceDescriptor[] = [];
  private toolNames: readonly string[] = [];
  private resourceNames: readonly string[] = [];
  readonly schemas = new SchemaCache();

  private constructor(
    private readonly client: Client,
    private readonly timeoutMs: number,
  ) {}

  /** Connects over streamable HTTP and loads the catalog. */
  static async connect(options: McpSessionOptions): Promise<McpSession> {
    const transport = new StreamableHTTPClientTransport(new URL(options.url));
    return McpSession.open(transport, options.timeoutMs);
  }

  /** Connects over an already created transport and loads the catalog. */
  static async open(
    transport: Transport,
    timeoutMs: number,
  ): Promise<McpSession> {
    const client = new Client(CLIENT_INFO);
    await client.connect(transport, { timeout: timeoutMs });
    const session = new McpSession(client, timeoutMs);
    await session.refresh();
    return session;
  }

  get tools(): readonly ToolDescriptor[] {
    return this.toolList;
  }

  get resources(): readonly ResourceDescriptor[] {
    return this.resourceList;
  }

  get serverName(): string | undefined {
    return this.client.getServerVersion()?.name;
  }

  private get requestOptions(): RequestOptions {
    return { timeout: this.timeoutMs };
  }

  /**
   * Reloads tools and resources, then rebuilds the schema cache. A server
   * that cannot list resources is treated as having none.
   */
  async refresh(): Promise<void> {
    const tools = decodeAll(
      await this.listAllTools(),
      (item) => toolDescriptorSchema.safeParse(item),
      'tool',
    );

    let rawResources: unknown[] = [];
    try {
      rawResources = await this.listAllResources();
    } catch (error) {
      logger.warn(() => `listing resources failed: ${getErrorMessage(error)}`);
    }
    const resources = decodeAll(
      rawResources,
      (item) => resourceDescriptorSchema.safeParse(item),
      'resource',
    );

    this.toolList = tools;
    this.resourceList = resources;
    this.toolNames = tools.map((tool) => tool.name);
    this.resourceNames = resources.map((resource) => resource.name);

    const schemas: Array<[string, unknown]> = [];
    for (const tool of tools) {
      try {
        schemas.push([tool.name, await this.fetchArgumentSchema(tool)]);
      } catch (error) {
        logger.warn(
          () => `no argument schema for ${tool.name}: ${getErrorMessage(error)}`,
        );
      }
    }
    this.schemas.replace(schemas);
    logger.debug(
      () =>
        `catalog: ${tools.length} tools, ${resources.length} resources, ${this.schemas.size} schemas`,
    );
  }

  snapshot(commands: readonly string[]): CompletionSnapshot {
    return {
      commands,
      toolNames: this.toolNames,
      resourceNames: this.resourceNames,
      lookupSchema: this.schemas.lookup,
    };
  }

  findTool(name: string): ToolDescriptor | undefined {
    return this.toolList.find((tool) => tool.name === name);
  }

  findResource(name: string): ResourceDescriptor | undefined {
    return this.resourceList.find((resource) => resource.name === name);
  }

  /** The JSON Schema arguments are validated against. */
  rawSchema(name: string): unknown {
    return this.schemas.raw(name);
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolCallResult> {
    if (!this.findTool(name)) {
      throw new UnknownToolError(name);
    }
    logger.debug(() => `calling ${name} with ${JSON.stringify(args)}`);
    const result = await this.client.callTool(
      { name, arguments: args },
      undefined,
      this.requestOptions,
    );
    return toolCallResultSchema.parse(result);
  }

  async readResource(name: string): Promise<ResourceContent[]> {
    const resource = this.findResource(name);
    if (!resource) {
      throw new UnknownResourceError(name);
    }
    return this.readUri(resource.uri);
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async readUri(uri: string): Promise<ResourceContent[]> {
    const result = await this.client.readResource({ uri }, this.requestOptions);
    return decodeAll(
      result.contents,
      (item) => resourceContentSchema.safeParse(item),
      'resource content',
    );
  }

  private async fetchArgumentSchema(tool: ToolDescriptor): Promise<unknown> {
    const resourceName = tool.argsSchemaResource;
    const resource =
      resourceName === undefined ? undefined : this.findResource(resourceName);
    if (!resource) {
      return tool.inputSchema;
    }

    try {
      const contents = await this.readUri(resource.uri);
      for (const content of contents) {
        if (content.kind === 'text') {
          const schema: unknown = JSON.parse(content.text);
          return schema;
        }
      }
      logger.debug(() => `${resource.name} has no text content`);
    } catch (error) {
      logger.warn(
        () =>
          `schema resource ${resource.name} unusable for ${tool.name}: ${getErrorMessage(error)}`,
      );
    }
    return tool.inputSchema;
  }

  private async listAllTools(): Promise<unknown[]> {
    const tools: unknown[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listTools(
        cursor === undefined ? undefined : { cursor },
        this.requestOptions,
      );
      tools.push(...page.tools);
      cursor = page.nextCursor;
    } while (cursor !== undefined);
    return tools;
  }

  private async listAllResources(): Promise<unknown[]> {
    const resources: unknown[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listResources(
        cursor === undefined ? undefined : { cursor },
        this.requestOptions,
      );
      resources.push(...page.resources);
      cursor = page.nextCursor;
    } while (cursor !== undefined);
    return resources;
  }
}
