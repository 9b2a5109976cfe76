/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  InvalidArgumentsError,
  UnknownResourceError,
  UnknownToolError,
  getErrorMessage,
  segmentCommandLine,
  validateArguments,
  type McpSession,
  type Token,
} from '@mcp-shell/core';
import { SHELL_COMMANDS, findCommand } from './commands.js';
import {
  describeArguments,
  formatResourceContent,
  formatToolContent,
} from './formatting.js';
import type { ShellOutput } from './output.js';

const logger = DebugLogger.getLogger('mcp-shell:shell');

export type LineOutcome = 'continue' | 'exit';

/** Tokens after the command word and the raw JSON argument, if any. */
interface CommandArgs {
  readonly tokens: readonly Token[];
  readonly json: string | undefined;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses the JSON argument of a tool call; no argument means `{}`. */
export function parseToolArguments(
  json: string | undefined,
): Record<string, unknown> {
  if (json === undefined || json.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new InvalidArgumentsError(
      `Invalid JSON arguments: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
  if (!isJsonObject(parsed)) {
    throw new InvalidArgumentsError('Arguments must be a JSON object');
  }
  return parsed;
}

export function formatPrompt(session: McpSession): string {
  return `mcp [${session.tools.length} tools | ${session.resources.length} resources]> `;
}

/**
 * Runs one submitted line against the session. Errors are reported on
 * the output and never end the shell; only `exit` and `quit` do.
 */
export class CommandProcessor {
  constructor(
    private readonly session: McpSession,
    private readonly output: ShellOutput,
  ) {}

  async processLine(line: string): Promise<LineOutcome> {
    const text = line.trim();
    if (text === '') {
      return 'continue';
    }

    const segments = segmentCommandLine(text);
    const [first, ...tokens] = segments.preJsonTokens;
    if (!first) {
      this.reportUnknown(text);
      return 'continue';
    }
    const args: CommandArgs = { tokens, json: segments.jsonFragment };

    try {
      return await this.dispatch(first.text, args);
    } catch (error) {
      this.reportError(error);
      return 'continue';
    }
  }

  private async dispatch(
    word: string,
    args: CommandArgs,
  ): Promise<LineOutcome> {
    const name = findCommand(word)?.name;
    logger.debug(() => `dispatching ${JSON.stringify(word)}`);

    switch (name) {
      case 'help':
        this.showHelp();
        return 'continue';
      case 'list':
        await this.session.refresh();
        this.showTools();
        this.showResources();
        return 'continue';
      case 'tools':
        await this.session.refresh();
        this.showTools();
        return 'continue';
      case 'resources':
        await this.session.refresh();
        this.showResources();
        return 'continue';
      case 'call':
        await this.callTool(args);
        return 'continue';
      case 'read':
        await this.readResource(args);
        return 'continue';
      case 'tool-details':
        this.showToolDetails(args);
        return 'continue';
      case 'exit':
      case 'quit':
        this.output.print('Goodbye!');
        return 'exit';
      case undefined:
        break;
      default: {
        const unhandled: never = name;
        throw new Error(`Unhandled command: ${String(unhandled)}`);
      }
    }

    if (this.session.findTool(word)) {
      await this.callNamedTool(word, args);
    } else if (this.session.findResource(word)) {
      await this.readNamedResource(word, args);
    } else {
      this.reportUnknown(word);
    }
    return 'continue';
  }

  private showHelp(): void {
    const width = Math.max(...SHELL_COMMANDS.map((c) => c.usage.length)) + 2;
    this.output.heading('Available commands:');
    for (const command of SHELL_COMMANDS) {
      this.output.print(
        `  ${command.usage.padEnd(width)}${command.description}`,
      );
    }
    this.output.print();
    this.output.hint('Tools and resources can also be used directly by name:');
    this.output.hint('  example:greet {"name": "Alice"}');
    this.output.hint('  readme');
  }

  private showTools(): void {
    const tools = this.session.tools;
    if (tools.length === 0) {
      this.output.print('No tools available');
      return;
    }
    this.output.heading(`Available tools (${tools.length}):`);
    tools.forEach((tool, index) => {
      this.output.print(`  ${index + 1}. ${tool.name}`);
      if (tool.description) {
        this.output.print(`     ${tool.description}`);
      }
      const required = this.session.schemas.get(tool.name)?.required ?? [];
      if (required.length > 0) {
        this.output.print(`     Required: ${required.join(', ')}`);
      }
    });
  }

  private showResources(): void {
    const resources = this.session.resources;
    if (resources.length === 0) {
      this.output.print('No resources available');
      return;
    }
    this.output.heading(`Available resources (${resources.length}):`);
    resources.forEach((resource, index) => {
      this.output.print(`  ${index + 1}. ${resource.name}`);
      if (resource.description) {
        this.output.print(`     ${resource.description}`);
      }
      if (resource.mimeType) {
        this.output.print(`     Type: ${resource.mimeType}`);
      }
    });
  }

  private async callTool(args: CommandArgs): Promise<void> {
    const [name, ...rest] = args.tokens;
    if (!name) {
      throw new InvalidArgumentsError('Usage: call <tool> [json]');
    }
    await this.callNamedTool(name.text, { tokens: rest, json: args.json });
  }

  private async callNamedTool(name: string, args: CommandArgs): Promise<void> {
    if (args.tokens.length > 0) {
      throw new InvalidArgumentsError('Arguments must be a JSON object');
    }
    if (!this.session.findTool(name)) {
      throw new UnknownToolError(name);
    }
    const toolArgs = parseToolArguments(args.json);

    for (const problem of validateArguments(
      this.session.rawSchema(name),
      toolArgs,
    )) {
      this.output.warn(problem);
    }

    this.output.progress(`Calling tool '${name}'...`);
    const result = await this.session.callTool(name, toolArgs);

    if (result.isError) {
      this.output.error(`Tool '${name}' reported an error:`);
    } else {
      this.output.success(`Tool '${name}' result:`);
    }
    if (result.content.length > 0) {
      for (const content of result.content) {
        this.output.print(formatToolContent(content));
      }
    } else if (result.structuredContent) {
      this.output.print(JSON.stringify(result.structuredContent, null, 2));
    } else {
      this.output.hint('(no content)');
    }
  }

  private async readResource(args: CommandArgs): Promise<void> {
    const [name, ...rest] = args.tokens;
    if (!name) {
      throw new InvalidArgumentsError('Usage: read <resource>');
    }
    await this.readNamedResource(name.text, { tokens: rest, json: args.json });
  }

  private async readNamedResource(
    name: string,
    args: CommandArgs,
  ): Promise<void> {
    if (args.tokens.length > 0 || args.json !== undefined) {
      throw new InvalidArgumentsError('Usage: read <resource>');
    }
    if (!this.session.findResource(name)) {
      throw new UnknownResourceError(name);
    }
    this.output.progress(`Reading resource '${name}'...`);
    const contents = await this.session.readResource(name);
    this.output.success(`Resource '${name}' content:`);
    for (const content of contents) {
      this.output.print(formatResourceContent(content));
    }
  }

  private showToolDetails(args: CommandArgs): void {
    const [name, ...rest] = args.tokens;
    if (!name || rest.length > 0 || args.json !== undefined) {
      throw new InvalidArgumentsError('Usage: tool-details <tool>');
    }
    const tool = this.session.findTool(name.text);
    if (!tool) {
      throw new UnknownToolError(name.text);
    }

    this.output.heading(tool.name);
    if (tool.description) {
      this.output.print(`  ${tool.description}`);
    }
    if (tool.argsSchemaResource) {
      this.output.print(`  Schema resource: ${tool.argsSchemaResource}`);
    }
    const schema = this.session.schemas.get(tool.name);
    const lines = schema ? describeArguments(schema, '  ') : [];
    if (lines.length === 0) {
      this.output.print('  No arguments');
    }
    for (const line of lines) {
      this.output.print(line);
    }
  }

  private reportUnknown(word: string): void {
    this.output.error(`Unknown command: ${word}`);
    this.output.hint("Type 'help' for available commands.");
  }

  private reportError(error: unknown): void {
    logger.debug(() => `command failed: ${getErrorMessage(error)}`);
    this.output.error(getErrorMessage(error));
    if (error instanceof UnknownToolError) {
      this.output.hint("Use 'tools' to see available tools.");
    } else if (error instanceof UnknownResourceError) {
      this.output.hint("Use 'resources' to see available resources.");
    }
  }
}
