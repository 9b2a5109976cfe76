/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import {
  DebugLogger,
  FileOutput,
  McpSession,
  getErrorMessage,
} from '@mcp-shell/core';
import { loadShellConfig, parseArguments } from './config/config.js';
import { PersistentHistory } from './shell/history.js';
import { InteractiveShell } from './shell/interactiveShell.js';
import { ShellOutput } from './shell/output.js';

const logger = DebugLogger.getLogger('mcp-shell:main');

/** Runs the shell and resolves to the process exit code. */
export async function main(
  argv: string[] = hideBin(process.argv),
  output: ShellOutput = new ShellOutput(),
): Promise<number> {
  const args = await parseArguments(argv);
  const config = loadShellConfig(args);
  logger.debug(() => `configuration: ${JSON.stringify(config)}`);

  output.progress(`Connecting to MCP server at ${config.serverUrl}...`);
  let session: McpSession;
  try {
    session = await McpSession.connect({
      url: config.serverUrl,
      timeoutMs: config.timeoutMs,
    });
  } catch (error) {
    logger.error(() => `connection failed: ${getErrorMessage(error)}`);
    output.error(`Failed to connect: ${getErrorMessage(error)}`);
    await FileOutput.getInstance().dispose();
    return 1;
  }

  output.success(
    `Connected to ${session.serverName ?? config.serverUrl}. Found ${session.tools.length} tools and ${session.resources.length} resources`,
  );

  const history = new PersistentHistory(config.historyFile, config.historySize);
  await history.initialize();
  try {
    await new InteractiveShell({
      session,
      history,
      historySize: config.historySize,
      shellOutput: output,
    }).run();
  } finally {
    await history.close();
    await session.close();
    await FileOutput.getInstance().dispose();
  }
  return 0;
}
