/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import process from 'node:process';
import {
  CLIENT_INFO,
  ConfigurationManager,
  NAMESPACE_PREFIX,
  expandHome,
} from '@mcp-shell/core';
import { DEFAULT_HISTORY_PATH } from './paths.js';
import {
  DEFAULT_HISTORY_SIZE,
  DEFAULT_SERVER_URL,
  DEFAULT_TIMEOUT_MS,
  loadSettings,
  type Settings,
} from './settings.js';

export interface CliArgs {
  port: number | undefined;
  url: string | undefined;
  timeout: number | undefined;
  historyFile: string | undefined;
  settings: string | undefined;
  debug: boolean;
}

/** Everything the shell needs to start, with every default applied. */
export interface ShellConfig {
  readonly serverUrl: string;
  readonly timeoutMs: number;
  readonly historyFile: string;
  readonly historySize: number;
  readonly debug: boolean;
}

function isPort(value: string | number): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value > 0 &&
    value <= 65535
  );
}

export async function parseArguments(
  argv: string[] = hideBin(process.argv),
): Promise<CliArgs> {
  const yargsInstance = yargs(argv)
    .locale('en')
    .scriptName('mcp-shell')
    .usage(
      'Usage: $0 [port] [options]\n\nInteractive shell for an MCP server. A port connects to http://localhost:<port>/mcp.',
    )
    .option('url', {
      alias: 'u',
      type: 'string',
      description: `MCP endpoint URL (default ${DEFAULT_SERVER_URL})`,
    })
    .option('timeout', {
      alias: 't',
      type: 'number',
      description: 'Request timeout in milliseconds',
    })
    .option('history-file', {
      type: 'string',
      description: 'File the command history is kept in',
    })
    .option('settings', {
      type: 'string',
      description: 'Settings file to read instead of ~/.mcp-shell/settings.json',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      default: false,
      description: 'Write debug logs for every mcp-shell namespace',
    })
    .version(CLIENT_INFO.version)
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strictOptions()
    .check((args) => {
      const positionals = args._;
      if (positionals.length > 1) {
        throw new Error(
          `Unexpected arguments: ${positionals.slice(1).join(' ')}`,
        );
      }
      const port = positionals[0];
      if (port !== undefined && !isPort(port)) {
        throw new Error(`Invalid port: ${port}`);
      }
      if (port !== undefined && args.url !== undefined) {
        throw new Error('Cannot use both a port and --url together');
      }
      if (args.timeout !== undefined && !(args.timeout > 0)) {
        throw new Error('--timeout must be a positive number of milliseconds');
      }
      return true;
    });

  yargsInstance.wrap(yargsInstance.terminalWidth());
  const result = await yargsInstance.parseAsync();

  const port = result._[0];
  return {
    port: port !== undefined && isPort(port) ? port : undefined,
    url: result.url,
    timeout: result.timeout,
    historyFile: result.historyFile,
    settings: result.settings,
    debug: result.debug,
  };
}

/** Command line over settings file over defaults. */
export function resolveShellConfig(
  args: CliArgs,
  settings: Settings,
): ShellConfig {
  const portUrl =
    args.port === undefined
      ? undefined
      : `http://localhost:${args.port}/mcp`;
  return {
    serverUrl: args.url ?? portUrl ?? settings.serverUrl ?? DEFAULT_SERVER_URL,
    timeoutMs: args.timeout ?? settings.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    historyFile:
      (args.historyFile === undefined
        ? undefined
        : expandHome(args.historyFile)) ??
      settings.historyFile ??
      DEFAULT_HISTORY_PATH,
    historySize: settings.historySize ?? DEFAULT_HISTORY_SIZE,
    debug: args.debug,
  };
}

/**
 * Loads the settings file named by the arguments (or the default one),
 * hands its `debug` block and the `--debug` flag to the debug
 * configuration and resolves the shell configuration.
 */
export function loadShellConfig(
  args: CliArgs,
  configManager: ConfigurationManager = ConfigurationManager.getInstance(),
): ShellConfig {
  const { settings } =
    args.settings === undefined
      ? loadSettings()
      : loadSettings(expandHome(args.settings));

  if (settings.debug) {
    configManager.setUserConfig(settings.debug);
  }
  if (args.debug) {
    configManager.setCliConfig({
      enabled: true,
      namespaces: [`${NAMESPACE_PREFIX}:*`],
    });
  }
  return resolveShellConfig(args, settings);
}
