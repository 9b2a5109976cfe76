/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type CommandName =
  | 'help'
  | 'list'
  | 'tools'
  | 'resources'
  | 'call'
  | 'read'
  | 'tool-details'
  | 'exit'
  | 'quit';

export interface ShellCommand {
  readonly name: CommandName;
  readonly usage: string;
  readonly description: string;
}

export const SHELL_COMMANDS: readonly ShellCommand[] = [
  { name: 'help', usage: 'help', description: 'Show this help message' },
  { name: 'list', usage: 'list', description: 'List all tools and resources' },
  { name: 'tools', usage: 'tools', description: 'List available tools only' },
  {
    name: 'resources',
    usage: 'resources',
    description: 'List available resources only',
  },
  {
    name: 'call',
    usage: 'call <tool> [json]',
    description: 'Call a tool with JSON arguments',
  },
  { name: 'read', usage: 'read <resource>', description: 'Read a resource' },
  {
    name: 'tool-details',
    usage: 'tool-details <tool>',
    description: 'Show the arguments a tool takes',
  },
  { name: 'exit', usage: 'exit', description: 'Exit the shell' },
  { name: 'quit', usage: 'quit', description: 'Exit the shell' },
];

/** Command words offered by completion. */
export const COMMAND_NAMES: readonly string[] = SHELL_COMMANDS.map(
  (command) => command.name,
);

export function findCommand(word: string): ShellCommand | undefined {
  const name = word.toLowerCase();
  return SHELL_COMMANDS.find((command) => command.name === name);
}
