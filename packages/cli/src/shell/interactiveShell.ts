/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createCompleter, type McpSession } from '@mcp-shell/core';
import { COMMAND_NAMES } from './commands.js';
import { CommandProcessor, formatPrompt } from './commandProcessor.js';
import type { PersistentHistory } from './history.js';
import { ShellOutput } from './output.js';
import { createReadlineCompleter } from './readlineAdapter.js';

export interface InteractiveShellOptions {
  session: McpSession;
  history: PersistentHistory;
  historySize: number;
  input?: Readable;
  output?: Writable;
  /** Defaults to a ShellOutput on `output`. */
  shellOutput?: ShellOutput;
  /** Whether `input` is a TTY; readline decides when left out. */
  terminal?: boolean;
}

/**
 * The read-eval-print loop. Ends on `exit` or `quit`, on end of input
 * and on Ctrl+C.
 */
export class InteractiveShell {
  private readonly output: ShellOutput;
  private readonly processor: CommandProcessor;

  constructor(private readonly options: InteractiveShellOptions) {
    this.output =
      options.shellOutput ?? new ShellOutput(options.output ?? process.stdout);
    this.processor = new CommandProcessor(options.session, this.output);
  }

  async run(): Promise<void> {
    const { session, history } = this.options;
    const completer = createCompleter(() => session.snapshot(COMMAND_NAMES));

    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.options.output ?? process.stdout,
      completer: createReadlineCompleter(completer),
      history: history.getHistory(),
      historySize: this.options.historySize,
      terminal: this.options.terminal,
    });
    let closed = false;
    rl.on('close', () => {
      closed = true;
    });
    rl.on('SIGINT', () => rl.close());

    this.output.heading('MCP Interactive Shell');
    this.output.hint("Type 'help' for available commands or 'exit' to quit.");

    let exited = false;
    rl.setPrompt(formatPrompt(session));
    rl.prompt();
    try {
      for await (const line of rl) {
        await history.record(line);
        if ((await this.processor.processLine(line)) === 'exit') {
          exited = true;
          break;
        }
        if (!closed) {
          rl.setPrompt(formatPrompt(session));
          rl.prompt();
        }
      }
    } finally {
      if (!closed) {
        rl.close();
      }
    }

    if (!exited) {
      this.output.print();
      this.output.print('Goodbye!');
    }
  }
}
