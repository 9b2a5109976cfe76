/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Writable } from 'node:stream';

/**
 * Line-oriented terminal output. Every method writes whole lines; the
 * chalk instance decides whether they are colored.
 */
export class ShellOutput {
  constructor(
    private readonly stream: Writable = process.stdout,
    private readonly colors: ChalkInstance = chalk,
  ) {}

  print(text = ''): void {
    this.stream.write(`${text}\n`);
  }

  heading(text: string): void {
    this.print(this.colors.bold(text));
  }

  success(text: string): void {
    this.print(this.colors.green(text));
  }

  progress(text: string): void {
    this.print(this.colors.dim(text));
  }

  hint(text: string): void {
    this.print(this.colors.gray(text));
  }

  warn(text: string): void {
    this.print(this.colors.yellow(`Warning: ${text}`));
  }

  error(text: string): void {
    this.print(this.colors.red(`Error: ${text}`));
  }
}
