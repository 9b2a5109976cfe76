/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Writable } from 'node:stream';
import { Chalk } from 'chalk';
import { ShellOutput } from '../shell/output.js';

export interface OutputCapture {
  readonly stream: Writable;
  /** Writes to `stream` without colors. */
  readonly output: ShellOutput;
  text(): string;
  clear(): void;
}

export function captureOutput(): OutputCapture {
  let chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return {
    stream,
    output: new ShellOutput(stream, new Chalk({ level: 0 })),
    text: () => chunks.join(''),
    clear: () => {
      chunks = [];
    },
  };
}
