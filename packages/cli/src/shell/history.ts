/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { DebugLogger, getErrorMessage } from '@mcp-shell/core';

const debug = DebugLogger.getLogger('mcp-shell:history');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Command history kept in a plain text file, one entry per line, oldest
 * first. In memory it is held newest first, the order readline takes.
 */
export class PersistentHistory {
  private entries: string[] = [];
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly maxSize: number,
  ) {}

  /**
   * Loads the file. A missing file is an empty history; any other
   * failure is logged and also leaves the history empty.
   */
  async initialize(): Promise<void> {
    try {
      const content = await fs.readFile(this.filePath, 'utf8');
      this.entries = content
        .split('\n')
        .filter((line) => line.trim() !== '')
        .reverse()
        .slice(0, this.maxSize);
      debug.debug(() => `loaded ${this.entries.length} history entries`);
    } catch (error) {
      if (!isMissingFile(error)) {
        debug.error(
          () => `failed to load ${this.filePath}: ${getErrorMessage(error)}`,
        );
      }
      this.entries = [];
    }
  }

  /**
   * Adds a line unless it is blank or repeats the newest entry, then
   * saves. Save failures are logged.
   */
  record(line: string): Promise<void> {
    const entry = line.trim();
    if (entry === '' || entry === this.entries[0] || this.maxSize === 0) {
      return this.pendingWrite;
    }
    this.entries.unshift(entry);
    if (this.entries.length > this.maxSize) {
      this.entries.length = this.maxSize;
    }
    const snapshot = [...this.entries];
    this.pendingWrite = this.pendingWrite.then(() => this.save(snapshot));
    return this.pendingWrite;
  }

  /** Newest first. */
  getHistory(): string[] {
    return [...this.entries];
  }

  get count(): number {
    return this.entries.length;
  }

  /** Waits for outstanding saves. */
  async close(): Promise<void> {
    await this.pendingWrite;
  }

  private async save(entries: readonly string[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), {
        recursive: true,
        mode: 0o700,
      });
      await fs.writeFile(this.filePath, [...entries].reverse().join('\n') + '\n', {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      debug.error(
        () => `failed to save ${this.filePath}: ${getErrorMessage(error)}`,
      );
    }
  }
}
