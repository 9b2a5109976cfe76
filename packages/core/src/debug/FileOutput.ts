/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface FileOutputOptions {
  /** Resolved on every flush so that a settings change takes effect. */
  directory: () => string;
  runId?: string;
  batchSize?: number;
  flushIntervalMs?: number;
  maxQueueSize?: number;
  maxFileSize?: number;
}

/**
 * Appends log entries as JSON lines. Entries are queued and written in
 * batches; a new file is started when the current one grows past
 * `maxFileSize` or was created on an earlier day.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;

  private readonly directory: () => string;
  private readonly debugRunId: string;
  private readonly batchSize: number;
  private readonly flushInterval: number;
  private readonly maxQueueSize: number;
  private readonly maxFileSize: number;

  private currentLogFile: string | undefined;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput({
        directory: () => ConfigurationManager.getInstance().getOutputDirectory(),
      });
    }
    return FileOutput.instance;
  }

  constructor(options: FileOutputOptions) {
    this.directory = options.directory;
    this.debugRunId =
      options.runId ?? process.env.MCP_SHELL_DEBUG_RUN_ID ?? String(process.pid);
    this.batchSize = options.batchSize ?? 50;
    this.flushInterval = options.flushIntervalMs ?? 1000;
    this.maxQueueSize = options.maxQueueSize ?? 1000;
    this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string | undefined {
    return this.currentLogFile;
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize) {
      await this.flushQueue();
    } else {
      this.startFlushTimer();
    }
  }

  /** Writes everything still queued. */
  async flush(): Promise<void> {
    while (this.writeQueue.length > 0 && !this.isWriting) {
      const before = this.writeQueue.length;
      await this.flushQueue();
      if (this.writeQueue.length >= before) {
        return;
      }
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flush();
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    if (this.isWriting || this.writeQueue.length === 0) {
      return;
    }

    this.isWriting = true;
    const entriesToWrite = this.writeQueue.splice(0, this.batchSize);

    try {
      const directory = this.directory();
      await fs.mkdir(directory, { recursive: true, mode: 0o700 });
      const logFile = await this.resolveLogFile(directory);

      const jsonlData =
        entriesToWrite.map((entry) => JSON.stringify(entry)).join('\n') + '\n';

      await fs.appendFile(logFile, jsonlData, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      console.error('FileOutput: Failed to write log entries:', error);

      // Retry once there is room; drop the batch otherwise.
      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entriesToWrite);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private async resolveLogFile(directory: string): Promise<string> {
    const current = this.currentLogFile;
    if (current === undefined || !current.startsWith(directory)) {
      return this.startLogFile(directory);
    }

    let stats;
    try {
      stats = await fs.stat(current);
    } catch (error) {
      if (isMissingFile(error)) {
        return current;
      }
      throw error;
    }

    const createdToday =
      stats.birthtime.toDateString() === new Date().toDateString();
    if (stats.size >= this.maxFileSize || !createdToday) {
      return this.startLogFile(directory);
    }
    return current;
  }

  private startLogFile(directory: string): string {
    const logFile = this.generateLogFileName(directory);
    this.currentLogFile = logFile;
    return logFile;
  }

  private generateLogFileName(directory: string): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    const millis = String(now.getMilliseconds()).padStart(3, '0');
    return join(
      directory,
      `mcp-shell-debug-${this.debugRunId}-${datePart}-${timePart}-${millis}.jsonl`,
    );
  }
}
