/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileOutput } from './FileOutput.js';
import type { LogEntry } from './types.js';

function entry(message: string): LogEntry {
  return {
    timestamp: '2025-01-01T00:00:00.000Z',
    namespace: 'mcp-shell:test',
    level: 'debug',
    message,
    runId: 'run-1',
    pid: 42,
  };
}

async function readLines(file: string | undefined): Promise<LogEntry[]> {
  if (!file) {
    throw new Error('no log file');
  }
  const content = await fs.readFile(file, 'utf8');
  return content
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('FileOutput', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mcp-shell-debug-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('writes queued entries as JSON lines on flush', async () => {
    const output = new FileOutput({ directory: () => directory, runId: 'run-1' });

    await output.write(entry('first'));
    await output.write(entry('second'));
    await output.flush();

    expect(path.dirname(output.logFile ?? '')).toBe(directory);
    expect(path.basename(output.logFile ?? '')).toMatch(
      /^mcp-shell-debug-run-1-.*\.jsonl$/,
    );
    const lines = await readLines(output.logFile);
    expect(lines.map((line) => line.message)).toEqual(['first', 'second']);
    await output.dispose();
  });

  it('flushes as soon as a batch is full', async () => {
    const output = new FileOutput({
      directory: () => directory,
      batchSize: 2,
      flushIntervalMs: 60_000,
    });

    await output.write(entry('a'));
    expect(output.logFile).toBeUndefined();
    await output.write(entry('b'));

    const lines = await readLines(output.logFile);
    expect(lines.map((line) => line.message)).toEqual(['a', 'b']);
    await output.dispose();
  });

  it('starts a new file when the directory changes', async () => {
    let target = directory;
    const output = new FileOutput({ directory: () => target });

    await output.write(entry('old'));
    await output.flush();
    const firstFile = output.logFile;

    target = path.join(directory, 'moved');
    await output.write(entry('new'));
    await output.flush();

    expect(firstFile?.startsWith(directory)).toBe(true);
    expect(path.dirname(output.logFile ?? '')).toBe(target);
    expect((await readLines(output.logFile)).map((l) => l.message)).toEqual([
      'new',
    ]);
    await output.dispose();
  });

  it('flushes on dispose and ignores later writes', async () => {
    const output = new FileOutput({ directory: () => directory });

    await output.write(entry('pending'));
    await output.dispose();
    await output.write(entry('ignored'));
    await output.flush();

    const lines = await readLines(output.logFile);
    expect(lines.map((line) => line.message)).toEqual(['pending']);
  });
});
