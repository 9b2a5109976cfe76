/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SettingsError } from '@mcp-shell/core';
import { loadSettings } from './settings.js';

describe('loadSettings', () => {
  let tempDir: string;
  let settingsPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-shell-settings-'));
    settingsPath = path.join(tempDir, 'settings.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns empty settings when the file does not exist', () => {
    expect(loadSettings(settingsPath)).toEqual({
      path: settingsPath,
      found: false,
      settings: {},
    });
  });

  it('reads settings with comments', () => {
    fs.writeFileSync(
      settingsPath,
      `{
        // local development server
        "serverUrl": "http://localhost:9000/mcp",
        "timeoutMs": 5000, /* five seconds */
        "historySize": 20
      }`,
    );

    expect(loadSettings(settingsPath)).toEqual({
      path: settingsPath,
      found: true,
      settings: {
        serverUrl: 'http://localhost:9000/mcp',
        timeoutMs: 5000,
        historySize: 20,
      },
    });
  });

  it('expands ~ in historyFile', () => {
    fs.writeFileSync(settingsPath, '{"historyFile": "~/shell-history"}');

    expect(loadSettings(settingsPath).settings.historyFile).toBe(
      path.join(os.homedir(), 'shell-history'),
    );
  });

  it('accepts a debug block', () => {
    fs.writeFileSync(
      settingsPath,
      '{"debug": {"enabled": true, "level": "warn", "output": {"target": "stderr"}}}',
    );

    expect(loadSettings(settingsPath).settings.debug).toEqual({
      enabled: true,
      level: 'warn',
      output: { target: 'stderr' },
    });
  });

  it('rejects malformed JSON', () => {
    fs.writeFileSync(settingsPath, '{"serverUrl": ');

    expect(() => loadSettings(settingsPath)).toThrow(SettingsError);
  });

  it('reports mistyped values with their path', () => {
    fs.writeFileSync(settingsPath, '{"timeoutMs": -1}');

    expect(() => loadSettings(settingsPath)).toThrow(
      `Invalid settings in ${settingsPath}: timeoutMs: Number must be greater than 0`,
    );
  });

  it('rejects unknown keys', () => {
    fs.writeFileSync(settingsPath, '{"theme": "dark"}');

    expect(() => loadSettings(settingsPath)).toThrow(
      "Unrecognized key(s) in object: 'theme'",
    );
  });
});
