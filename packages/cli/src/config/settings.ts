/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import stripJsonComments from 'strip-json-comments';
import {
  SettingsError,
  expandHome,
  getErrorMessage,
  partialDebugSettingsSchema,
} from '@mcp-shell/core';
import { USER_SETTINGS_PATH } from './paths.js';

export const DEFAULT_SERVER_URL = 'http://localhost:8001/mcp';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_HISTORY_SIZE = 500;

export const settingsSchema = z
  .object({
    serverUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
    historyFile: z.string().min(1).optional(),
    historySize: z.number().int().nonnegative().optional(),
    debug: partialDebugSettingsSchema.optional(),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

export interface LoadedSettings {
  readonly path: string;
  /** Whether the file existed. */
  readonly found: boolean;
  readonly settings: Settings;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/**
 * Reads the user settings file. A missing file yields empty settings;
 * unreadable JSON or unknown and mistyped keys raise a SettingsError.
 */
export function loadSettings(
  settingsPath: string = USER_SETTINGS_PATH,
): LoadedSettings {
  if (!fs.existsSync(settingsPath)) {
    return { path: settingsPath, found: false, settings: {} };
  }

  let parsed: unknown;
  try {
    const content = fs.readFileSync(settingsPath, 'utf-8');
    parsed = JSON.parse(stripJsonComments(content));
  } catch (error) {
    throw new SettingsError(settingsPath, getErrorMessage(error), {
      cause: error,
    });
  }

  const result = settingsSchema.safeParse(parsed);
  if (!result.success) {
    throw new SettingsError(settingsPath, formatIssues(result.error));
  }
  const settings = result.data;
  return {
    path: settingsPath,
    found: true,
    settings: settings.historyFile
      ? { ...settings, historyFile: expandHome(settings.historyFile) }
      : settings,
  };
}
