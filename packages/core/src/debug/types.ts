/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const DEBUG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type DebugLevel = (typeof DEBUG_LEVELS)[number];

export const debugOutputSchema = z.object({
  /** `stderr`, `file`, or both, e.g. `file,stderr`. */
  target: z.string(),
  directory: z.string().optional(),
});

export const debugSettingsSchema = z.object({
  enabled: z.boolean(),
  namespaces: z.array(z.string()),
  level: z.enum(DEBUG_LEVELS),
  output: debugOutputSchema,
  redactPatterns: z.array(z.string()),
});

/** The `debug` block of the settings file; every field optional. */
export const partialDebugSettingsSchema = debugSettingsSchema
  .extend({ output: debugOutputSchema.partial() })
  .partial();

export type DebugOutputConfig = z.infer<typeof debugOutputSchema>;
export type DebugSettings = z.infer<typeof debugSettingsSchema>;
export type PartialDebugSettings = z.infer<typeof partialDebugSettingsSchema>;

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: DebugLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}
