/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterAll } from 'vitest';

// Keep color and debug output independent of the developer's terminal.
process.env.NODE_ENV = process.env.NODE_ENV || 'test';
for (const name of [
  'DEBUG',
  'MCP_SHELL_DEBUG',
  'DEBUG_LEVEL',
  'DEBUG_OUTPUT',
  'NO_COLOR',
]) {
  delete process.env[name];
}

afterAll(async () => {
  // Loaded late so that no logger reads the environment before it is cleared.
  const { DebugLogger } = await import('@mcp-shell/core');
  DebugLogger.disposeAll();
});
