/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterAll } from 'vitest';
import { DebugLogger } from './src/debug/DebugLogger.js';

// Debug logging must not be switched on by the developer's own environment.
for (const name of ['DEBUG', 'MCP_SHELL_DEBUG', 'DEBUG_LEVEL', 'DEBUG_OUTPUT']) {
  delete process.env[name];
}

afterAll(() => {
  DebugLogger.disposeAll();
});
