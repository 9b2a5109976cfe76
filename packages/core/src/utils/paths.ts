/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';

/** Per-user directory holding settings, history and debug logs. */
export const SHELL_DIR = '.mcp-shell';

export function getUserShellDir(): string {
  const home = os.homedir();
  return home ? path.join(home, SHELL_DIR) : path.join(process.cwd(), SHELL_DIR);
}

/**
 * Expands a leading `~` to the home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
