/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { getUserShellDir } from '@mcp-shell/core';

export const USER_SETTINGS_DIR = getUserShellDir();
export const USER_SETTINGS_PATH = path.join(USER_SETTINGS_DIR, 'settings.json');
export const DEFAULT_HISTORY_PATH = path.join(USER_SETTINGS_DIR, 'history');
