/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Completion engine
export * from './completion/types.js';
export * from './completion/quotedTokens.js';
export * from './completion/commandLine.js';
export * from './completion/jsonContext.js';
export * from './completion/candidates.js';
export * from './completion/completer.js';

// Schemas
export * from './schema/argumentSchema.js';
export * from './schema/schemaCache.js';
export * from './schema/argumentValidator.js';

// MCP session
export * from './session/types.js';
export * from './session/mcpSession.js';

// Debug logging
export * from './debug/types.js';
export * from './debug/ConfigurationManager.js';
export * from './debug/DebugLogger.js';
export * from './debug/FileOutput.js';

export * from './utils/errors.js';
export * from './utils/paths.js';
