/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Extracts a string error message from an unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/** Base class of every error the shell reports to the user. */
export class ShellError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ShellError';
  }
}

export class UnknownToolError extends ShellError {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class UnknownResourceError extends ShellError {
  constructor(readonly resourceName: string) {
    super(`Unknown resource: ${resourceName}`);
    this.name = 'UnknownResourceError';
  }
}

export class InvalidArgumentsError extends ShellError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidArgumentsError';
  }
}

export class SettingsError extends ShellError {
  constructor(
    readonly settingsPath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid settings in ${settingsPath}: ${message}`, options);
    this.name = 'SettingsError';
  }
}
