/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { DebugLevel, LogEntry } from './types.js';

/** A message, or a function producing it only when the logger is enabled. */
export type LogMessage = string | (() => string);

const LEVEL_ORDER: Readonly<Record<DebugLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function matchesPattern(namespace: string, pattern: string): boolean {
  if (pattern === namespace) {
    return true;
  }
  if (!pattern.includes('*')) {
    return false;
  }
  const regexPattern = pattern
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');
  return new RegExp(`^${regexPattern}$`).test(namespace);
}

function evaluate(messageOrFn: LogMessage): string {
  if (typeof messageOrFn === 'string') {
    return messageOrFn;
  }
  try {
    return messageOrFn();
  } catch (_error) {
    return '[Error evaluating log function]';
  }
}

/**
 * Namespaced logger. One instance per namespace via {@link getLogger};
 * whether it is enabled follows the {@link ConfigurationManager}.
 */
export class DebugLogger {
  private static instances = new Map<string, DebugLogger>();

  private readonly debugInstance: Debugger;
  private _enabled: boolean;
  private readonly onConfigChange = (): void => {
    this._enabled = this.checkEnabled();
  };

  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  /** Unsubscribes and forgets every cached logger. */
  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger.configManager.unsubscribe(logger.onConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(
    readonly namespace: string,
    readonly configManager: ConfigurationManager = ConfigurationManager.getInstance(),
    readonly fileOutput: FileOutput = FileOutput.getInstance(),
  ) {
    this.debugInstance = createDebug(namespace);
    // Enablement is decided here, not by the `debug` package's own DEBUG parsing.
    this.debugInstance.enabled = true;
    this._enabled = this.checkEnabled();
    this.configManager.subscribe(this.onConfigChange);
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  debug(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  info(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('info', messageOrFn, args);
  }

  warn(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this.configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      matchesPattern(this.namespace, pattern),
    );
  }

  dispose(): void {
    this.configManager.unsubscribe(this.onConfigChange);
    if (DebugLogger.instances.get(this.namespace) === this) {
      DebugLogger.instances.delete(this.namespace);
    }
  }

  private write(
    level: DebugLevel,
    messageOrFn: LogMessage,
    args: unknown[],
  ): void {
    if (!this._enabled) {
      return;
    }
    const threshold = this.configManager.getEffectiveConfig().level;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    const message = this.redactSensitive(evaluate(messageOrFn));
    const target = this.configManager.getOutputTarget();

    if (target.includes('file')) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        namespace: this.namespace,
        level,
        message,
        args: args.length > 0 ? args : undefined,
        runId: this.fileOutput.runId,
        pid: process.pid,
      };
      void this.fileOutput.write(entry);
    }

    if (target.includes('stderr')) {
      this.debugInstance(message, ...args);
    }
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this.configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }
}
