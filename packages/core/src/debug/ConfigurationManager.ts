/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { getUserShellDir } from '../utils/paths.js';
import {
  DEBUG_LEVELS,
  type DebugLevel,
  type DebugSettings,
  type PartialDebugSettings,
} from './types.js';

/** Prefix shared by every logger namespace of the shell. */
export const NAMESPACE_PREFIX = 'mcp-shell';

function isDebugLevel(value: string): value is DebugLevel {
  return DEBUG_LEVELS.some((level) => level === value);
}

function parseNamespaces(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Reads `DEBUG`, `MCP_SHELL_DEBUG`, `DEBUG_LEVEL` and `DEBUG_OUTPUT`.
 * `DEBUG` only enables logging when it names a shell namespace or `*`.
 */
export function readEnvironmentConfig(
  env: NodeJS.ProcessEnv,
): PartialDebugSettings {
  let config: PartialDebugSettings = {};

  if (env.DEBUG) {
    const namespaces = parseNamespaces(env.DEBUG).filter(
      (ns) => ns.startsWith(NAMESPACE_PREFIX) || ns === '*',
    );
    if (namespaces.length > 0) {
      config = { enabled: true, namespaces };
    }
  }

  if (env.MCP_SHELL_DEBUG) {
    config = { enabled: true, namespaces: parseNamespaces(env.MCP_SHELL_DEBUG) };
  }

  if (env.DEBUG_LEVEL && isDebugLevel(env.DEBUG_LEVEL)) {
    config = { ...config, level: env.DEBUG_LEVEL };
  }

  if (env.DEBUG_OUTPUT) {
    config = { ...config, output: { target: env.DEBUG_OUTPUT } };
  }

  return config;
}

function mergeSettings(
  base: DebugSettings,
  override: PartialDebugSettings,
): DebugSettings {
  return {
    enabled: override.enabled ?? base.enabled,
    namespaces: override.namespaces ?? base.namespaces,
    level: override.level ?? base.level,
    output: {
      target: override.output?.target ?? base.output.target,
      directory: override.output?.directory ?? base.output.directory,
    },
    redactPatterns: override.redactPatterns ?? base.redactPatterns,
  };
}

/**
 * Effective debug configuration: defaults, then the settings file, then
 * the environment, then command line flags. Loggers subscribe to be told
 * when it changes.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private userConfig: PartialDebugSettings = {};
  private readonly envConfig: PartialDebugSettings;
  private cliConfig: PartialDebugSettings = {};
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: {
        target: 'file',
        directory: path.join(getUserShellDir(), 'debug'),
      },
      redactPatterns: ['apiKey', 'token', 'password'],
    };
    this.envConfig = readEnvironmentConfig(env);
    this.mergedConfig = this.merge();
  }

  /** The `debug` block of the user settings file. */
  setUserConfig(config: PartialDebugSettings): void {
    this.userConfig = config;
    this.update();
  }

  setCliConfig(config: PartialDebugSettings): void {
    this.cliConfig = config;
    this.update();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    return this.mergedConfig.output.target;
  }

  getOutputDirectory(): string {
    return (
      this.mergedConfig.output.directory ?? path.join(getUserShellDir(), 'debug')
    );
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private merge(): DebugSettings {
    return [this.userConfig, this.envConfig, this.cliConfig].reduce(
      mergeSettings,
      this.defaultConfig,
    );
  }

  private update(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }
}
