/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SchemaLookup } from '../completion/types.js';
import { decodeArgumentSchema, type ArgumentSchema } from './argumentSchema.js';

interface CachedSchema {
  /** The JSON Schema as the server sent it, used for validation. */
  readonly raw: unknown;
  readonly schema: ArgumentSchema;
}

/**
 * Argument schemas of the connected server's tools. Readers always see a
 * complete snapshot: {@link replace} builds a new map and swaps it in.
 */
export class SchemaCache {
  private entries: ReadonlyMap<string, CachedSchema> = new Map();

  static keyFor(name: string): string {
    return `${name}:args`;
  }

  /** Bound lookup for a completion snapshot. */
  readonly lookup: SchemaLookup = (name) => this.get(name);

  get(name: string): ArgumentSchema | undefined {
    return this.entries.get(SchemaCache.keyFor(name))?.schema;
  }

  raw(name: string): unknown {
    return this.entries.get(SchemaCache.keyFor(name))?.raw;
  }

  has(name: string): boolean {
    return this.entries.has(SchemaCache.keyFor(name));
  }

  get size(): number {
    return this.entries.size;
  }

  replace(rawSchemas: Iterable<readonly [string, unknown]>): void {
    const next = new Map<string, CachedSchema>();
    for (const [name, raw] of rawSchemas) {
      next.set(SchemaCache.keyFor(name), {
        raw,
        schema: decodeArgumentSchema(raw),
      });
    }
    this.entries = next;
  }

  clear(): void {
    this.entries = new Map();
  }
}
