/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import AjvPkg from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormatsPkg from 'ajv-formats';
import { getErrorMessage } from '../utils/errors.js';

// Servers may use keywords ajv does not know; those are ignored.
const ajv = new AjvPkg.default({ strictSchema: false, allErrors: true });
addFormatsPkg.default(ajv);

const compiled = new WeakMap<SchemaObject, ValidateFunction>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatError(error: ErrorObject): string {
  return `arguments${error.instancePath} ${error.message ?? 'is invalid'}`;
}

/**
 * Checks tool arguments against the tool's JSON Schema. Returns one
 * message per problem; an empty list when the arguments conform or there
 * is no usable schema.
 */
export function validateArguments(schema: unknown, args: unknown): string[] {
  if (!isSchemaObject(schema)) {
    return [];
  }

  let validate = compiled.get(schema);
  if (!validate) {
    try {
      validate = ajv.compile(schema);
    } catch (error) {
      return [`schema could not be compiled: ${getErrorMessage(error)}`];
    }
    compiled.set(schema, validate);
  }

  if (validate(args)) {
    return [];
  }
  return (validate.errors ?? []).map(formatError);
}
