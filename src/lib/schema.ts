/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

/**
 * Schema for precompile.config.json.
 */
export const CONFIG_SCHEMA = {
  $id: 'precompile.config',
  type: 'object',
  additionalProperties: false,
  required: ['version', 'maven', 'include_plugins', 'multi_parent'],
  properties: {
    version: { type: 'string' },
    maven: {
      type: 'object',
      additionalProperties: false,
      required: ['command', 'args'],
      properties: {
        command: { type: 'string', minLength: 1 },
        settings: { type: ['string', 'null'] },
        args: { type: 'array', items: { type: 'string' } },
      },
    },
    local_checkout_dir: { type: ['string', 'null'] },
    include_plugins: { type: 'array', items: { type: 'string' } },
    multi_parent: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['parent_folder', 'plugins'],
        properties: {
          parent_folder: { type: 'string', minLength: 1 },
          plugins: { type: 'array', items: { type: 'string', minLength: 1 } },
        },
      },
    },
    exclude_hooks: { type: 'array', items: { type: 'string' } },
  },
} as const;

// Cache for compiled schemas
const schemaCache = new Map<string, ValidateFunction>();

/**
 * Validates data against a JSON schema using Ajv.
 *
 * Compiled schemas are cached by `$id` (or by their JSON text).
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean; allowUnionTypes?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };

  const schemaId = ('$id' in schema && typeof schema.$id === 'string') ? schema.$id : JSON.stringify(schema);
  let validate = schemaCache.get(schemaId);
  if (!validate) {
    const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
    validate = ajv.compile(schema);
    schemaCache.set(schemaId, validate);
  }

  if (validate(data)) {
    return {
      valid: true,
      data: data as T,
      errors: [],
    };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    errors.push(`${path ? `${path}: ` : ''}${message}`);
  }

  return {
    valid: false,
    data: null,
    errors,
  };
}
