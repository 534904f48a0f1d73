/**
 * Config Schema Validator
 *
 * Validates batch configuration data against JSON Schema using Ajv.
 * Schema defaults are written into the validated object.
 */

import Ajv, { type ErrorObject } from 'ajv';
import configSchema from './config.schema.json';
import type { BatchConfigFile } from './config.types';

const ajv = new Ajv({
  allErrors: true,      // Return all errors, not just the first one
  coerceTypes: true,    // "60" -> 60 for hand-edited YAML
  removeAdditional: false,
  useDefaults: true,
  strict: false
});

const validateConfigFile = ajv.compile<BatchConfigFile>(configSchema);

export type ValidationResult =
  | { valid: true; config: BatchConfigFile }
  | { valid: false; errors: ErrorObject[]; errorMessage: string };

/**
 * Validate a parsed batch configuration file.
 * The input is mutated in place with schema defaults.
 */
export function validateBatchConfig(data: unknown): ValidationResult {
  if (validateConfigFile(data)) {
    return { valid: true, config: data };
  }

  const errors = validateConfigFile.errors ?? [];
  return {
    valid: false,
    errors,
    errorMessage: formatErrors(errors)
  };
}

/**
 * Format validation errors into human-readable message
 */
export function formatErrors(errors: ErrorObject[]): string {
  if (errors.length === 0) return 'Validation failed';

  const messages = errors.map(err => {
    const path = err.instancePath || 'root';
    const message = err.message || 'validation error';

    if (err.keyword === 'required' && 'missingProperty' in err.params) {
      return `Missing required property: ${String(err.params.missingProperty)}`;
    }

    if (err.keyword === 'additionalProperties' && 'additionalProperty' in err.params) {
      return `${path}: unknown property ${String(err.params.additionalProperty)}`;
    }

    if (err.keyword === 'type' && 'type' in err.params) {
      return `${path}: ${message} (expected ${String(err.params.type)})`;
    }

    if (err.keyword === 'enum' && 'allowedValues' in err.params && Array.isArray(err.params.allowedValues)) {
      return `${path}: must be one of [${err.params.allowedValues.join(', ')}]`;
    }

    return `${path}: ${message}`;
  });

  return messages.join('; ');
}
