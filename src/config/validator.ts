/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { LabforgeConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: LabforgeConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

const validate = ajv.compile<LabforgeConfig>(configSchema);

/**
 * Validate configuration data against the JSON Schema.
 *
 * An empty document (null) is a valid, empty configuration.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  const candidate = data ?? {};

  if (!validate(candidate)) {
    const errors: ValidationError[] = (validate.errors ?? []).map(
      (error: ErrorObject) => ({
        path: describePath(error),
        message: error.message ?? 'Unknown validation error',
        params: error.params,
      })
    );

    return { valid: false, errors };
  }

  return { valid: true, config: candidate };
}

/**
 * Point additionalProperties errors at the offending key.
 */
function describePath(error: ErrorObject): string {
  const base = error.instancePath || '/';
  const extra: unknown = error.params.additionalProperty;
  if (error.keyword === 'additionalProperties' && typeof extra === 'string') {
    return base === '/' ? `/${extra}` : `${base}/${extra}`;
  }
  return base;
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
