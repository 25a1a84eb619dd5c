/**
 * Environment Parsing Utilities
 *
 * Helpers for turning string environment maps into validated, typed
 * configuration objects.
 */

import type { z } from 'zod';

/**
 * Environment variables as handed over by the host (e.g. `process.env`)
 */
export type EnvMap = Record<string, string | undefined>;

/**
 * Parse boolean from string (for environment variables)
 *
 * `true` (any case) and `1` are true; anything else is false.
 * Undefined and empty values fall back to the default.
 */
export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: string;

  /** Error message */
  message: string;

  /** Zod error code */
  code: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Validate a raw configuration object against a Zod schema
 *
 * @example
 * ```typescript
 * const result = validateConfig(schema, { cachePolicy: 'lock' });
 * if (!result.success) {
 *   console.error(result.errors);
 * }
 * ```
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  config: unknown
): ValidationResult<T> {
  const result = schema.safeParse(config);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    errors: result.error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
      code: e.code,
    })),
  };
}

/**
 * Format validation errors as a single line (`path: message; ...`)
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
}
