/**
 * Schema validation utilities using Zod
 */

import { z, ZodError, type ZodType, type ZodTypeDef } from 'zod';

/**
 * Result of schema validation
 */
export interface ValidationResult<T> {
  /** Whether validation passed */
  success: boolean;
  /** Validated data (if success) */
  data?: T;
  /** Validation errors (if failure) */
  errors?: ValidationError[];
}

/**
 * Individual validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Error message */
  message: string;
  /** Error code */
  code: string;
}

/**
 * Flatten a ZodError into plain validation errors
 */
export function formatValidationErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path,
    message: e.message,
    code: e.code,
  }));
}

/**
 * Validate data against a Zod schema
 * @param schema - The Zod schema to validate against
 * @param data - The data to validate
 * @returns Validation result with data or errors
 */
export function validateSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatValidationErrors(result.error) };
}

/**
 * Render validation errors as "path: message" lines
 */
export function describeValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join('; ');
}

// Re-export Zod for convenience
export { z };

/**
 * Schema for a trimmed, non-empty string
 */
export const nonEmptyString = z.string().trim().min(1);
