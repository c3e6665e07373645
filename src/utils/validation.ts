/**
 * Runtime Validation Helpers
 *
 * Thin wrappers over zod used by the config loader, the catalog store and
 * the API client.
 *
 * @module
 */

import { z } from "zod";

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown
): ValidationResult<Output> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
