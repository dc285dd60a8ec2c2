/**
 * Zod validation helpers.
 */

import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T, I = unknown>(
  schema: ZodType<T, ZodTypeDef, I>,
  input: unknown,
): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: formatZodError(result.error),
  };
}

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}
