import { ValidateError, type FieldErrors } from "@tsoa/runtime";
import type { z } from "zod";

export type RequestLocation = "query" | "body";

/**
 * Parse a request part with a zod schema. Failures are raised as tsoa's
 * ValidateError so the error handler reports them like generated routes do.
 */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  location: RequestLocation,
): T {
  const result = schema.safeParse(input ?? {});
  if (result.success) return result.data;

  const fields: FieldErrors = {};
  for (const issue of result.error.issues) {
    const key = [location, ...issue.path].join(".");
    fields[key] ??= { message: issue.message };
  }
  throw new ValidateError(fields, "Validation failed");
}
