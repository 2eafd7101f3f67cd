/**
 * Zod validation helpers.
 *
 * Query strings are parsed with a schema; a failure throws ZodError,
 * which the error handler turns into a 400 VALIDATION_ERROR envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Parse the request's query parameters against a Zod schema.
 *
 * @throws {ZodError} when the query does not match
 */
export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return schema.parse(c.req.query());
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
