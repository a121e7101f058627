/**
 * Zod validation middleware.
 *
 * Validates the JSON body or the query string against a Zod schema.
 * Handlers read the parsed value with `c.req.valid("json")` or
 * `c.req.valid("query")`; a failure returns 400 with the issues.
 */

import { validator } from "hono/validator";
import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function rejectWith(c: Context<AppEnv>, message: string, error: ZodError): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", message, {
      issues: formatZodErrors(error),
    }),
    400,
  );
}

/**
 * Validate the JSON request body.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validator("json", (value, c: Context<AppEnv>) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return rejectWith(c, "Request body validation failed", result.error);
    }
    return result.data;
  });
}

/**
 * Validate query parameters.
 */
export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validator("query", (value, c: Context<AppEnv>) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return rejectWith(c, "Invalid query parameters", result.error);
    }
    return result.data;
  });
}
