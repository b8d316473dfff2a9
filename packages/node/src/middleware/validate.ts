/**
 * Zod request validation.
 *
 * Handlers call these helpers directly so the parsed value keeps its
 * schema type. Failures throw ApiError("VALIDATION_ERROR"), rendered as
 * 400 by the error handler.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

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

function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  what: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, `Request ${what} validation failed`, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export async function parseJsonBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }
  return parseWith(schema, body, "body");
}

export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.query(), "query");
}
