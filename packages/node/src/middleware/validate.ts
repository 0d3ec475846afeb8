/**
 * Zod request validation.
 *
 * Handlers call `readBody` / `readQuery` with a schema and get the parsed
 * (and transformed) value back. Failures throw RequestValidationError,
 * which the error handler renders as 400 VALIDATION_ERROR with the
 * offending paths.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  public readonly code = "VALIDATION_ERROR";
  public readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

export async function readBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", [
      { path: "", message: err instanceof Error ? err.message : String(err) },
    ]);
  }
  return parse(schema, body, "Request body validation failed");
}

export function readQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parse(schema, c.req.query(), "Invalid query parameters");
}

function parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
