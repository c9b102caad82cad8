/**
 * Zod request validation.
 *
 * Handlers parse their body, params and query through these helpers.
 * A failure throws RequestValidationError, which the error handler
 * turns into a 400 VALIDATION_ERROR envelope listing the issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[], options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

/**
 * Parse any input against a schema, throwing RequestValidationError
 * with `message` when it does not match.
 */
export function parseInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  message: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Read and validate the JSON request body.
 */
export async function readBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", [], { cause: err });
  }
  return parseInput(schema, body, "Request body validation failed");
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
