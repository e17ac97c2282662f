import { z } from "zod";
import { ValidationError, type ErrorIssue } from "../errors.js";

export function toIssues(error: z.ZodError): ErrorIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parses untrusted input at the boundary. Failures surface as a
 * ValidationError listing every offending field.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}

export const IdParamSchema = z.coerce.number().int().positive();

export function parseId(value: unknown, name = "id"): number {
  const result = IdParamSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError([{ path: name, message: "must be a positive integer" }]);
  }
  return result.data;
}
