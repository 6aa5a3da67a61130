import { NotFoundError, ValidationError } from "@mediasift/utils";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

function issueDetails(error: ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join(".");
    if (!details[path]) details[path] = [];
    details[path].push(issue.message);
  }
  return details;
}

export function validateQuery<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const searchParams = new URL(url).searchParams;
  const obj = Object.fromEntries(searchParams.entries());
  const result = schema.safeParse(obj);
  if (!result.success) {
    throw new ValidationError("Invalid query parameters", issueDetails(result.error));
  }
  return result.data;
}

/** Path parameters that fail their schema cannot name an existing resource. */
export function validateParam<T>(
  value: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  notFoundMessage: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new NotFoundError(notFoundMessage);
  }
  return result.data;
}
