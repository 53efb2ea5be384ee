/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import {
  fieldValueSchema,
  filterSchema,
  type FieldValue,
  type Fields,
  type Filter,
} from "@microdm/odm";

const fieldsSchema = z.record(z.string(), fieldValueSchema);

/**
 * First zod issue as "path: message"
 */
function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid input";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse one attribute value given as JSON
 */
export function parseFieldValue(value: string, source: string): FieldValue {
  const parsed = fieldValueSchema.safeParse(parseJson(value, source));
  if (!parsed.success) {
    throw new InvalidArgumentError(`${source} is not a storable value: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Check that parsed JSON is a document body: an object of storable values
 */
export function toFields(value: unknown, source: string): Fields {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  const parsed = fieldsSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${source} is not a storable document: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Parse an equality filter: an object of scalars
 */
export function parseFilter(value: string, source = "--where"): Filter {
  const json = parseJson(value, source);
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  const parsed = filterSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${source} values must be scalars: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}
