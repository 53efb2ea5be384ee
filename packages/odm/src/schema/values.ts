/**
 * Zod schemas for the value shapes an attribute may hold
 */

import { z } from "zod";
import type { FieldValue, TypeTag } from "../types.js";

export const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const listSchema = z.array(scalarSchema);

const dictKeySchema = z
  .string()
  .min(1, "dictionary keys must be non-empty")
  .refine((key) => !key.startsWith("$") && !key.includes("."), {
    message: 'dictionary keys cannot start with "$" or contain "."',
  });

export const dictSchema = z.record(dictKeySchema, z.union([scalarSchema, listSchema]));

export const fieldValueSchema = z.union([scalarSchema, listSchema, dictSchema]);

export const storedFieldsSchema = z.record(z.string(), fieldValueSchema);

/**
 * Equality filter: attribute name to scalar
 */
export const filterSchema = z.record(z.string(), scalarSchema);

const TYPE_SCHEMAS: Record<TypeTag, z.ZodType<FieldValue>> = {
  any: fieldValueSchema,
  string: z.string(),
  number: z.number().finite(),
  integer: z.number().int(),
  boolean: z.boolean(),
  list: listSchema,
  dict: dictSchema,
};

export const TYPE_TAGS: readonly string[] = Object.keys(TYPE_SCHEMAS);

/**
 * Type guard for type tags read from untyped sources
 */
export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === "string" && Object.hasOwn(TYPE_SCHEMAS, value);
}

/**
 * Check a value against a type tag
 *
 * @param value - Candidate value (unknown input)
 * @param type - Declared type tag
 * @param nullable - Accept `null` (optional attributes)
 * @returns The value typed as stored, or the first problem found
 */
export function checkValue(
  value: unknown,
  type: TypeTag,
  nullable: boolean
): { ok: true; value: FieldValue } | { ok: false; reason: string } {
  if (value === null && nullable) {
    return { ok: true, value: null };
  }

  const result = TYPE_SCHEMAS[type].safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const issue = result.error.issues[0];
  if (!issue) {
    return { ok: false, reason: `not a valid ${type}` };
  }
  const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return { ok: false, reason: `not a valid ${type} (${issue.message}${where})` };
}
