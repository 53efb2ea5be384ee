/**
 * Validation utilities for names used as collection, attribute and document keys
 */

import { InvalidValueError, SchemaDefinitionError } from "./errors.js";
import type { Filter } from "./types.js";
import { scalarSchema } from "./schema/values.js";

/**
 * Keys the store owns; attributes may not shadow them
 */
export const RESERVED_ATTRIBUTES = new Set(["_id", "_name_"]);

/**
 * Validate a MongoDB collection name
 * @throws {SchemaDefinitionError} If invalid
 */
export function validateCollectionName(value: string): void {
  if (!value || typeof value !== "string") {
    throw new SchemaDefinitionError("collection must be a non-empty string");
  }

  if (value.includes("$") || value.includes("\0")) {
    throw new SchemaDefinitionError(`collection cannot contain "$" or NUL: "${value}"`);
  }

  if (value.startsWith("system.")) {
    throw new SchemaDefinitionError(`collection cannot start with "system.": "${value}"`);
  }
}

/**
 * Validate an attribute name
 * @throws {SchemaDefinitionError} If invalid
 */
export function validateAttributeName(collection: string, value: string): void {
  if (!value) {
    throw new SchemaDefinitionError(`attribute names of ${collection} must be non-empty`);
  }

  if (value.startsWith("$") || value.includes(".")) {
    throw new SchemaDefinitionError(
      `attribute "${value}" of ${collection} cannot start with "$" or contain "."`
    );
  }

  if (RESERVED_ATTRIBUTES.has(value)) {
    throw new SchemaDefinitionError(`attribute "${value}" of ${collection} is reserved`);
  }
}

/**
 * Validate a document name
 * @throws {InvalidValueError} If invalid
 */
export function validateDocumentName(collection: string, value: unknown): asserts value is string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidValueError(collection, "_name_", "name must be a non-empty string");
  }

  if (value.includes("\0")) {
    throw new InvalidValueError(collection, "_name_", "name cannot contain NUL");
  }
}

/**
 * Validate an equality filter against declared attributes
 * @throws {InvalidValueError} If a filter value is not a scalar
 * @returns Names of filter keys that are not declared
 */
export function undeclaredFilterKeys(
  collection: string,
  declared: ReadonlySet<string>,
  filter: Filter
): string[] {
  const unknown: string[] = [];

  for (const [key, value] of Object.entries(filter)) {
    if (!declared.has(key)) {
      unknown.push(key);
      continue;
    }
    if (!scalarSchema.safeParse(value).success) {
      throw new InvalidValueError(collection, key, "filter values must be scalars");
    }
  }

  return unknown;
}
