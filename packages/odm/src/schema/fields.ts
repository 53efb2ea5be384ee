/**
 * Conversion between caller input, cached values and stored fields
 */

import { isDeepStrictEqual } from "node:util";
import { InvalidValueError, MissingAttributeError, UnknownAttributeError } from "../errors.js";
import type { AttributeSpec, FieldValue, Fields, Model } from "../types.js";
import { getAttribute } from "./model.js";
import { checkValue } from "./values.js";

/**
 * Brand carried by persisted objects so they can be assigned to references
 */
export const DOCUMENT_HANDLE = Symbol("microdm.document");

export interface DocumentHandle {
  readonly [DOCUMENT_HANDLE]: true;
  readonly collection: string;
  readonly name: string;
}

/**
 * A value as accepted by setters: references also take a document
 */
export type AssignableValue = FieldValue | DocumentHandle;

/**
 * Attribute values given at creation
 */
export type FieldInput = Record<string, AssignableValue | undefined>;

export function isDocumentHandle(value: unknown): value is DocumentHandle {
  return typeof value === "object" && value !== null && DOCUMENT_HANDLE in value;
}

/**
 * Convert an input value to its stored form
 * @throws {InvalidValueError} If the value breaks the attribute's type or shape
 */
export function toStoredValue(
  model: Model,
  attribute: string,
  spec: AttributeSpec,
  value: unknown
): FieldValue {
  const collection = model.collection;

  if (spec.kind === "reference") {
    if (value === null && spec.optional) {
      return null;
    }

    const target = spec.target();
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
    if (isDocumentHandle(value)) {
      if (value.collection !== target.collection) {
        throw new InvalidValueError(
          collection,
          attribute,
          `expected a document of ${target.collection}, got one of ${value.collection}`
        );
      }
      return value.name;
    }
    throw new InvalidValueError(
      collection,
      attribute,
      `expected a name or a document of ${target.collection}`
    );
  }

  if (isDocumentHandle(value)) {
    throw new InvalidValueError(
      collection,
      attribute,
      "documents can only be assigned to reference attributes"
    );
  }

  const checked = checkValue(value, spec.type, spec.optional);
  if (!checked.ok) {
    throw new InvalidValueError(collection, attribute, checked.reason);
  }
  return checked.value;
}

/**
 * Build the stored fields of a new document
 *
 * Every declared attribute is either given, defaulted, or optional and
 * left out.
 *
 * @throws {UnknownAttributeError} If the input names an undeclared attribute
 * @throws {MissingAttributeError} If a required attribute is absent
 * @throws {InvalidValueError} If a value breaks its attribute's type or shape
 */
export function buildFields(model: Model, input: FieldInput): Fields {
  for (const key of Object.keys(input)) {
    if (!getAttribute(model, key)) {
      throw new UnknownAttributeError(model.collection, key);
    }
  }

  const fields: Fields = {};
  for (const [attribute, spec] of Object.entries(model.attributes)) {
    const given = Object.hasOwn(input, attribute) ? input[attribute] : undefined;

    if (given !== undefined) {
      fields[attribute] = toStoredValue(model, attribute, spec, given);
    } else if (spec.kind === "value" && spec.default !== undefined) {
      fields[attribute] = structuredClone(spec.default);
    } else if (!spec.optional) {
      throw new MissingAttributeError(model.collection, attribute);
    }
  }
  return fields;
}

/**
 * Map stored fields onto the declared attributes
 *
 * Missing attributes fall back to their default. Stored keys the model
 * does not declare are reported and dropped.
 */
export function hydrateFields(
  model: Model,
  stored: Fields
): { values: Map<string, FieldValue>; undeclared: string[] } {
  const values = new Map<string, FieldValue>();

  for (const [attribute, spec] of Object.entries(model.attributes)) {
    const value = Object.hasOwn(stored, attribute) ? stored[attribute] : undefined;
    if (value !== undefined) {
      values.set(attribute, value);
    } else if (spec.kind === "value" && spec.default !== undefined) {
      values.set(attribute, structuredClone(spec.default));
    }
  }

  const undeclared = Object.keys(stored).filter((key) => !getAttribute(model, key));
  return { values, undeclared };
}

/**
 * True when an attribute still holds no value or its declared default
 */
export function holdsInitialValue(spec: AttributeSpec, current: FieldValue | undefined): boolean {
  if (current === undefined) {
    return true;
  }
  return spec.kind === "value" && spec.default !== undefined && isDeepStrictEqual(current, spec.default);
}
