/**
 * Model (schema descriptor) definition
 *
 * A model binds a collection to a fixed attribute table. Each attribute
 * carries a type tag and a mutability flag; references store the target
 * document's name and are resolved lazily through a registry.
 *
 * @example
 * ```typescript
 * const City = defineModel({
 *   collection: "cities",
 *   attributes: {
 *     name: field("string"),
 *     population: field("integer", { mutable: true }),
 *     ancient: field("boolean", { default: false }),
 *   },
 * });
 *
 * const Person = defineModel({
 *   collection: "people",
 *   attributes: {
 *     name: field("string"),
 *     age: field("integer", { mutable: true }),
 *     city: ref(() => City, { mutable: true, optional: true }),
 *   },
 * });
 * ```
 */

import { randomUUID } from "node:crypto";
import { SchemaDefinitionError } from "../errors.js";
import type {
  AttributeSpec,
  FieldValue,
  Model,
  ModelDefinition,
  ReferenceAttribute,
  TypeTag,
  ValueAttribute,
} from "../types.js";
import { validateAttributeName, validateCollectionName } from "../validation.js";
import { checkValue, isTypeTag } from "./values.js";

export interface ValueAttributeOptions {
  mutable?: boolean;
  optional?: boolean;
  default?: FieldValue;
}

export interface ReferenceAttributeOptions {
  mutable?: boolean;
  optional?: boolean;
}

/**
 * Declare a value attribute
 *
 * Attributes are immutable and required unless told otherwise. A default
 * makes the attribute optional at creation.
 */
export function field(type: TypeTag = "any", options: ValueAttributeOptions = {}): ValueAttribute {
  const spec: ValueAttribute = {
    kind: "value",
    type,
    mutable: options.mutable ?? false,
    optional: options.optional ?? false,
  };
  return options.default === undefined ? spec : { ...spec, default: options.default };
}

/**
 * Declare a reference to a document of another model
 */
export function ref(target: () => Model, options: ReferenceAttributeOptions = {}): ReferenceAttribute {
  return {
    kind: "reference",
    target,
    mutable: options.mutable ?? false,
    optional: options.optional ?? false,
  };
}

/**
 * Check one attribute spec
 */
function validateAttribute(collection: string, name: string, spec: AttributeSpec): void {
  validateAttributeName(collection, name);

  if (spec.kind === "reference") {
    if (typeof spec.target !== "function") {
      throw new SchemaDefinitionError(`reference "${name}" of ${collection} needs a target thunk`);
    }
    return;
  }

  if (!isTypeTag(spec.type)) {
    throw new SchemaDefinitionError(`attribute "${name}" of ${collection} has unknown type "${String(spec.type)}"`);
  }

  if (spec.default !== undefined) {
    const checked = checkValue(spec.default, spec.type, spec.optional);
    if (!checked.ok) {
      throw new SchemaDefinitionError(
        `default of "${name}" in ${collection} is ${checked.reason}`
      );
    }
  }
}

/**
 * Define a model
 * @throws {SchemaDefinitionError} If the collection, an attribute name or a default is invalid
 */
export function defineModel(definition: ModelDefinition): Model {
  validateCollectionName(definition.collection);

  const attributes: Record<string, AttributeSpec> = {};
  for (const [name, spec] of Object.entries(definition.attributes)) {
    validateAttribute(definition.collection, name, spec);
    attributes[name] = Object.freeze({ ...spec });
  }

  const generate = definition.generateName ?? randomUUID;

  return Object.freeze({
    collection: definition.collection,
    attributes: Object.freeze(attributes),
    generateName: () => generate(),
  });
}

/**
 * Attribute spec lookup that distinguishes absence from inherited keys
 */
export function getAttribute(model: Model, name: string): AttributeSpec | undefined {
  return Object.hasOwn(model.attributes, name) ? model.attributes[name] : undefined;
}

/**
 * True when an attribute may be omitted at creation
 */
export function hasFallback(spec: AttributeSpec): boolean {
  return spec.optional || (spec.kind === "value" && spec.default !== undefined);
}
