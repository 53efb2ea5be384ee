/**
 * Persisted object: the in-memory handle of one document
 *
 * Reads are served from a cache filled at load time. Writes go to the store
 * first and reach the cache only once the store has acknowledged them, so a
 * failed write leaves the object as it was.
 */

import {
  DanglingReferenceError,
  DetachedObjectError,
  DocumentNotFoundError,
  ImmutableAttributeError,
  IntegrityError,
  InvalidValueError,
  UnknownAttributeError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { getAttribute } from "./schema/model.js";
import {
  DOCUMENT_HANDLE,
  hydrateFields,
  holdsInitialValue,
  toStoredValue,
  type AssignableValue,
  type DocumentHandle,
  type FieldInput,
} from "./schema/fields.js";
import type { Odm } from "./registry.js";
import type {
  AttributeSpec,
  FieldValue,
  Fields,
  Filter,
  Model,
  ReferenceAttribute,
  UnsetCondition,
} from "./types.js";

/**
 * Called by the registry when it lets go of an object
 * @internal
 */
export const DETACH = Symbol("microdm.detach");

export class PersistedObject implements DocumentHandle {
  readonly [DOCUMENT_HANDLE] = true as const;
  readonly model: Model;
  readonly name: string;
  #odm: Odm;
  #values: Map<string, FieldValue>;
  #attached = true;
  /** Immutable attributes with a write on its way to the store */
  #sealing = new Set<string>();

  /**
   * @internal Objects are created by the registry only
   */
  constructor(odm: Odm, model: Model, name: string, stored: Fields) {
    this.#odm = odm;
    this.model = model;
    this.name = name;
    this.#values = this.#hydrate(stored);
  }

  get collection(): string {
    return this.model.collection;
  }

  /**
   * False once the registry released this object
   */
  get attached(): boolean {
    return this.#attached;
  }

  /**
   * Current value of an attribute, as cached
   *
   * References return the stored target name; use `reference()` to resolve.
   *
   * @throws {UnknownAttributeError} If the attribute is not declared
   */
  get(attribute: string): FieldValue | undefined {
    this.#spec(attribute);
    const value = this.#values.get(attribute);
    return value === undefined ? undefined : structuredClone(value);
  }

  /**
   * Persist one attribute, then update the cache
   *
   * @throws {DetachedObjectError} If the object was released
   * @throws {UnknownAttributeError} If the attribute is not declared
   * @throws {ImmutableAttributeError} If the attribute is immutable and already set, or being set
   * @throws {InvalidValueError} If the value breaks the declared type or shape
   * @throws {DocumentNotFoundError} If the document was deleted from the store
   *
   * @example
   * ```typescript
   * await person.set("age", 30);
   * await person.set("city", paris);
   * ```
   */
  async set(attribute: string, value: AssignableValue): Promise<void> {
    this.#assertAttached();
    const spec = this.#writableSpec(attribute);
    const stored = toStoredValue(this.model, attribute, spec, value);
    await this.#persist({ [attribute]: stored });
  }

  /**
   * Persist several attributes in one atomic write
   *
   * Every change is validated before anything is sent to the store.
   */
  async setMany(changes: FieldInput): Promise<void> {
    this.#assertAttached();
    const stored: Fields = {};
    for (const [attribute, value] of Object.entries(changes)) {
      const spec = this.#writableSpec(attribute);
      if (value === undefined) {
        throw new InvalidValueError(this.collection, attribute, "value cannot be undefined");
      }
      stored[attribute] = toStoredValue(this.model, attribute, spec, value);
    }

    if (Object.keys(stored).length === 0) {
      return;
    }
    await this.#persist(stored);
  }

  /**
   * Resolve a reference attribute through the owning registry
   *
   * A read: released objects still resolve from their cached target name.
   *
   * @returns The referenced object, or null for an unset optional reference
   * @throws {DanglingReferenceError} If the referenced document is missing
   */
  async reference(attribute: string): Promise<PersistedObject | null> {
    const spec = this.#referenceSpec(attribute);
    const target = spec.target();
    const targetName = this.#values.get(attribute);

    if (targetName === undefined || targetName === null) {
      return null;
    }
    if (typeof targetName !== "string") {
      throw new IntegrityError(this.collection, this.name, `reference "${attribute}" is not a name`);
    }

    try {
      return await this.#odm.find(target, targetName);
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        throw new DanglingReferenceError(
          this.collection,
          attribute,
          target.collection,
          targetName,
          { cause: err }
        );
      }
      throw err;
    }
  }

  /**
   * Re-read the document from the store, replacing the cache
   * @throws {DocumentNotFoundError} If the document was deleted
   */
  async reload(): Promise<void> {
    this.#assertAttached();
    const stored = await this.#odm.connection.load(this.collection, this.name);
    this.#values = this.#hydrate(stored);
  }

  /**
   * Delete the document from the store and release this object
   */
  async delete(): Promise<void> {
    this.#assertAttached();
    await this.#odm.delete(this.model, this.name);
  }

  /**
   * Find another document of the same model
   */
  async findOne(name: string): Promise<PersistedObject> {
    return this.#odm.find(this.model, name);
  }

  /**
   * Iterate documents of the same model matching a filter
   */
  findAll(filter: Filter = {}): AsyncGenerator<PersistedObject> {
    return this.#odm.findAll(this.model, filter);
  }

  /**
   * Create a document of the same model
   */
  async newLike(fields: FieldInput, name?: string): Promise<PersistedObject> {
    return this.#odm.create(this.model, fields, name);
  }

  /**
   * Stored shape of the document
   */
  toJSON(): Fields {
    const doc: Fields = { _name_: this.name };
    for (const [attribute, value] of this.#values) {
      doc[attribute] = structuredClone(value);
    }
    return doc;
  }

  [DETACH](): void {
    this.#attached = false;
  }

  #hydrate(stored: Fields): Map<string, FieldValue> {
    const { values, undeclared } = hydrateFields(this.model, stored);
    if (undeclared.length > 0) {
      logger.warn("object.undeclared_fields", {
        collection: this.collection,
        name: this.name,
        message: "dropping stored fields the model does not declare",
        details: { fields: undeclared },
      });
    }
    return values;
  }

  async #persist(changes: Fields): Promise<void> {
    const conditions: UnsetCondition[] = [];
    for (const attribute of Object.keys(changes)) {
      const spec = this.#spec(attribute);
      if (!spec.mutable) {
        conditions.push({
          attribute,
          initial: spec.kind === "value" ? spec.default : undefined,
        });
      }
    }

    const sealing = conditions.map(({ attribute }) => attribute);
    for (const attribute of sealing) {
      this.#sealing.add(attribute);
    }
    try {
      await this.#odm.connection.update(this.collection, this.name, changes, conditions);
    } catch (err) {
      logger.warn("object.write_failed", {
        collection: this.collection,
        name: this.name,
        message: err instanceof Error ? err.message : String(err),
        details: { fields: Object.keys(changes) },
      });
      throw err;
    } finally {
      for (const attribute of sealing) {
        this.#sealing.delete(attribute);
      }
    }

    for (const [attribute, value] of Object.entries(changes)) {
      this.#values.set(attribute, value);
    }
    logger.debug("object.write", {
      collection: this.collection,
      name: this.name,
      details: { fields: Object.keys(changes) },
    });
  }

  #spec(attribute: string): AttributeSpec {
    const spec = getAttribute(this.model, attribute);
    if (!spec) {
      throw new UnknownAttributeError(this.collection, attribute);
    }
    return spec;
  }

  #writableSpec(attribute: string): AttributeSpec {
    const spec = this.#spec(attribute);
    if (
      !spec.mutable &&
      (this.#sealing.has(attribute) || !holdsInitialValue(spec, this.#values.get(attribute)))
    ) {
      throw new ImmutableAttributeError(this.collection, attribute);
    }
    return spec;
  }

  #referenceSpec(attribute: string): ReferenceAttribute {
    const spec = this.#spec(attribute);
    if (spec.kind !== "reference") {
      throw new InvalidValueError(this.collection, attribute, "attribute is not a reference");
    }
    return spec;
  }

  #assertAttached(): void {
    if (!this.#attached) {
      throw new DetachedObjectError(this.collection, this.name);
    }
  }
}
