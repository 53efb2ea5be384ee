/**
 * Core types for microdm
 */

/**
 * A stored scalar
 */
export type Scalar = string | number | boolean | null;

/**
 * Flat dictionary: values are scalars or lists of scalars, never nested objects
 */
export interface Dict {
  [key: string]: Scalar | Scalar[];
}

/**
 * Any value an attribute may hold in the store
 */
export type FieldValue = Scalar | Scalar[] | Dict;

/**
 * Attribute name to stored value
 */
export type Fields = Record<string, FieldValue>;

/**
 * Equality filter over scalar attributes
 *
 * A scalar filter value also matches list attributes that contain it.
 */
export type Filter = Record<string, Scalar>;

/**
 * Type tag of a value attribute
 */
export type TypeTag = "any" | "string" | "number" | "integer" | "boolean" | "list" | "dict";

/**
 * Attribute holding a plain value
 */
export interface ValueAttribute {
  readonly kind: "value";
  readonly type: TypeTag;
  /** Writable after creation */
  readonly mutable: boolean;
  /** May be absent at creation */
  readonly optional: boolean;
  /** Filled in at creation when the caller gives no value */
  readonly default?: FieldValue;
}

/**
 * Attribute holding the name of a document in another model's collection
 */
export interface ReferenceAttribute {
  readonly kind: "reference";
  /** Thunk so that models may reference each other in cycles */
  readonly target: () => Model;
  readonly mutable: boolean;
  readonly optional: boolean;
}

export type AttributeSpec = ValueAttribute | ReferenceAttribute;

export type AttributeMap = Readonly<Record<string, AttributeSpec>>;

/**
 * Input accepted by `defineModel`
 */
export interface ModelDefinition {
  /** Collection where documents of this model are stored */
  collection: string;
  /** Declared attributes */
  attributes: Record<string, AttributeSpec>;
  /** Name generator for new documents (default: random UUID) */
  generateName?: () => string;
}

/**
 * Per-collection schema descriptor
 */
export interface Model {
  readonly collection: string;
  readonly attributes: AttributeMap;
  generateName(): string;
}

/**
 * A document as the driver sees it
 */
export interface StoredRecord {
  name: string;
  fields: Fields;
}

/**
 * Precondition of an update: the attribute is absent or still holds `initial`
 */
export interface UnsetCondition {
  attribute: string;
  initial?: FieldValue;
}

/**
 * What a driver update did: wrote, found no record, or found a condition broken
 */
export type UpdateOutcome = "updated" | "missing" | "conflict";

/**
 * Backend contract used by the connection manager
 *
 * Drivers map a duplicate `_name_` on insert to `DuplicateNameError` and
 * report use after `close()` as `ConnectionClosedError`. Every other
 * failure may be thrown as is; the connection wraps it.
 */
export interface StoreDriver {
  /** Short label for logs ("mongodb", "memory") */
  readonly kind: string;

  /**
   * Open the underlying connection and check that the store answers
   * @throws {ConnectionError} If the store is unreachable or rejects the credentials
   */
  connect(): Promise<void>;

  /**
   * Create the unique `_name_` index for a collection if missing
   */
  ensureNameIndex(collection: string): Promise<void>;

  /**
   * Return the records stored under a name (normally zero or one; at most two)
   */
  findByName(collection: string, name: string): Promise<StoredRecord[]>;

  /**
   * Return all records matching an equality filter
   */
  find(collection: string, filter: Filter): Promise<StoredRecord[]>;

  /**
   * Insert a new record
   * @throws {DuplicateNameError} If the name already exists
   */
  insert(collection: string, record: StoredRecord): Promise<void>;

  /**
   * Set fields on a record, provided every condition holds in the store
   */
  update(
    collection: string,
    name: string,
    changes: Fields,
    conditions?: readonly UnsetCondition[]
  ): Promise<UpdateOutcome>;

  /**
   * Delete a record
   * @returns false when no record matched the name
   */
  remove(collection: string, name: string): Promise<boolean>;

  /**
   * Release the underlying connection
   */
  close(): Promise<void>;
}
