/**
 * Error types for microdm operations
 *
 * Invariants:
 * - All errors name the collection (and document, where one is involved) in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all microdm errors
 */
export abstract class OdmError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the store cannot be reached, the configuration is invalid or
 * the credentials are rejected
 */
export class ConnectionError extends OdmError {
  readonly code = "E_CONNECTION";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Cannot connect to document store: ${reason}`, options);
  }
}

/**
 * Thrown when a connection is used after it was closed
 */
export class ConnectionClosedError extends OdmError {
  readonly code = "E_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Connection is closed", options);
  }
}

/**
 * Thrown when a document cannot be found
 */
export class DocumentNotFoundError extends OdmError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly collection: string,
    public readonly documentName: string,
    options?: ErrorOptions
  ) {
    super(`Document not found: ${collection}/${documentName}`, options);
  }
}

/**
 * Thrown when inserting a name that already exists in the collection
 */
export class DuplicateNameError extends OdmError {
  readonly code = "E_DUPLICATE_NAME";

  constructor(
    public readonly collection: string,
    public readonly documentName: string,
    options?: ErrorOptions
  ) {
    super(`Document name already exists: ${collection}/${documentName}`, options);
  }
}

/**
 * Thrown when stored data breaks the name invariant or cannot be mapped
 */
export class IntegrityError extends OdmError {
  readonly code = "E_INTEGRITY";

  constructor(collection: string, documentName: string, reason: string, options?: ErrorOptions) {
    super(`Integrity violation in ${collection}/${documentName}: ${reason}`, options);
  }
}

/**
 * Thrown when writing an immutable attribute that already holds a value
 */
export class ImmutableAttributeError extends OdmError {
  readonly code = "E_IMMUTABLE";

  constructor(
    public readonly collection: string,
    public readonly attribute: string,
    options?: ErrorOptions
  ) {
    super(`Attribute "${attribute}" of ${collection} is immutable`, options);
  }
}

/**
 * Thrown when an attribute is not part of the declared schema
 */
export class UnknownAttributeError extends OdmError {
  readonly code = "E_UNKNOWN_ATTRIBUTE";

  constructor(
    public readonly collection: string,
    public readonly attribute: string,
    options?: ErrorOptions
  ) {
    super(`Unknown attribute "${attribute}" for collection ${collection}`, options);
  }
}

/**
 * Thrown when a value violates the declared type or the allowed shapes
 */
export class InvalidValueError extends OdmError {
  readonly code = "E_INVALID_VALUE";

  constructor(
    public readonly collection: string,
    public readonly attribute: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid value for ${collection}.${attribute}: ${reason}`, options);
  }
}

/**
 * Thrown when a required attribute is absent at creation
 */
export class MissingAttributeError extends OdmError {
  readonly code = "E_MISSING_ATTRIBUTE";

  constructor(
    public readonly collection: string,
    public readonly attribute: string,
    options?: ErrorOptions
  ) {
    super(`Missing required attribute "${attribute}" for collection ${collection}`, options);
  }
}

/**
 * Thrown when a reference points to a document that no longer exists
 */
export class DanglingReferenceError extends OdmError {
  readonly code = "E_DANGLING_REFERENCE";

  constructor(
    public readonly collection: string,
    public readonly attribute: string,
    public readonly targetCollection: string,
    public readonly targetName: string,
    options?: ErrorOptions
  ) {
    super(
      `Reference ${collection}.${attribute} points to missing document ${targetCollection}/${targetName}`,
      options
    );
  }
}

/**
 * Thrown when writing through an object that was released from its registry
 */
export class DetachedObjectError extends OdmError {
  readonly code = "E_DETACHED";

  constructor(collection: string, documentName: string, options?: ErrorOptions) {
    super(`Object ${collection}/${documentName} was released from its registry`, options);
  }
}

/**
 * Thrown when a registry sees two different models for one collection
 */
export class ModelConflictError extends OdmError {
  readonly code = "E_MODEL_CONFLICT";

  constructor(collection: string, options?: ErrorOptions) {
    super(`Collection ${collection} is already bound to a different model`, options);
  }
}

/**
 * Thrown when a model definition is invalid
 */
export class SchemaDefinitionError extends OdmError {
  readonly code = "E_SCHEMA";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid model definition: ${reason}`, options);
  }
}

/**
 * Wraps any other driver failure
 */
export class StoreOperationError extends OdmError {
  readonly code = "E_STORE";

  constructor(
    public readonly operation: string,
    public readonly collection: string,
    options?: ErrorOptions
  ) {
    super(`Store operation "${operation}" failed on ${collection}`, options);
  }
}
