/**
 * microdm
 *
 * A micro object-document mapper for MongoDB: immediate writes, one object
 * per document, name-keyed documents and lazily resolved references.
 */

// Re-export types
export type {
  Scalar,
  Dict,
  FieldValue,
  Fields,
  Filter,
  TypeTag,
  ValueAttribute,
  ReferenceAttribute,
  AttributeSpec,
  AttributeMap,
  ModelDefinition,
  Model,
  StoredRecord,
  StoreDriver,
  UnsetCondition,
  UpdateOutcome,
} from "./types.js";

// Schema
export { defineModel, field, ref, getAttribute } from "./schema/model.js";
export type { ValueAttributeOptions, ReferenceAttributeOptions } from "./schema/model.js";
export {
  isTypeTag,
  checkValue,
  TYPE_TAGS,
  scalarSchema,
  fieldValueSchema,
  filterSchema,
} from "./schema/values.js";
export { isDocumentHandle } from "./schema/fields.js";
export type { AssignableValue, DocumentHandle, FieldInput } from "./schema/fields.js";

// Connection, registry and objects
export {
  Connection,
  withConnection,
  connectionConfigSchema,
  resolveConnectionConfig,
  databaseFromUri,
} from "./connection.js";
export type { ConnectionConfig, ResolvedConnectionConfig, OpenOptions } from "./connection.js";
export { Odm, withOdm } from "./registry.js";
export type { RegistryStats } from "./registry.js";
export type { PersistedObject } from "./object.js";

// Drivers
export {
  MongoDriver,
  conditionalNameFilter,
  isDuplicateKeyError,
  NAME_FIELD,
  NAME_INDEX,
} from "./drivers/mongo.js";
export type { MongoDriverOptions } from "./drivers/mongo.js";
export { MemoryDriver } from "./drivers/memory.js";

// Observability
export { Logger, consoleSink, defaultThreshold, formatEntry, logger } from "./observability/logs.js";
export type {
  LogEntry,
  LogEvent,
  LogFields,
  LogLevel,
  LogSink,
  LogThreshold,
} from "./observability/logs.js";
export { MetricsCollector } from "./observability/metrics.js";
export type { CollectionMetrics, StoreOperation } from "./observability/metrics.js";

// Re-export errors
export {
  OdmError,
  ConnectionError,
  ConnectionClosedError,
  DocumentNotFoundError,
  DuplicateNameError,
  IntegrityError,
  ImmutableAttributeError,
  UnknownAttributeError,
  InvalidValueError,
  MissingAttributeError,
  DanglingReferenceError,
  DetachedObjectError,
  ModelConflictError,
  SchemaDefinitionError,
  StoreOperationError,
} from "./errors.js";
