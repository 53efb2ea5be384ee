/**
 * Object registry
 *
 * One registry per connection. It holds at most one live object per
 * (collection, name), and concurrent lookups of the same key share one
 * pending promise, so the identity guarantee holds across awaits. Objects
 * stay registered until released, deleted or closed; there is no eviction.
 */

import { Connection, type ConnectionConfig, type OpenOptions } from "./connection.js";
import { DocumentNotFoundError, DuplicateNameError, ModelConflictError, UnknownAttributeError } from "./errors.js";
import { DETACH, PersistedObject } from "./object.js";
import { logger } from "./observability/logs.js";
import type { CollectionMetrics } from "./observability/metrics.js";
import { buildFields, type FieldInput } from "./schema/fields.js";
import type { Fields, Filter, Model } from "./types.js";
import { undeclaredFilterKeys, validateDocumentName } from "./validation.js";

/**
 * Registry statistics for monitoring and debugging
 */
export interface RegistryStats {
  /** Live objects across all collections */
  size: number;
  /** Live objects per collection */
  collections: Record<string, number>;
  /** Store and registry counters per collection */
  metrics: Record<string, CollectionMetrics>;
}

export class Odm {
  readonly connection: Connection;
  #instances = new Map<string, Map<string, PersistedObject>>();
  #pending = new Map<string, Promise<PersistedObject>>();
  #models = new Map<string, Model>();

  constructor(connection: Connection) {
    this.connection = connection;
  }

  /**
   * Open a connection and a registry over it
   *
   * @example
   * ```typescript
   * const odm = await Odm.open({ uri: "mongodb://127.0.0.1:27017/app" });
   * const alice = await odm.getOrCreate(Person, "alice-123", { name: "Alice", age: 29 });
   * await alice.set("age", 30);
   * await odm.close();
   * ```
   */
  static async open(config: ConnectionConfig, options: OpenOptions = {}): Promise<Odm> {
    return new Odm(await Connection.open(config, options));
  }

  /**
   * Number of live objects
   */
  get size(): number {
    let size = 0;
    for (const objects of this.#instances.values()) {
      size += objects.size;
    }
    return size;
  }

  /**
   * Return the live object for a name, or load it, or create it from `defaults`
   *
   * Loads are shared with concurrent lookups of the same name; a shared load
   * that finds nothing still lets this call create the document. A creation
   * race lost to another process (duplicate name on insert) is settled by
   * loading the winner's document once.
   *
   * @throws {DocumentNotFoundError} If the document is missing and no defaults are given
   */
  async getOrCreate(model: Model, name: string, defaults?: FieldInput): Promise<PersistedObject> {
    this.#bind(model);
    validateDocumentName(model.collection, name);

    const live = this.#lookup(model.collection, name);
    if (live) {
      return live;
    }

    try {
      return await this.#load(model, name);
    } catch (err) {
      if (!(err instanceof DocumentNotFoundError) || defaults === undefined) {
        throw err;
      }
    }

    return this.#dedupe("create", model.collection, name, async () => {
      const created = this.#lookup(model.collection, name, false);
      if (created) {
        return created;
      }

      const fields = buildFields(model, defaults);
      try {
        await this.connection.insert(model.collection, name, fields);
      } catch (err) {
        if (!(err instanceof DuplicateNameError)) {
          throw err;
        }
        logger.info("registry.race", {
          collection: model.collection,
          name,
          message: "document created concurrently; loading it instead",
        });
        return this.#adopt(model, name, await this.connection.load(model.collection, name));
      }

      logger.debug("registry.create", { collection: model.collection, name });
      return this.#adopt(model, name, fields);
    });
  }

  /**
   * Return the live object for a name or load it
   * @throws {DocumentNotFoundError} If the document does not exist
   */
  async find(model: Model, name: string): Promise<PersistedObject> {
    this.#bind(model);
    validateDocumentName(model.collection, name);

    return this.#lookup(model.collection, name) ?? this.#load(model, name);
  }

  /**
   * Create a new document and register its object
   *
   * @param name - Document name (default: generated by the model)
   * @throws {DuplicateNameError} If the name is taken
   * @throws {MissingAttributeError} If a required attribute is absent
   */
  async create(model: Model, fields: FieldInput, name?: string): Promise<PersistedObject> {
    this.#bind(model);
    const documentName = name ?? model.generateName();
    validateDocumentName(model.collection, documentName);

    if (this.#lookup(model.collection, documentName, false)) {
      throw new DuplicateNameError(model.collection, documentName);
    }

    const stored = buildFields(model, fields);
    await this.connection.insert(model.collection, documentName, stored);
    logger.debug("registry.create", { collection: model.collection, name: documentName });
    return this.#adopt(model, documentName, stored);
  }

  /**
   * Iterate objects for every document matching an equality filter
   *
   * Documents that already have a live object yield that object.
   *
   * @throws {UnknownAttributeError} If the filter names an undeclared attribute
   */
  async *findAll(model: Model, filter: Filter = {}): AsyncGenerator<PersistedObject> {
    this.#bind(model);
    const declared = new Set(Object.keys(model.attributes));
    const [unknown] = undeclaredFilterKeys(model.collection, declared, filter);
    if (unknown !== undefined) {
      throw new UnknownAttributeError(model.collection, unknown);
    }

    const records = await this.connection.find(model.collection, filter);
    for (const record of records) {
      yield this.#lookup(model.collection, record.name) ?? this.#adopt(model, record.name, record.fields);
    }
  }

  /**
   * Drop an object from the registry without touching the store
   *
   * @returns true if a live object was released
   */
  release(target: Model | string, name: string): boolean {
    const collection = typeof target === "string" ? target : target.collection;
    const objects = this.#instances.get(collection);
    const object = objects?.get(name);
    if (!objects || !object) {
      return false;
    }

    objects.delete(name);
    if (objects.size === 0) {
      this.#instances.delete(collection);
    }
    object[DETACH]();
    logger.debug("registry.release", { collection, name });
    return true;
  }

  /**
   * Delete a document from the store and release its object
   * @throws {DocumentNotFoundError} If the document does not exist
   */
  async delete(model: Model, name: string): Promise<void> {
    this.#bind(model);
    await this.connection.delete(model.collection, name);
    this.release(model, name);
  }

  /**
   * True when a live object exists for the name
   */
  has(target: Model | string, name: string): boolean {
    const collection = typeof target === "string" ? target : target.collection;
    return this.#instances.get(collection)?.has(name) ?? false;
  }

  /**
   * Get registry statistics
   */
  stats(): RegistryStats {
    const collections: Record<string, number> = {};
    for (const [collection, objects] of this.#instances) {
      collections[collection] = objects.size;
    }

    const metrics: Record<string, CollectionMetrics> = {};
    for (const [collection, entry] of this.connection.metrics.getAllMetrics()) {
      metrics[collection] = entry;
    }

    return { size: this.size, collections, metrics };
  }

  /**
   * Release every object and close the connection
   */
  async close(): Promise<void> {
    for (const objects of this.#instances.values()) {
      for (const object of objects.values()) {
        object[DETACH]();
      }
    }
    this.#instances.clear();
    this.#pending.clear();
    await this.connection.close();
  }

  #bind(model: Model): void {
    const bound = this.#models.get(model.collection);
    if (!bound) {
      this.#models.set(model.collection, model);
    } else if (bound !== model) {
      throw new ModelConflictError(model.collection);
    }
  }

  #lookup(collection: string, name: string, record = true): PersistedObject | undefined {
    const object = this.#instances.get(collection)?.get(name);
    if (record) {
      if (object) {
        this.connection.metrics.recordHit(collection);
        logger.debug("registry.hit", { collection, name });
      } else {
        this.connection.metrics.recordMiss(collection);
      }
    }
    return object;
  }

  /**
   * Register an object for loaded or inserted fields, unless one appeared meanwhile
   */
  #adopt(model: Model, name: string, fields: Fields): PersistedObject {
    let objects = this.#instances.get(model.collection);
    if (!objects) {
      objects = new Map();
      this.#instances.set(model.collection, objects);
    }

    const existing = objects.get(name);
    if (existing) {
      return existing;
    }

    const object = new PersistedObject(this, model, name, fields);
    objects.set(name, object);
    logger.debug("registry.load", { collection: model.collection, name });
    return object;
  }

  #load(model: Model, name: string): Promise<PersistedObject> {
    return this.#dedupe("load", model.collection, name, async () =>
      this.#adopt(model, name, await this.connection.load(model.collection, name))
    );
  }

  /**
   * Share one pending step per (kind, collection, name); loads and creations are keyed apart
   */
  #dedupe(
    kind: "load" | "create",
    collection: string,
    name: string,
    fn: () => Promise<PersistedObject>
  ): Promise<PersistedObject> {
    const key = `${kind}\u0000${collection}\u0000${name}`;
    const inflight = this.#pending.get(key);
    if (inflight) {
      return inflight;
    }

    const pending = (async () => {
      try {
        return await fn();
      } finally {
        this.#pending.delete(key);
      }
    })();
    this.#pending.set(key, pending);
    return pending;
  }
}

/**
 * Open a registry, run `fn`, and close it on every exit path
 */
export async function withOdm<T>(
  config: ConnectionConfig,
  fn: (odm: Odm) => Promise<T>,
  options: OpenOptions = {}
): Promise<T> {
  const odm = await Odm.open(config, options);
  try {
    return await fn(odm);
  } finally {
    await odm.close();
  }
}
