/**
 * Connection manager
 *
 * Owns one driver and exposes load/insert/update/delete keyed by collection
 * and document name. Driver failures that are not already ODM errors are
 * wrapped in `StoreOperationError`.
 */

import { performance } from "node:perf_hooks";
import { z } from "zod";
import {
  ConnectionClosedError,
  ConnectionError,
  DocumentNotFoundError,
  ImmutableAttributeError,
  IntegrityError,
  OdmError,
  StoreOperationError,
} from "./errors.js";
import { MongoDriver } from "./drivers/mongo.js";
import { logger } from "./observability/logs.js";
import { MetricsCollector, type StoreOperation } from "./observability/metrics.js";
import type { Fields, Filter, StoreDriver, StoredRecord, UnsetCondition } from "./types.js";

const MONGO_URI_PATTERN = /^mongodb(?:\+srv)?:\/\//;

export const connectionConfigSchema = z.object({
  uri: z.string().regex(MONGO_URI_PATTERN, "uri must start with mongodb:// or mongodb+srv://"),
  database: z.string().min(1).optional(),
  serverSelectionTimeoutMS: z.number().int().positive().default(5000),
  appName: z.string().min(1).optional(),
  ensureIndexes: z.boolean().default(true),
});

/**
 * Connection settings as accepted by `Connection.open`
 */
export type ConnectionConfig = z.input<typeof connectionConfigSchema>;

/**
 * Connection settings after defaults and database resolution
 */
export type ResolvedConnectionConfig = z.output<typeof connectionConfigSchema> & {
  database: string;
};

export interface OpenOptions {
  /** Use this driver instead of a MongoDB client built from the config */
  driver?: StoreDriver;
}

/**
 * Database named in the path of a MongoDB URI, if any
 */
export function databaseFromUri(uri: string): string | undefined {
  const match = /^mongodb(?:\+srv)?:\/\/(?:[^@/]*@)?[^/]*\/([^?]*)/.exec(uri);
  const name = match?.[1];
  return name ? decodeURIComponent(name) : undefined;
}

/**
 * Validate a config and fill in defaults
 * @throws {ConnectionError} If the config is invalid or names no database
 */
export function resolveConnectionConfig(config: ConnectionConfig): ResolvedConnectionConfig {
  const parsed = connectionConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue ? `${issue.path.join(".") || "config"}: ${issue.message}` : "invalid config";
    throw new ConnectionError(reason, { cause: parsed.error });
  }

  const database = parsed.data.database ?? databaseFromUri(parsed.data.uri);
  if (!database) {
    throw new ConnectionError("no database given in config or uri");
  }

  return { ...parsed.data, database };
}

export class Connection {
  readonly metrics = new MetricsCollector();
  #driver: StoreDriver;
  #config: ResolvedConnectionConfig;
  #indexes = new Map<string, Promise<void>>();
  #closed = false;

  private constructor(driver: StoreDriver, config: ResolvedConnectionConfig) {
    this.#driver = driver;
    this.#config = config;
  }

  /**
   * Open a connection
   *
   * @throws {ConnectionError} If the config is invalid, the store is unreachable
   * or the credentials are rejected
   *
   * @example
   * ```typescript
   * const conn = await Connection.open({ uri: "mongodb://127.0.0.1:27017/app" });
   * ```
   */
  static async open(config: ConnectionConfig, options: OpenOptions = {}): Promise<Connection> {
    const resolved = resolveConnectionConfig(config);
    const driver =
      options.driver ??
      new MongoDriver({
        uri: resolved.uri,
        database: resolved.database,
        serverSelectionTimeoutMS: resolved.serverSelectionTimeoutMS,
        appName: resolved.appName,
      });

    try {
      await driver.connect();
    } catch (err) {
      if (err instanceof ConnectionError) {
        throw err;
      }
      throw new ConnectionError(err instanceof Error ? err.message : String(err), { cause: err });
    }

    logger.debug("connection.open", {
      details: { driver: driver.kind, database: resolved.database },
    });
    return new Connection(driver, resolved);
  }

  /**
   * Resolved settings of this connection
   */
  get config(): ResolvedConnectionConfig {
    return this.#config;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Ensure the unique `_name_` index of a collection, once per connection
   */
  async ensureIndexes(collection: string): Promise<void> {
    this.#assertOpen();
    let pending = this.#indexes.get(collection);
    if (!pending) {
      pending = this.#driver.ensureNameIndex(collection);
      this.#indexes.set(collection, pending);
    }

    try {
      await pending;
    } catch (err) {
      // Let the next caller try again
      this.#indexes.delete(collection);
      throw this.#wrap("ensureIndexes", collection, err);
    }
  }

  /**
   * Load the fields of a document
   * @throws {DocumentNotFoundError} If no document has this name
   * @throws {IntegrityError} If more than one document has this name
   */
  async load(collection: string, name: string): Promise<Fields> {
    const records = await this.#run("load", collection, () =>
      this.#driver.findByName(collection, name)
    );
    const [record, ...extra] = records;
    if (!record) {
      throw new DocumentNotFoundError(collection, name);
    }
    if (extra.length > 0) {
      throw new IntegrityError(collection, name, "more than one document with the same name");
    }
    return record.fields;
  }

  /**
   * Find all documents whose fields equal the filter values
   */
  async find(collection: string, filter: Filter = {}): Promise<StoredRecord[]> {
    return this.#run("find", collection, () => this.#driver.find(collection, filter));
  }

  /**
   * Insert a new document
   * @throws {DuplicateNameError} If the name already exists in the collection
   */
  async insert(collection: string, name: string, fields: Fields): Promise<void> {
    await this.#run("insert", collection, () => this.#driver.insert(collection, { name, fields }));
  }

  /**
   * Set fields of an existing document in one atomic write
   *
   * `conditions` guard immutable attributes: the write only happens while
   * each of them is still absent or holds its initial value in the store.
   *
   * @throws {DocumentNotFoundError} If the document no longer exists
   * @throws {ImmutableAttributeError} If a guarded attribute was already set
   */
  async update(
    collection: string,
    name: string,
    changes: Fields,
    conditions: readonly UnsetCondition[] = []
  ): Promise<void> {
    const outcome = await this.#run("update", collection, () =>
      this.#driver.update(collection, name, changes, conditions)
    );
    if (outcome === "missing") {
      throw new DocumentNotFoundError(collection, name);
    }
    if (outcome === "conflict") {
      const attributes = conditions.map(({ attribute }) => attribute);
      throw new ImmutableAttributeError(collection, attributes.join(", "));
    }
  }

  /**
   * Delete a document
   * @throws {DocumentNotFoundError} If the document does not exist
   */
  async delete(collection: string, name: string): Promise<void> {
    const deleted = await this.#run("delete", collection, () =>
      this.#driver.remove(collection, name)
    );
    if (!deleted) {
      throw new DocumentNotFoundError(collection, name);
    }
  }

  /**
   * Release the driver; later calls do nothing
   */
  async close(): Promise<void> {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#indexes.clear();
    await this.#driver.close();
    logger.debug("connection.close", { details: { driver: this.#driver.kind } });
  }

  async #run<T>(operation: StoreOperation, collection: string, fn: () => Promise<T>): Promise<T> {
    this.#assertOpen();
    if (this.#config.ensureIndexes) {
      await this.ensureIndexes(collection);
    }

    const start = performance.now();
    try {
      const result = await fn();
      this.metrics.recordOperation(collection, operation);
      if (operation !== "load" && operation !== "find") {
        this.metrics.recordWriteTime(collection, performance.now() - start);
      }
      return result;
    } catch (err) {
      this.metrics.recordFailure(collection);
      throw this.#wrap(operation, collection, err);
    }
  }

  #wrap(operation: string, collection: string, err: unknown): OdmError {
    if (err instanceof OdmError) {
      return err;
    }
    return new StoreOperationError(operation, collection, { cause: err });
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new ConnectionClosedError();
    }
  }
}

/**
 * Open a connection, run `fn`, and close the connection on every exit path
 */
export async function withConnection<T>(
  config: ConnectionConfig,
  fn: (connection: Connection) => Promise<T>,
  options: OpenOptions = {}
): Promise<T> {
  const connection = await Connection.open(config, options);
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}
