/**
 * MongoDB driver
 *
 * Documents are stored flat, with the name in `_name_` beside the fields.
 * The store's `_id` is never read back. Uniqueness of `_name_` is enforced
 * by a unique index, so a lost creation race surfaces as error 11000.
 */

import { MongoClient, MongoServerError, type Collection, type Db, type Document } from "mongodb";
import { ConnectionClosedError, ConnectionError, DuplicateNameError, IntegrityError } from "../errors.js";
import type {
  Fields,
  Filter,
  StoreDriver,
  StoredRecord,
  UnsetCondition,
  UpdateOutcome,
} from "../types.js";
import { storedFieldsSchema } from "../schema/values.js";

export const NAME_FIELD = "_name_";
export const NAME_INDEX = "_name__unique";

const DUPLICATE_KEY = 11000;

export interface MongoDriverOptions {
  uri: string;
  database: string;
  serverSelectionTimeoutMS?: number;
  appName?: string;
}

/**
 * True for a duplicate key error raised by the server
 */
export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof MongoServerError && err.code === DUPLICATE_KEY;
}

/**
 * Split a raw MongoDB document into name and fields
 * @throws {IntegrityError} If the name is missing or a value has a shape the ODM cannot hold
 */
export function toStoredRecord(collection: string, doc: Document): StoredRecord {
  const { _id: _ignored, [NAME_FIELD]: name, ...rest } = doc;

  if (typeof name !== "string") {
    throw new IntegrityError(collection, String(name), `document has no string ${NAME_FIELD}`);
  }

  const parsed = storedFieldsSchema.safeParse(rest);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new IntegrityError(
      collection,
      name,
      `unsupported stored value at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "invalid"}`
    );
  }

  return { name, fields: parsed.data };
}

/**
 * Query matching the named document while every condition holds
 *
 * A condition holds when the field is absent or equals its initial value.
 */
export function conditionalNameFilter(name: string, conditions: readonly UnsetCondition[]): Document {
  const filter: Document = { [NAME_FIELD]: name };
  if (conditions.length > 0) {
    filter.$and = conditions.map(({ attribute, initial }) => ({
      $or:
        initial === undefined
          ? [{ [attribute]: { $exists: false } }]
          : [{ [attribute]: { $exists: false } }, { [attribute]: initial }],
    }));
  }
  return filter;
}

export class MongoDriver implements StoreDriver {
  readonly kind = "mongodb";
  #client: MongoClient;
  #databaseName: string;
  #db: Db | undefined;

  constructor(options: MongoDriverOptions) {
    this.#client = new MongoClient(options.uri, {
      serverSelectionTimeoutMS: options.serverSelectionTimeoutMS,
      appName: options.appName,
    });
    this.#databaseName = options.database;
  }

  async connect(): Promise<void> {
    try {
      await this.#client.connect();
      const db = this.#client.db(this.#databaseName);
      await db.command({ ping: 1 });
      this.#db = db;
    } catch (err) {
      throw new ConnectionError(err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  async ensureNameIndex(collection: string): Promise<void> {
    await this.#collection(collection).createIndex(
      { [NAME_FIELD]: 1 },
      { unique: true, name: NAME_INDEX }
    );
  }

  async findByName(collection: string, name: string): Promise<StoredRecord[]> {
    // Two is enough to detect a broken uniqueness invariant
    const docs = await this.#collection(collection)
      .find({ [NAME_FIELD]: name })
      .limit(2)
      .toArray();
    return docs.map((doc) => toStoredRecord(collection, doc));
  }

  async find(collection: string, filter: Filter): Promise<StoredRecord[]> {
    const docs = await this.#collection(collection).find({ ...filter }).toArray();
    return docs.map((doc) => toStoredRecord(collection, doc));
  }

  async insert(collection: string, record: StoredRecord): Promise<void> {
    try {
      await this.#collection(collection).insertOne({ ...record.fields, [NAME_FIELD]: record.name });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateNameError(collection, record.name, { cause: err });
      }
      throw err;
    }
  }

  async update(
    collection: string,
    name: string,
    changes: Fields,
    conditions: readonly UnsetCondition[] = []
  ): Promise<UpdateOutcome> {
    const documents = this.#collection(collection);
    const result = await documents.updateOne(conditionalNameFilter(name, conditions), {
      $set: changes,
    });
    if (result.matchedCount > 0) {
      return "updated";
    }
    if (conditions.length === 0) {
      return "missing";
    }

    // Tell a broken condition from a missing document
    const exists = await documents.countDocuments({ [NAME_FIELD]: name }, { limit: 1 });
    return exists > 0 ? "conflict" : "missing";
  }

  async remove(collection: string, name: string): Promise<boolean> {
    const result = await this.#collection(collection).deleteOne({ [NAME_FIELD]: name });
    return result.deletedCount > 0;
  }

  async close(): Promise<void> {
    this.#db = undefined;
    await this.#client.close();
  }

  #collection(name: string): Collection<Document> {
    if (!this.#db) {
      throw new ConnectionClosedError();
    }
    return this.#db.collection(name);
  }
}
