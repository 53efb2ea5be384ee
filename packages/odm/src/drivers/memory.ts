/**
 * In-process driver with the same contract as the MongoDB driver
 *
 * Records live in nested maps keyed by collection and name, so the
 * uniqueness of `_name_` holds without an index. Values are cloned on the
 * way in and out; callers never share state with the store. Data survives
 * `close()` and a later `connect()`.
 */

import { isDeepStrictEqual } from "node:util";
import { ConnectionClosedError, DuplicateNameError } from "../errors.js";
import type {
  FieldValue,
  Fields,
  Filter,
  Scalar,
  StoreDriver,
  StoredRecord,
  UnsetCondition,
  UpdateOutcome,
} from "../types.js";

/**
 * Mongo-style equality: a scalar also matches a list containing it
 */
function matchesValue(stored: FieldValue | undefined, expected: Scalar): boolean {
  if (Array.isArray(stored)) {
    return stored.some((item) => item === expected);
  }
  if (stored === undefined) {
    // Mongo matches `{ field: null }` against absent fields
    return expected === null;
  }
  return isDeepStrictEqual(stored, expected);
}

export class MemoryDriver implements StoreDriver {
  readonly kind = "memory";
  #collections = new Map<string, Map<string, Fields>>();
  #indexed = new Set<string>();
  #connected = false;

  async connect(): Promise<void> {
    this.#connected = true;
  }

  /**
   * True between `connect()` and `close()`
   */
  get connected(): boolean {
    return this.#connected;
  }

  /**
   * Collections whose name index was requested
   */
  get indexedCollections(): string[] {
    return [...this.#indexed].sort();
  }

  async ensureNameIndex(collection: string): Promise<void> {
    this.#assertConnected();
    this.#indexed.add(collection);
  }

  async findByName(collection: string, name: string): Promise<StoredRecord[]> {
    this.#assertConnected();
    const fields = this.#collections.get(collection)?.get(name);
    return fields ? [{ name, fields: structuredClone(fields) }] : [];
  }

  async find(collection: string, filter: Filter): Promise<StoredRecord[]> {
    this.#assertConnected();
    const records: StoredRecord[] = [];
    const documents = this.#collections.get(collection);
    if (!documents) {
      return records;
    }

    const criteria = Object.entries(filter);
    for (const [name, fields] of documents) {
      if (criteria.every(([key, expected]) => matchesValue(fields[key], expected))) {
        records.push({ name, fields: structuredClone(fields) });
      }
    }
    return records;
  }

  async insert(collection: string, record: StoredRecord): Promise<void> {
    this.#assertConnected();
    let documents = this.#collections.get(collection);
    if (!documents) {
      documents = new Map();
      this.#collections.set(collection, documents);
    }

    if (documents.has(record.name)) {
      throw new DuplicateNameError(collection, record.name);
    }
    documents.set(record.name, structuredClone(record.fields));
  }

  async update(
    collection: string,
    name: string,
    changes: Fields,
    conditions: readonly UnsetCondition[] = []
  ): Promise<UpdateOutcome> {
    this.#assertConnected();
    const fields = this.#collections.get(collection)?.get(name);
    if (!fields) {
      return "missing";
    }

    const holds = conditions.every(({ attribute, initial }) => {
      const current = Object.hasOwn(fields, attribute) ? fields[attribute] : undefined;
      return current === undefined || (initial !== undefined && isDeepStrictEqual(current, initial));
    });
    if (!holds) {
      return "conflict";
    }

    Object.assign(fields, structuredClone(changes));
    return "updated";
  }

  async remove(collection: string, name: string): Promise<boolean> {
    this.#assertConnected();
    return this.#collections.get(collection)?.delete(name) ?? false;
  }

  async close(): Promise<void> {
    this.#connected = false;
  }

  /**
   * Number of records in a collection
   */
  count(collection: string): number {
    return this.#collections.get(collection)?.size ?? 0;
  }

  #assertConnected(): void {
    if (!this.#connected) {
      throw new ConnectionClosedError();
    }
  }
}
