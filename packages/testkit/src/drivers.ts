/**
 * Fault-injecting driver
 *
 * Behaves like the in-memory driver until told to fail. Each queued fault
 * fails exactly one later call of its operation, so tests can break one
 * write in the middle of a sequence.
 */

import {
  MemoryDriver,
  type Fields,
  type Filter,
  type StoredRecord,
  type UnsetCondition,
  type UpdateOutcome,
} from "@microdm/odm";

export type DriverOperation =
  | "connect"
  | "ensureNameIndex"
  | "findByName"
  | "find"
  | "insert"
  | "update"
  | "remove";

export class FaultyDriver extends MemoryDriver {
  #faults = new Map<DriverOperation, Error[]>();
  #calls = new Map<DriverOperation, number>();

  /**
   * Make the next call of `operation` throw `error`
   */
  failNext(operation: DriverOperation, error: Error = new Error(`injected ${operation} failure`)): this {
    const queue = this.#faults.get(operation) ?? [];
    queue.push(error);
    this.#faults.set(operation, queue);
    return this;
  }

  /**
   * Number of calls that reached `operation`, failed ones included
   */
  calls(operation: DriverOperation): number {
    return this.#calls.get(operation) ?? 0;
  }

  override async connect(): Promise<void> {
    this.#enter("connect");
    return super.connect();
  }

  override async ensureNameIndex(collection: string): Promise<void> {
    this.#enter("ensureNameIndex");
    return super.ensureNameIndex(collection);
  }

  override async findByName(collection: string, name: string): Promise<StoredRecord[]> {
    this.#enter("findByName");
    return super.findByName(collection, name);
  }

  override async find(collection: string, filter: Filter): Promise<StoredRecord[]> {
    this.#enter("find");
    return super.find(collection, filter);
  }

  override async insert(collection: string, record: StoredRecord): Promise<void> {
    this.#enter("insert");
    return super.insert(collection, record);
  }

  override async update(
    collection: string,
    name: string,
    changes: Fields,
    conditions?: readonly UnsetCondition[]
  ): Promise<UpdateOutcome> {
    this.#enter("update");
    return super.update(collection, name, changes, conditions);
  }

  override async remove(collection: string, name: string): Promise<boolean> {
    this.#enter("remove");
    return super.remove(collection, name);
  }

  #enter(operation: DriverOperation): void {
    this.#calls.set(operation, this.calls(operation) + 1);
    const fault = this.#faults.get(operation)?.shift();
    if (fault) {
      throw fault;
    }
  }
}
