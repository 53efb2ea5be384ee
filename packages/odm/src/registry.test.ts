import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { Odm, withOdm } from "./registry.js";
import { MemoryDriver } from "./drivers/memory.js";
import { defineModel, field, ref } from "./schema/model.js";
import { defaultThreshold, logger } from "./observability/logs.js";
import {
  DetachedObjectError,
  DocumentNotFoundError,
  DuplicateNameError,
  MissingAttributeError,
  ModelConflictError,
  UnknownAttributeError,
} from "./errors.js";
import type { PersistedObject } from "./object.js";
import type { StoredRecord } from "./types.js";

const config = { uri: "mongodb://127.0.0.1:27017/microdm-test" };

const City = defineModel({
  collection: "cities",
  attributes: {
    name: field("string"),
    population: field("integer", { mutable: true }),
    ancient: field("boolean", { default: false }),
  },
});

const Person = defineModel({
  collection: "people",
  attributes: {
    name: field("string"),
    age: field("integer", { mutable: true }),
    city: ref(() => City, { mutable: true, optional: true }),
    isCool: field("boolean", { default: true }),
  },
});

/**
 * Simulates another process creating the document between our load and insert
 */
class RacingDriver extends MemoryDriver {
  #raced = false;

  override async findByName(collection: string, name: string): Promise<StoredRecord[]> {
    if (!this.#raced) {
      this.#raced = true;
      await super.insert(collection, { name, fields: { name: "Winner", age: 50 } });
      return [];
    }
    return super.findByName(collection, name);
  }
}

async function collect(iterable: AsyncIterable<PersistedObject>): Promise<PersistedObject[]> {
  const objects: PersistedObject[] = [];
  for await (const object of iterable) {
    objects.push(object);
  }
  return objects;
}

describe("Odm registry", () => {
  let driver: MemoryDriver;
  let odm: Odm;

  beforeAll(() => {
    logger.setThreshold("silent");
  });

  afterAll(() => {
    logger.setThreshold(defaultThreshold());
  });

  beforeEach(async () => {
    driver = new MemoryDriver();
    odm = await Odm.open(config, { driver });
  });

  afterEach(async () => {
    await odm.close();
  });

  describe("getOrCreate()", () => {
    it("should return the identical instance for repeated lookups", async () => {
      const first = await odm.getOrCreate(Person, "alice-123", { name: "Alice", age: 29 });
      const second = await odm.getOrCreate(Person, "alice-123");

      expect(second).toBe(first);
      expect(odm.size).toBe(1);
    });

    it("should return the identical instance for concurrent lookups", async () => {
      await driver.insert("people", { name: "bob", fields: { name: "Bob", age: 41 } });

      const [a, b, c] = await Promise.all([
        odm.getOrCreate(Person, "bob"),
        odm.getOrCreate(Person, "bob"),
        odm.find(Person, "bob"),
      ]);

      expect(b).toBe(a);
      expect(c).toBe(a);
    });

    it("should create the document while a plain find of it is pending", async () => {
      const [found, created] = await Promise.allSettled([
        odm.find(Person, "bob"),
        odm.getOrCreate(Person, "bob", { name: "Bob", age: 3 }),
      ]);

      expect(found).toHaveProperty("reason", expect.any(DocumentNotFoundError));
      expect(created.status).toBe("fulfilled");
      expect(driver.count("people")).toBe(1);
      expect(odm.has(Person, "bob")).toBe(true);
    });

    it("should create the document while a lookup without defaults is pending", async () => {
      const [bare, withDefaults] = await Promise.allSettled([
        odm.getOrCreate(Person, "bob"),
        odm.getOrCreate(Person, "bob", { name: "Bob", age: 3 }),
      ]);

      expect(bare.status).toBe("rejected");
      expect(withDefaults.status).toBe("fulfilled");
      expect((await driver.findByName("people", "bob"))[0]?.fields).toEqual({
        name: "Bob",
        age: 3,
        isCool: true,
      });
    });

    it("should share one creation between concurrent callers with defaults", async () => {
      const [a, b] = await Promise.all([
        odm.getOrCreate(Person, "bob", { name: "Bob", age: 3 }),
        odm.getOrCreate(Person, "bob", { name: "Robert", age: 4 }),
      ]);

      expect(b).toBe(a);
      expect(a.get("name")).toBe("Bob");
      expect(driver.count("people")).toBe(1);
    });

    it("should load an existing document", async () => {
      await driver.insert("people", { name: "bob", fields: { name: "Bob", age: 41 } });

      const bob = await odm.getOrCreate(Person, "bob", { name: "Ignored", age: 1 });

      expect(bob.get("name")).toBe("Bob");
      expect(bob.get("isCool")).toBe(true);
    });

    it("should create the document from defaults when missing", async () => {
      const carol = await odm.getOrCreate(Person, "carol", { name: "Carol", age: 35 });

      expect(carol.name).toBe("carol");
      expect((await driver.findByName("people", "carol"))[0]?.fields).toEqual({
        name: "Carol",
        age: 35,
        isCool: true,
      });
    });

    it("should fail without defaults when the document is missing", async () => {
      await expect(odm.getOrCreate(Person, "ghost")).rejects.toBeInstanceOf(DocumentNotFoundError);
      expect(odm.has(Person, "ghost")).toBe(false);
    });

    it("should load the winner after losing a creation race", async () => {
      const racing = new RacingDriver();
      const local = await Odm.open(config, { driver: racing });

      const carol = await local.getOrCreate(Person, "carol", { name: "Loser", age: 1 });

      expect(carol.get("name")).toBe("Winner");
      expect(carol.get("age")).toBe(50);
      expect(racing.count("people")).toBe(1);
      await local.close();
    });

    it("should validate defaults before inserting", async () => {
      await expect(odm.getOrCreate(Person, "dave", { name: "Dave" })).rejects.toBeInstanceOf(
        MissingAttributeError
      );
      expect(driver.count("people")).toBe(0);
    });
  });

  describe("find()", () => {
    it("should load and register a document", async () => {
      await driver.insert("cities", { name: "paris", fields: { name: "Paris", population: 2100000 } });

      const paris = await odm.find(City, "paris");

      expect(paris.get("population")).toBe(2100000);
      expect(paris.get("ancient")).toBe(false);
      expect(odm.has(City, "paris")).toBe(true);
      expect(await odm.find(City, "paris")).toBe(paris);
    });

    it("should report a missing document", async () => {
      await expect(odm.find(City, "atlantis")).rejects.toThrow("Document not found: cities/atlantis");
    });
  });

  describe("create()", () => {
    it("should insert with a generated name", async () => {
      const rome = await odm.create(City, { name: "Rome", population: 2800000, ancient: true });

      expect(rome.name).toMatch(/^[0-9a-f-]{36}$/);
      expect(odm.has("cities", rome.name)).toBe(true);
      expect(driver.count("cities")).toBe(1);
    });

    it("should use the given name", async () => {
      const rome = await odm.create(City, { name: "Rome", population: 1 }, "rome");

      expect(rome.name).toBe("rome");
      expect(rome.toJSON()).toEqual({ _name_: "rome", name: "Rome", population: 1, ancient: false });
    });

    it("should reject a name held by a live object", async () => {
      await odm.create(City, { name: "Rome", population: 1 }, "rome");

      await expect(odm.create(City, { name: "Roma", population: 2 }, "rome")).rejects.toBeInstanceOf(
        DuplicateNameError
      );
    });

    it("should reject a name already in the store", async () => {
      await driver.insert("cities", { name: "rome", fields: { name: "Rome", population: 1 } });

      await expect(odm.create(City, { name: "Roma", population: 2 }, "rome")).rejects.toBeInstanceOf(
        DuplicateNameError
      );
      expect(odm.has(City, "rome")).toBe(false);
    });
  });

  describe("findAll()", () => {
    beforeEach(async () => {
      await driver.insert("people", { name: "a", fields: { name: "A", age: 30 } });
      await driver.insert("people", { name: "b", fields: { name: "B", age: 30 } });
      await driver.insert("people", { name: "c", fields: { name: "C", age: 41 } });
    });

    it("should yield objects for matching documents", async () => {
      const people = await collect(odm.findAll(Person, { age: 30 }));

      expect(people.map((p) => p.name)).toEqual(["a", "b"]);
      expect(odm.size).toBe(2);
    });

    it("should reuse live objects", async () => {
      const a = await odm.find(Person, "a");

      const people = await collect(odm.findAll(Person));

      expect(people).toHaveLength(3);
      expect(people[0]).toBe(a);
    });

    it("should reject filters on undeclared attributes", async () => {
      await expect(collect(odm.findAll(Person, { height: 180 }))).rejects.toBeInstanceOf(
        UnknownAttributeError
      );
    });
  });

  describe("release()", () => {
    it("should drop the object without touching the store", async () => {
      const alice = await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });

      expect(odm.release(Person, "alice")).toBe(true);
      expect(odm.has(Person, "alice")).toBe(false);
      expect(driver.count("people")).toBe(1);

      const again = await odm.find(Person, "alice");
      expect(again).not.toBe(alice);
      expect(again.get("age")).toBe(29);
    });

    it("should detach the released object", async () => {
      const alice = await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });
      odm.release("people", "alice");

      expect(alice.attached).toBe(false);
      await expect(alice.set("age", 30)).rejects.toBeInstanceOf(DetachedObjectError);
    });

    it("should return false for names without a live object", () => {
      expect(odm.release(Person, "nobody")).toBe(false);
    });
  });

  describe("delete()", () => {
    it("should delete the record and release the object", async () => {
      const alice = await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });

      await odm.delete(Person, "alice");

      expect(driver.count("people")).toBe(0);
      expect(odm.has(Person, "alice")).toBe(false);
      expect(alice.attached).toBe(false);
    });
  });

  describe("model binding", () => {
    it("should refuse a second model for the same collection", async () => {
      const Impostor = defineModel({ collection: "people", attributes: { name: field("string") } });
      await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });

      await expect(odm.find(Impostor, "alice")).rejects.toBeInstanceOf(ModelConflictError);
    });
  });

  describe("stats()", () => {
    it("should report live objects and counters", async () => {
      await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });
      await odm.getOrCreate(Person, "alice");

      const stats = odm.stats();

      expect(stats.size).toBe(1);
      expect(stats.collections).toEqual({ people: 1 });
      expect(stats.metrics.people?.hitCount).toBe(1);
      expect(stats.metrics.people?.missCount).toBe(1);
      expect(stats.metrics.people?.inserts).toBe(1);
    });
  });

  describe("close()", () => {
    it("should detach every object and close the connection", async () => {
      const alice = await odm.getOrCreate(Person, "alice", { name: "Alice", age: 29 });

      await odm.close();

      expect(odm.size).toBe(0);
      expect(alice.attached).toBe(false);
      expect(odm.connection.closed).toBe(true);
      expect(driver.connected).toBe(false);
    });
  });
});

describe("withOdm()", () => {
  it("should close the registry on every exit path", async () => {
    const driver = new MemoryDriver();

    await expect(
      withOdm(
        config,
        async (odm) => {
          await odm.find(Person, "ghost");
        },
        { driver }
      )
    ).rejects.toBeInstanceOf(DocumentNotFoundError);
    expect(driver.connected).toBe(false);
  });
});
