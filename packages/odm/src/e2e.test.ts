/**
 * End-to-end behaviour of the public API over the in-memory driver
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import {
  DuplicateNameError,
  ImmutableAttributeError,
  MemoryDriver,
  Odm,
  defineModel,
  defaultThreshold,
  field,
  logger,
  withOdm,
  type ConnectionConfig,
  type Fields,
  type UpdateOutcome,
} from "./index.js";

const config: ConnectionConfig = { uri: "mongodb://127.0.0.1:27017/microdm-test" };

const Person = defineModel({
  collection: "people",
  attributes: {
    age: field("integer", { mutable: true }),
    ssn: field("string", { optional: true }),
  },
});

class FailingUpdateDriver extends MemoryDriver {
  override async update(): Promise<UpdateOutcome> {
    throw new Error("primary stepped down");
  }
}

describe("microdm end to end", () => {
  let driver: MemoryDriver;

  beforeAll(() => {
    logger.setThreshold("silent");
  });

  afterAll(() => {
    logger.setThreshold(defaultThreshold());
  });

  beforeEach(() => {
    driver = new MemoryDriver();
  });

  it("should keep names unique across registries", async () => {
    const first = await Odm.open(config, { driver });
    const second = await Odm.open(config, { driver });

    const results = await Promise.allSettled([
      first.create(Person, { age: 1 }, "dup"),
      second.create(Person, { age: 2 }, "dup"),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(DuplicateNameError);
    expect(driver.count("people")).toBe(1);
    await first.close();
    await second.close();
  });

  it("should hand out one object per document, even concurrently", async () => {
    await withOdm(
      config,
      async (odm) => {
        const [a, b] = await Promise.all([
          odm.getOrCreate(Person, "p2", { age: 5 }),
          odm.getOrCreate(Person, "p2", { age: 6 }),
        ]);

        expect(a).toBe(b);
        expect(a.get("age")).toBe(5);
        expect(driver.count("people")).toBe(1);
      },
      { driver }
    );
  });

  it("should make every write visible to a fresh load", async () => {
    await withOdm(
      config,
      async (odm) => {
        const person = await odm.getOrCreate(Person, "p3", { age: 1 });
        await person.set("age", 2);
      },
      { driver }
    );

    const age = await withOdm(config, async (odm) => (await odm.find(Person, "p3")).get("age"), {
      driver,
    });
    expect(age).toBe(2);
  });

  it("should refuse a second write to an immutable attribute", async () => {
    await withOdm(
      config,
      async (odm) => {
        const person = await odm.create(Person, { age: 1, ssn: "000-00-0000" }, "p4");

        await expect(person.set("ssn", "111-11-1111")).rejects.toBeInstanceOf(ImmutableAttributeError);
      },
      { driver }
    );

    const [record] = await withOdm(config, async (odm) => odm.connection.find("people", {}), {
      driver,
    });
    expect(record?.fields.ssn).toBe("000-00-0000");
  });

  it("should leave the cache untouched when the store rejects a write", async () => {
    const failing = new FailingUpdateDriver();
    await withOdm(
      config,
      async (odm) => {
        const person = await odm.create(Person, { age: 40 }, "p5");

        await expect(person.set("age", 41)).rejects.toThrow('Store operation "update" failed on people');
        expect(person.get("age")).toBe(40);
      },
      { driver: failing }
    );
  });

  it("should run the alice-123 scenario", async () => {
    const odm = await Odm.open(config, { driver });
    const alice = await odm.getOrCreate(Person, "alice-123", { age: 29 });

    await alice.set("age", 30);
    await alice.reload();
    expect(alice.get("age")).toBe(30);

    await alice.set("ssn", "000-00-0000");
    await expect(alice.set("ssn", "111-11-1111")).rejects.toBeInstanceOf(ImmutableAttributeError);

    await alice.reload();
    expect(alice.get("ssn")).toBe("000-00-0000");

    const expected: Fields = { _name_: "alice-123", age: 30, ssn: "000-00-0000" };
    expect(alice.toJSON()).toEqual(expected);
    await odm.close();
  });
});
