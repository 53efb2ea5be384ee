import { describe, it, expect, beforeEach } from "vitest";
import { MemoryDriver } from "./memory.js";
import { ConnectionClosedError, DuplicateNameError } from "../errors.js";

describe("MemoryDriver", () => {
  let driver: MemoryDriver;

  beforeEach(async () => {
    driver = new MemoryDriver();
    await driver.connect();
  });

  describe("insert()", () => {
    it("should store a record that findByName returns", async () => {
      await driver.insert("people", { name: "alice", fields: { age: 30 } });

      expect(await driver.findByName("people", "alice")).toEqual([
        { name: "alice", fields: { age: 30 } },
      ]);
      expect(driver.count("people")).toBe(1);
    });

    it("should reject a second record with the same name", async () => {
      await driver.insert("people", { name: "alice", fields: { age: 30 } });

      await expect(
        driver.insert("people", { name: "alice", fields: { age: 31 } })
      ).rejects.toBeInstanceOf(DuplicateNameError);
      expect(await driver.findByName("people", "alice")).toEqual([
        { name: "alice", fields: { age: 30 } },
      ]);
    });

    it("should scope names to their collection", async () => {
      await driver.insert("people", { name: "x", fields: {} });
      await driver.insert("cities", { name: "x", fields: {} });

      expect(driver.count("people")).toBe(1);
      expect(driver.count("cities")).toBe(1);
    });

    it("should not share state with the caller", async () => {
      const fields = { tags: ["a"] };
      await driver.insert("people", { name: "alice", fields });
      fields.tags.push("b");

      const [record] = await driver.findByName("people", "alice");
      expect(record?.fields).toEqual({ tags: ["a"] });
    });
  });

  describe("update()", () => {
    it("should merge changes into the record", async () => {
      await driver.insert("people", { name: "alice", fields: { age: 30, ssn: "000-00-0000" } });

      expect(await driver.update("people", "alice", { age: 31 })).toBe("updated");
      expect(await driver.findByName("people", "alice")).toEqual([
        { name: "alice", fields: { age: 31, ssn: "000-00-0000" } },
      ]);
    });

    it("should report a missing record", async () => {
      expect(await driver.update("people", "ghost", { age: 1 })).toBe("missing");
    });

    it("should write while guarded fields are absent or initial", async () => {
      await driver.insert("people", { name: "alice", fields: { ancient: false } });

      const outcome = await driver.update("people", "alice", { ssn: "000-00-0000", ancient: true }, [
        { attribute: "ssn" },
        { attribute: "ancient", initial: false },
      ]);

      expect(outcome).toBe("updated");
      expect(await driver.findByName("people", "alice")).toEqual([
        { name: "alice", fields: { ssn: "000-00-0000", ancient: true } },
      ]);
    });

    it("should refuse the write once a guarded field is set", async () => {
      await driver.insert("people", { name: "alice", fields: { ssn: "000-00-0000" } });

      const outcome = await driver.update("people", "alice", { ssn: "111-11-1111" }, [{ attribute: "ssn" }]);

      expect(outcome).toBe("conflict");
      expect(await driver.findByName("people", "alice")).toEqual([
        { name: "alice", fields: { ssn: "000-00-0000" } },
      ]);
    });
  });

  describe("remove()", () => {
    it("should delete the record once", async () => {
      await driver.insert("people", { name: "alice", fields: {} });

      expect(await driver.remove("people", "alice")).toBe(true);
      expect(await driver.remove("people", "alice")).toBe(false);
      expect(await driver.findByName("people", "alice")).toEqual([]);
    });
  });

  describe("find()", () => {
    beforeEach(async () => {
      await driver.insert("people", { name: "a", fields: { age: 30, tags: ["x", "y"] } });
      await driver.insert("people", { name: "b", fields: { age: 30, tags: ["y"] } });
      await driver.insert("people", { name: "c", fields: { age: 41, nickname: null } });
    });

    it("should match on equality", async () => {
      const records = await driver.find("people", { age: 30 });
      expect(records.map((r) => r.name)).toEqual(["a", "b"]);
    });

    it("should match list members", async () => {
      const records = await driver.find("people", { tags: "x" });
      expect(records.map((r) => r.name)).toEqual(["a"]);
    });

    it("should match null against absent and null fields", async () => {
      const records = await driver.find("people", { nickname: null });
      expect(records.map((r) => r.name)).toEqual(["a", "b", "c"]);
    });

    it("should return everything for an empty filter", async () => {
      expect(await driver.find("people", {})).toHaveLength(3);
      expect(await driver.find("cities", {})).toEqual([]);
    });
  });

  describe("lifecycle", () => {
    it("should refuse operations after close", async () => {
      await driver.close();

      expect(driver.connected).toBe(false);
      await expect(driver.findByName("people", "alice")).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it("should keep data across reconnects", async () => {
      await driver.insert("people", { name: "alice", fields: { age: 30 } });
      await driver.close();
      await driver.connect();

      expect(await driver.findByName("people", "alice")).toHaveLength(1);
    });

    it("should remember which collections were indexed", async () => {
      await driver.ensureNameIndex("people");
      await driver.ensureNameIndex("cities");
      await driver.ensureNameIndex("people");

      expect(driver.indexedCollections).toEqual(["cities", "people"]);
    });
  });
});
