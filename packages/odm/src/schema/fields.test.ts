import { describe, it, expect } from "vitest";
import { defineModel, field, ref } from "./model.js";
import {
  DOCUMENT_HANDLE,
  buildFields,
  holdsInitialValue,
  hydrateFields,
  isDocumentHandle,
  toStoredValue,
  type DocumentHandle,
} from "./fields.js";
import { InvalidValueError, MissingAttributeError, UnknownAttributeError } from "../errors.js";

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
    nickname: field("string", { optional: true }),
    tags: field("list", { mutable: true, default: [] }),
  },
});

function handle(collection: string, name: string): DocumentHandle {
  return { [DOCUMENT_HANDLE]: true, collection, name };
}

describe("isDocumentHandle()", () => {
  it("should recognise branded objects only", () => {
    expect(isDocumentHandle(handle("cities", "paris"))).toBe(true);
    expect(isDocumentHandle({ collection: "cities", name: "paris" })).toBe(false);
    expect(isDocumentHandle("paris")).toBe(false);
    expect(isDocumentHandle(null)).toBe(false);
  });
});

describe("toStoredValue()", () => {
  const citySpec = ref(() => City, { optional: true });

  it("should store a reference as the target name", () => {
    expect(toStoredValue(Person, "city", citySpec, "paris")).toBe("paris");
    expect(toStoredValue(Person, "city", citySpec, handle("cities", "rome"))).toBe("rome");
  });

  it("should accept null for an optional reference", () => {
    expect(toStoredValue(Person, "city", citySpec, null)).toBeNull();
  });

  it("should reject a document of another model", () => {
    expect(() => toStoredValue(Person, "city", citySpec, handle("people", "bob"))).toThrow(
      "Invalid value for people.city: expected a document of cities, got one of people"
    );
  });

  it("should reject values that are neither names nor documents", () => {
    expect(() => toStoredValue(Person, "city", citySpec, 42)).toThrow(
      "expected a name or a document of cities"
    );
    expect(() => toStoredValue(Person, "city", citySpec, "")).toThrow(InvalidValueError);
  });

  it("should reject documents for value attributes", () => {
    expect(() => toStoredValue(Person, "age", field("any"), handle("cities", "rome"))).toThrow(
      "documents can only be assigned to reference attributes"
    );
  });

  it("should check value attributes against their type", () => {
    expect(toStoredValue(Person, "age", field("integer"), 30)).toBe(30);
    expect(() => toStoredValue(Person, "age", field("integer"), "30")).toThrow(InvalidValueError);
  });
});

describe("buildFields()", () => {
  it("should fill in defaults and leave out unset optional attributes", () => {
    expect(buildFields(Person, { name: "Alice", age: 29 })).toEqual({
      name: "Alice",
      age: 29,
      tags: [],
    });
  });

  it("should store references by name", () => {
    const fields = buildFields(Person, { name: "Bob", age: 41, city: handle("cities", "paris") });
    expect(fields.city).toBe("paris");
  });

  it("should not share default values between documents", () => {
    const first = buildFields(Person, { name: "A", age: 1 });
    const second = buildFields(Person, { name: "B", age: 2 });
    expect(first.tags).not.toBe(second.tags);
  });

  it("should reject undeclared attributes", () => {
    expect(() => buildFields(Person, { name: "A", age: 1, height: 180 })).toThrow(UnknownAttributeError);
  });

  it("should reject a missing required attribute", () => {
    expect(() => buildFields(Person, { name: "A" })).toThrow(
      'Missing required attribute "age" for collection people'
    );
    expect(() => buildFields(Person, { name: "A", age: undefined })).toThrow(MissingAttributeError);
  });
});

describe("hydrateFields()", () => {
  it("should apply defaults for attributes the record lacks", () => {
    const { values, undeclared } = hydrateFields(City, { name: "Paris", population: 2100000 });

    expect(Object.fromEntries(values)).toEqual({ name: "Paris", population: 2100000, ancient: false });
    expect(undeclared).toEqual([]);
  });

  it("should report stored keys the model does not declare", () => {
    const { values, undeclared } = hydrateFields(City, { name: "Rome", population: 1, mayor: "X" });

    expect(values.has("mayor")).toBe(false);
    expect(undeclared).toEqual(["mayor"]);
  });
});

describe("holdsInitialValue()", () => {
  it("should be true while nothing was set", () => {
    expect(holdsInitialValue(field("string"), undefined)).toBe(true);
  });

  it("should be true while the declared default is held", () => {
    expect(holdsInitialValue(field("boolean", { default: false }), false)).toBe(true);
    expect(holdsInitialValue(field("list", { default: [] }), [])).toBe(true);
  });

  it("should be false once another value is held", () => {
    expect(holdsInitialValue(field("boolean", { default: false }), true)).toBe(false);
    expect(holdsInitialValue(field("string"), "000-00-0000")).toBe(false);
    expect(holdsInitialValue(ref(() => City), "paris")).toBe(false);
  });
});
