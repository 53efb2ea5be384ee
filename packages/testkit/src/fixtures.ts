/**
 * Fixture models: people living in cities
 */

import { defineModel, field, ref, type ConnectionConfig } from "@microdm/odm";

/**
 * Connection config for tests; the in-memory driver never dials it
 */
export const TEST_CONFIG: ConnectionConfig = { uri: "mongodb://127.0.0.1:27017/microdm-test" };

export const City = defineModel({
  collection: "cities",
  attributes: {
    name: field("string"),
    population: field("integer", { mutable: true }),
    ancient: field("boolean", { default: false }),
  },
});

export const Person = defineModel({
  collection: "people",
  attributes: {
    name: field("string"),
    age: field("integer", { mutable: true }),
    ssn: field("string", { optional: true }),
    city: ref(() => City, { mutable: true, optional: true }),
    tags: field("list", { mutable: true, default: [] }),
  },
});

/**
 * The same models as a CLI schema file
 */
export const FIXTURE_SCHEMA_FILE = {
  collections: {
    cities: {
      name: { type: "string" },
      population: { type: "integer", mutable: true },
      ancient: { type: "boolean", default: false },
    },
    people: {
      name: { type: "string" },
      age: { type: "integer", mutable: true },
      ssn: { type: "string", optional: true },
      city: { ref: "cities", mutable: true, optional: true },
      tags: { type: "list", mutable: true, default: [] },
    },
  },
} as const;
