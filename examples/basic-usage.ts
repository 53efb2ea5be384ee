/**
 * Basic Usage Example
 *
 * People living in cities, against a local MongoDB.
 * Run with: npm run example
 */

import { ImmutableAttributeError, Odm, defineModel, field, ref } from "@microdm/odm";

const City = defineModel({
  collection: "cities",
  attributes: {
    name: field("string"),
    population: field("integer", { mutable: true }),
  },
});

const Person = defineModel({
  collection: "people",
  attributes: {
    name: field("string"),
    age: field("integer", { mutable: true }),
    ssn: field("string", { optional: true }),
    city: ref(() => City, { mutable: true, optional: true }),
  },
});

async function main(): Promise<void> {
  const odm = await Odm.open({ uri: process.env.MICRODM_URI ?? "mongodb://127.0.0.1:27017/microdm-examples" });

  try {
    const paris = await odm.getOrCreate(City, "paris", { name: "Paris", population: 2100000 });
    const alice = await odm.getOrCreate(Person, "alice-123", { name: "Alice", age: 29 });
    console.log("Loaded", alice.toJSON());

    // Each write is committed before set() resolves
    await alice.set("age", 30);
    await alice.set("city", paris);

    const home = await alice.reference("city");
    console.log(`${String(alice.get("name"))} lives in ${String(home?.get("name"))}`);
    console.log("Same object:", home === paris);

    if (alice.get("ssn") === undefined) {
      await alice.set("ssn", "000-00-0000");
    }
    try {
      await alice.set("ssn", "111-11-1111");
    } catch (err) {
      if (!(err instanceof ImmutableAttributeError)) {
        throw err;
      }
      console.log("Refused:", err.message);
    }

    for await (const person of odm.findAll(Person, { city: "paris" })) {
      console.log("Resident:", person.name);
    }

    console.log("Stats:", JSON.stringify(odm.stats()));
  } finally {
    await odm.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
