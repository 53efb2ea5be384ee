/**
 * Test helpers for microdm packages
 */

export { FaultyDriver } from "./drivers.js";
export type { DriverOperation } from "./drivers.js";
export { City, Person, TEST_CONFIG, FIXTURE_SCHEMA_FILE } from "./fixtures.js";
export { openMemoryOdm, withMemoryOdm } from "./odm.js";
export type { MemoryOdmOptions } from "./odm.js";
export { createTempDir, removeDir, writeJsonFile, withTempDir } from "./fs.js";
export { captureIo, parseJsonOutput } from "./cli.js";
export type { CapturedIo, CaptureOptions } from "./cli.js";
