/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_URI = "mongodb://127.0.0.1:27017/microdm";
export const DEFAULT_SCHEMA_PATH = "./microdm.schema.json";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the MongoDB connection string
 * Priority: CLI option > MICRODM_URI env var > local default
 */
export function resolveUri(cliUri?: string): string {
  return cliUri ?? process.env.MICRODM_URI ?? DEFAULT_URI;
}

/**
 * Resolve the database name; undefined means "take it from the uri"
 * Priority: CLI option > MICRODM_DATABASE env var
 */
export function resolveDatabase(cliDatabase?: string): string | undefined {
  const database = cliDatabase ?? process.env.MICRODM_DATABASE;
  return database === "" ? undefined : database;
}

/**
 * Resolve the schema file path
 * Priority: CLI option > MICRODM_SCHEMA env var > ./microdm.schema.json
 */
export function resolveSchemaPath(cliSchema?: string): string {
  const schemaPath = cliSchema ?? process.env.MICRODM_SCHEMA ?? DEFAULT_SCHEMA_PATH;
  return path.resolve(expandTilde(schemaPath));
}

/**
 * Check if CLI timing diagnostics are on
 */
export function isVerbose(): boolean {
  return process.env.MICRODM_CLI_DEBUG === "1";
}
