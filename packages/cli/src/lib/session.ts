/**
 * One CLI command's view of the store: a registry plus the schema file's models
 */

import { Odm, type Model, type OpenOptions } from "@microdm/odm";
import { CliError } from "./errors.js";
import { loadSchemaFile } from "./schema-file.js";

export interface SessionOptions {
  uri: string;
  database?: string;
  /** Schema file to load; commands that need no models leave it out */
  schemaPath?: string;
}

export interface Session {
  readonly odm: Odm;
  /** Collections declared in the schema file */
  readonly collections: string[];
  /**
   * Model of a declared collection
   * @throws {CliError} If the schema file does not declare it
   */
  model(collection: string): Model;
  close(): Promise<void>;
}

/**
 * Load the schema (before connecting, so a bad file fails fast) and open a registry
 */
export async function openSession(options: SessionOptions, openOptions: OpenOptions = {}): Promise<Session> {
  const { schemaPath } = options;
  const models = schemaPath === undefined ? new Map<string, Model>() : await loadSchemaFile(schemaPath);
  const odm = await Odm.open({ uri: options.uri, database: options.database }, openOptions);

  return {
    odm,
    collections: [...models.keys()].sort(),
    model(collection) {
      const model = models.get(collection);
      if (!model) {
        throw new CliError(
          `Unknown collection "${collection}" (not declared in ${schemaPath ?? "the schema file"})`
        );
      }
      return model;
    },
    close: () => odm.close(),
  };
}

/**
 * Open a session, run `fn`, and close the session on every exit path
 */
export async function withSession<T>(
  options: SessionOptions,
  openOptions: OpenOptions,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  const session = await openSession(options, openOptions);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
