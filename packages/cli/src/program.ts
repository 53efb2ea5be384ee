/**
 * microdm command line
 *
 * Admin commands over the public ODM API. `createProgram` builds the
 * commander program around injected streams and connection options, so the
 * whole CLI runs in process under test; `runCli` turns the outcome into an
 * exit code.
 */

import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { logger, type Fields, type Filter, type OpenOptions } from "@microdm/odm";
import { parseFieldValue, parseFilter, parseJson, toFields } from "./lib/arg.js";
import { isVerbose, resolveDatabase, resolveSchemaPath, resolveUri } from "./lib/env.js";
import { CliError, EXIT_OK, formatCliError, mapOdmErrorToExitCode } from "./lib/errors.js";
import { processIo, readJsonFromFile, type CliIo } from "./lib/io.js";
import { colorize, printJson, printLines } from "./lib/render.js";
import { withSession, type Session } from "./lib/session.js";
import { withTiming } from "./lib/telemetry.js";

type GlobalOptions = {
  uri?: string;
  database?: string;
  schema?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface OutputOptions {
  raw?: boolean;
}

interface CreateOptions extends OutputOptions {
  name?: string;
  data?: string;
  file?: string;
}

interface ListOptions extends OutputOptions {
  where?: Filter;
}

interface DeleteOptions {
  force?: boolean;
}

export interface ProgramDeps {
  io?: CliIo;
  /** Passed to every connection the CLI opens, e.g. an in-memory driver */
  openOptions?: OpenOptions;
}

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const content = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return packageJsonSchema.parse(JSON.parse(content)).version;
}

/**
 * Read a document body from --file, --data or stdin
 */
async function readDocumentBody(io: CliIo, options: CreateOptions): Promise<Fields> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new InvalidArgumentError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file !== undefined) {
    return toFields(await readJsonFromFile(options.file), `file ${options.file}`);
  }
  if (options.data !== undefined) {
    return toFields(parseJson(options.data, "--data"), "--data");
  }

  if (io.isStdinTTY()) {
    throw new InvalidArgumentError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  let stdin: string;
  try {
    stdin = await io.readStdin();
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return toFields(parseJson(stdin, "stdin"), "stdin");
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? processIo;
  const openOptions = deps.openOptions ?? {};
  const program = new Command();

  // Output settings and the exit override are inherited by every subcommand
  program
    .configureOutput({
      writeOut: (str) => io.out(str),
      writeErr: (str) => io.err(str),
      outputError: (str, write) => write(colorize(str, "red", io.colors)),
    })
    .exitOverride((err) => {
      throw new CliError(err.message, { exitCode: err.exitCode, cause: err, reported: true });
    });

  program
    .name("microdm")
    .description("microdm - admin commands for name-keyed MongoDB documents")
    .version(readVersion())
    .option("--uri <uri>", "MongoDB connection string (env: MICRODM_URI)")
    .option("--database <name>", "Database name, if not in the uri (env: MICRODM_DATABASE)")
    .option("--schema <file>", "Schema file declaring the collections (env: MICRODM_SCHEMA)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      // Library logs go to stderr; stdout carries command output only
      const opts = program.opts<GlobalOptions>();
      logger.setSink((line) => io.err(`${line}\n`));
      if (opts.quiet === true) {
        logger.setThreshold("error");
      } else if (opts.verbose === true || isVerbose()) {
        logger.setThreshold("debug");
      } else {
        logger.setThreshold("warn");
      }
    });

  const quiet = (): boolean => program.opts<GlobalOptions>().quiet === true;

  const session = <T>(withSchema: boolean, fn: (session: Session) => Promise<T>): Promise<T> => {
    const opts = program.opts<GlobalOptions>();
    return withSession(
      {
        uri: resolveUri(opts.uri),
        database: resolveDatabase(opts.database),
        schemaPath: withSchema ? resolveSchemaPath(opts.schema) : undefined,
      },
      openOptions,
      fn
    );
  };

  // Ping command
  program
    .command("ping")
    .description("Check that the store is reachable")
    .action(async () => {
      await withTiming(io, "cli.ping", () =>
        session(false, async ({ odm }) => {
          if (!quiet()) {
            printLines(io, [`Connected to ${odm.connection.config.database}`]);
          }
        })
      );
    });

  // Ensure-indexes command
  program
    .command("ensure-indexes [collections...]")
    .description("Create the unique _name_ index (default: every collection in the schema file)")
    .action(async (collections: string[]) => {
      await withTiming(io, "cli.ensure-indexes", () =>
        session(collections.length === 0, async (s) => {
          const targets = collections.length > 0 ? collections : s.collections;
          for (const collection of targets) {
            await s.odm.connection.ensureIndexes(collection);
          }
          if (!quiet()) {
            printLines(
              io,
              targets.map((collection) => `Ensured unique _name_ index on ${collection}`)
            );
          }
        })
      );
    });

  // Get command
  program
    .command("get <collection> <name>")
    .description("Print a document")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, name: string, options: OutputOptions) => {
      await withTiming(io, "cli.get", () =>
        session(true, async (s) => {
          const object = await s.odm.find(s.model(collection), name);
          printJson(io, object.toJSON(), options);
        })
      );
    });

  // Create command
  program
    .command("create <collection>")
    .description("Create a document from --data, --file or stdin")
    .option("--name <name>", "Document name (default: generated)")
    .option("--data <json>", "Inline JSON document")
    .option("--file <path>", "Read document from JSON file")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, options: CreateOptions) => {
      await withTiming(io, "cli.create", async () => {
        const fields = await readDocumentBody(io, options);
        await session(true, async (s) => {
          const object = await s.odm.create(s.model(collection), fields, options.name);
          if (!quiet()) {
            printJson(io, object.toJSON(), options);
          }
        });
      });
    });

  // Set command
  program
    .command("set <collection> <name> <attribute> <json>")
    .description("Write one attribute, committed at once")
    .action(async (collection: string, name: string, attribute: string, json: string) => {
      await withTiming(io, "cli.set", async () => {
        const value = parseFieldValue(json, "value");
        await session(true, async (s) => {
          const object = await s.odm.find(s.model(collection), name);
          await object.set(attribute, value);
          if (!quiet()) {
            printLines(io, [`Updated ${collection}/${name}.${attribute}`]);
          }
        });
      });
    });

  // Ref command
  program
    .command("ref <collection> <name> <attribute>")
    .description("Print the document a reference attribute points to")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, name: string, attribute: string, options: OutputOptions) => {
      await withTiming(io, "cli.ref", () =>
        session(true, async (s) => {
          const object = await s.odm.find(s.model(collection), name);
          const target = await object.reference(attribute);
          printJson(io, target ? target.toJSON() : null, options);
        })
      );
    });

  // List command
  program
    .command("list <collection>")
    .description("Print documents matching an equality filter")
    .option("--where <json>", "Filter as a JSON object of attribute values", (value: string) =>
      parseFilter(value)
    )
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, options: ListOptions) => {
      await withTiming(io, "cli.list", () =>
        session(true, async (s) => {
          const documents: Fields[] = [];
          for await (const object of s.odm.findAll(s.model(collection), options.where ?? {})) {
            documents.push(object.toJSON());
          }
          printJson(io, documents, options);
        })
      );
    });

  // Delete command
  program
    .command("delete <collection> <name>")
    .description("Delete a document")
    .option("--force", "Delete without confirmation")
    .action(async (collection: string, name: string, options: DeleteOptions) => {
      await withTiming(io, "cli.delete", async () => {
        if (!options.force) {
          if (!io.isStdinTTY()) {
            throw new InvalidArgumentError("Use --force to confirm deletion in non-interactive mode");
          }
          if (!(await io.confirm(`Delete ${collection}/${name}?`))) {
            throw new CliError("Aborted by user");
          }
        }

        await session(true, async (s) => {
          await s.odm.delete(s.model(collection), name);
          if (!quiet()) {
            printLines(io, [`Deleted ${collection}/${name}`]);
          }
        });
      });
    });

  return program;
}

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: readonly string[], deps: ProgramDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const program = createProgram({ ...deps, io });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CliError && err.reported) {
      return err.exitCode;
    }
    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    io.err(`${colorize("Error:", "red", io.colors)} ${formatCliError(err, verbose)}\n`);
    return mapOdmErrorToExitCode(err);
  }
}
