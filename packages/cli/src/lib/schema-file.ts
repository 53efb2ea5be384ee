/**
 * Schema file loading
 *
 * The schema file declares the models the CLI works with:
 *
 * ```json
 * {
 *   "collections": {
 *     "cities": { "name": { "type": "string" } },
 *     "people": {
 *       "age": { "type": "integer", "mutable": true },
 *       "city": { "ref": "cities", "mutable": true, "optional": true }
 *     }
 *   }
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  OdmError,
  SchemaDefinitionError,
  TYPE_TAGS,
  defineModel,
  field,
  fieldValueSchema,
  isTypeTag,
  ref,
  type AttributeSpec,
  type Model,
  type TypeTag,
} from "@microdm/odm";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

const typeTagSchema = z.string().transform((value, ctx): TypeTag => {
  if (isTypeTag(value)) {
    return value;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `unknown type "${value}" (expected one of ${TYPE_TAGS.join(", ")})`,
  });
  return z.NEVER;
});

const attributeSchema = z
  .object({
    type: typeTagSchema.optional(),
    mutable: z.boolean().optional(),
    optional: z.boolean().optional(),
    default: fieldValueSchema.optional(),
    ref: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((attribute, ctx) => {
    if (attribute.ref !== undefined && (attribute.type !== undefined || attribute.default !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "a reference takes no type or default",
      });
    }
  });

export const schemaFileSchema = z
  .object({
    collections: z.record(z.string(), z.record(z.string(), attributeSchema)),
  })
  .strict();

export type SchemaFile = z.infer<typeof schemaFileSchema>;

/**
 * Turn a parsed schema file into models keyed by collection
 * @throws {SchemaDefinitionError} If a model is invalid or a reference names an undeclared collection
 */
export function buildModels(schema: SchemaFile): Map<string, Model> {
  const models = new Map<string, Model>();

  const resolve = (collection: string): Model => {
    const model = models.get(collection);
    if (!model) {
      throw new SchemaDefinitionError(`reference to undeclared collection "${collection}"`);
    }
    return model;
  };

  for (const [collection, attributes] of Object.entries(schema.collections)) {
    const specs: Record<string, AttributeSpec> = {};
    for (const [name, attribute] of Object.entries(attributes)) {
      const target = attribute.ref;
      if (target !== undefined) {
        if (!Object.hasOwn(schema.collections, target)) {
          throw new SchemaDefinitionError(
            `attribute "${name}" of ${collection} references undeclared collection "${target}"`
          );
        }
        specs[name] = ref(() => resolve(target), {
          mutable: attribute.mutable,
          optional: attribute.optional,
        });
      } else {
        specs[name] = field(attribute.type, {
          mutable: attribute.mutable,
          optional: attribute.optional,
          default: attribute.default,
        });
      }
    }
    models.set(collection, defineModel({ collection, attributes: specs }));
  }

  return models;
}

/**
 * Read, validate and build a schema file
 * @throws {CliError} If the file is missing, is not JSON, or declares invalid models
 */
export async function loadSchemaFile(schemaPath: string): Promise<Map<string, Model>> {
  let content: string;
  try {
    content = await readFile(schemaPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Cannot read schema file: ${reason}`, { cause: err });
  }

  let json: unknown;
  try {
    json = parseJson(content, `schema file ${schemaPath}`);
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  const parsed = schemaFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new CliError(`Invalid schema file ${schemaPath}: ${where}${issue?.message ?? "invalid"}`, {
      cause: parsed.error,
    });
  }

  try {
    return buildModels(parsed.data);
  } catch (err) {
    if (err instanceof OdmError) {
      throw new CliError(`Invalid schema file ${schemaPath}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
