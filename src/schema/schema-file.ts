/**
 * JSON schema documents
 *
 * Describes record types as data so that JSON input can be exported
 * without writing TypeScript:
 *
 *   {
 *     "element": "*Obs",
 *     "types": {
 *       "Obs":   { "fields": { "Age": "int", "Inner": "*Inner" } },
 *       "Inner": { "fields": { "Field": "float64" } }
 *     }
 *   }
 *
 * Records may refer to each other, also cyclically through pointers.
 * Accessors cannot be declared this way.
 *
 * In the data, a pointer is the value itself or null. Each extra pointer
 * layer is an object with a "current" member, so a "**Inner" field holds
 * `{ "current": { "Field": 1.5 } }`, `{ "current": null }` or null.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { t } from "./dsl.js";
import type { FieldDescriptor, RecordType, TypeDescriptor } from "./types.js";
import { SchemaError } from "../export/errors.js";

const SchemaDocument = z.object({
  element: z.string().min(1),
  types: z
    .record(
      z.object({
        fields: z.record(z.string().min(1)),
      })
    )
    .default({}),
});

export type SchemaDocument = z.input<typeof SchemaDocument>;

export interface Schema {
  /** Element type of the collection, pointer layers included */
  element: TypeDescriptor;
  /** Declared record types by name */
  types: Map<string, RecordType>;
}

const BUILTIN_TYPES = new Map<string, TypeDescriptor>([
  ["bool", t.bool],
  ["int", t.int(64)],
  ["int8", t.int(8)],
  ["int16", t.int(16)],
  ["int32", t.int(32)],
  ["int64", t.int(64)],
  ["uint", t.uint(64)],
  ["uint8", t.uint(8)],
  ["uint16", t.uint(16)],
  ["uint32", t.uint(32)],
  ["uint64", t.uint(64)],
  ["float32", t.float(32)],
  ["float64", t.float(64)],
  ["complex64", t.complex(64)],
  ["complex128", t.complex(128)],
  ["string", t.string],
  ["time", t.time],
  ["duration", t.duration],
  ["error", t.error],
  ["bytes", t.opaque("bytes")],
]);

/**
 * Build type descriptors from a parsed JSON schema document
 *
 * @throws SchemaError if the document is malformed or names unknown types
 */
export function parseSchema(json: unknown): Schema {
  const parsed = SchemaDocument.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new SchemaError("invalid schema document", issues);
  }

  const document = parsed.data;
  const types = new Map<string, RecordType>();
  const fieldLists = new Map<string, FieldDescriptor[]>();

  // Declare all records first so that fields can refer to any of them.
  for (const name of Object.keys(document.types)) {
    if (BUILTIN_TYPES.has(name)) {
      throw new SchemaError(`type name "${name}" shadows a builtin type`);
    }
    const fields: FieldDescriptor[] = [];
    fieldLists.set(name, fields);
    types.set(name, { tag: "record", name, fields });
  }

  for (const [name, declaration] of Object.entries(document.types)) {
    const fields = fieldLists.get(name);
    if (!fields) continue;
    for (const [fieldName, expression] of Object.entries(declaration.fields)) {
      fields.push({ name: fieldName, type: resolveType(expression, types, `${name}.${fieldName}`) });
    }
  }

  return { element: resolveType(document.element, types, "element"), types };
}

/**
 * Read and parse a schema file
 */
export async function loadSchema(path: string): Promise<Schema> {
  const content = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new SchemaError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSchema(json);
}

/**
 * Resolve a type expression like "**Inner" or "uint8"
 */
function resolveType(expression: string, types: Map<string, RecordType>, where: string): TypeDescriptor {
  let depth = 0;
  while (expression[depth] === "*") depth++;
  const base = expression.slice(depth);

  let type: TypeDescriptor | undefined = BUILTIN_TYPES.get(base) ?? types.get(base);
  if (!type) {
    throw new SchemaError(`unknown type "${base}" at ${where}`);
  }
  for (let i = 0; i < depth; i++) {
    type = t.ptr(type);
  }
  return type;
}
