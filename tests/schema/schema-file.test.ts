import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadSchema, parseSchema } from "../../src/schema/schema-file.js";
import { SchemaError } from "../../src/export/errors.js";
import { typeName } from "../../src/schema/types.js";

function schemaError(json: unknown): SchemaError {
  try {
    parseSchema(json);
  } catch (err) {
    if (err instanceof SchemaError) return err;
    throw err;
  }
  throw new Error("expected a SchemaError");
}

describe("Schema Documents", () => {
  describe("parseSchema", () => {
    it("should build records with builtin field types", () => {
      const schema = parseSchema({
        element: "Obs",
        types: { Obs: { fields: { Age: "int", Clarity: "uint8", At: "time", Note: "*string" } } },
      });
      const obs = schema.types.get("Obs");
      expect(schema.element).toBe(obs);
      expect(obs?.fields.map((f) => `${f.name}:${typeName(f.type)}`)).toEqual([
        "Age:int64",
        "Clarity:uint8",
        "At:time",
        "Note:*string",
      ]);
    });

    it("should wrap the element in pointers", () => {
      const schema = parseSchema({ element: "**Obs", types: { Obs: { fields: {} } } });
      expect(typeName(schema.element)).toBe("**Obs");
    });

    it("should resolve records declared later and cycles", () => {
      const schema = parseSchema({
        element: "Node",
        types: {
          Node: { fields: { Value: "int", Next: "*Node", Meta: "Meta" } },
          Meta: { fields: { Label: "string" } },
        },
      });
      const node = schema.types.get("Node");
      const next = node?.fields[1].type;
      expect(next?.tag === "ptr" && next.elem).toBe(node);
      expect(node?.fields[2].type).toBe(schema.types.get("Meta"));
    });

    it("should allow builtin elements without types", () => {
      expect(parseSchema({ element: "float64" }).element).toEqual({ tag: "float", bits: 64 });
    });

    it("should reject unknown types", () => {
      expect(schemaError({ element: "Obs", types: { Obs: { fields: { X: "Foo" } } } }).message).toBe(
        'schema: unknown type "Foo" at Obs.X'
      );
      expect(schemaError({ element: "Nope" }).message).toBe('schema: unknown type "Nope" at element');
    });

    it("should reject names that shadow builtins", () => {
      expect(schemaError({ element: "int", types: { int: { fields: {} } } }).message).toBe(
        'schema: type name "int" shadows a builtin type'
      );
    });

    it("should list document problems", () => {
      const err = schemaError({ types: {} });
      expect(err.code).toBe("INVALID_SCHEMA");
      expect(err.message).toBe("schema: invalid schema document");
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]).toMatch(/^element: /);
    });
  });

  describe("loadSchema", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "recdump-schema-"));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should read a schema file", async () => {
      const path = join(dir, "obs.schema.json");
      writeFileSync(path, JSON.stringify({ element: "*Obs", types: { Obs: { fields: { Age: "int" } } } }));
      const schema = await loadSchema(path);
      expect(typeName(schema.element)).toBe("*Obs");
    });

    it("should wrap syntax errors", async () => {
      const path = join(dir, "broken.json");
      writeFileSync(path, "{");
      await expect(loadSchema(path)).rejects.toThrow(SchemaError);
    });
  });
});
