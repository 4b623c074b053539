import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { parseArgs, run, type CLIOptions } from "../src/cli.js";

const SCHEMA = {
  element: "*Obs",
  types: {
    Obs: { fields: { Age: "int", Inner: "*Inner" } },
    Inner: { fields: { Field: "float64" } },
  },
};

const DATA = [{ Age: 20, Inner: { Field: 1.5 } }, { Age: 31, Inner: null }, null];

describe("CLI", () => {
  let dir: string;
  let schemaPath: string;
  let dataPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "recdump-cli-"));
    schemaPath = join(dir, "obs.schema.json");
    dataPath = join(dir, "obs.json");
    writeFileSync(schemaPath, JSON.stringify(SCHEMA));
    writeFileSync(dataPath, JSON.stringify(DATA));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function options(overrides: Partial<CLIOptions> = {}): CLIOptions {
    return {
      ...parseArgs(["--schema", schemaPath, "--data", dataPath, "--config", join(dir, "none.json")]),
      columns: ["Age", "Inner.Field"],
      ...overrides,
    };
  }

  describe("parseArgs", () => {
    it("should collect options and columns", () => {
      expect(
        parseArgs(["--schema", "s.json", "--data", "d.json", "--output", "csv", "--omit-header", "Age", "Inner.Field"])
      ).toEqual({
        schema: "s.json",
        data: "d.json",
        columns: ["Age", "Inner.Field"],
        output: "csv",
        config: "",
        omitHeader: true,
        verbose: false,
        help: false,
      });
    });

    it("should recognize help", () => {
      expect(parseArgs(["-h"]).help).toBe(true);
    });

    it("should reject unknown choices and options", () => {
      expect(() => parseArgs(["--output", "xml"])).toThrow("--output must be one of csv, tab, r, sqlite");
      expect(() => parseArgs(["--format", "fancy"])).toThrow("--format must be one of default, precise, r");
      expect(() => parseArgs(["--nope"])).toThrow("Unknown option: --nope");
    });
  });

  describe("run", () => {
    it("should print aligned text by default", async () => {
      await expect(run(options())).resolves.toBe("Age Inner.Field\n" + "20  1.5\n" + "31  \n" + "    \n");
    });

    it("should print CSV", async () => {
      await expect(run(options({ output: "csv" }))).resolves.toBe("Age,Inner.Field\n20,1.5\n31,\n,\n");
    });

    it("should apply the format preset", async () => {
      await expect(run(options({ output: "csv", format: "r", omitHeader: true }))).resolves.toBe(
        "20,1.5\n31,NA\nNA,NA\n"
      );
    });

    it("should take output settings from the config file", async () => {
      const configPath = join(dir, "r.config.json");
      writeFileSync(configPath, JSON.stringify({ format: { preset: "r" }, output: { kind: "r", dataFrame: "df" } }));
      await expect(run(options({ config: configPath }))).resolves.toBe(
        "Age <- c(20, 31, NA)\nInner.Field <- c(1.5, NA, NA)\ndf <- data.frame(Age, Inner.Field)\n"
      );
    });

    it("should write into a SQLite database", async () => {
      const dbPath = join(dir, "out.db");
      await expect(run(options({ output: "sqlite", database: dbPath, table: "obs" }))).resolves.toBe(
        "Wrote 3 row(s) to obs\n"
      );

      const db = new Database(dbPath, { readonly: true });
      try {
        expect(db.prepare(`SELECT Age, "Inner.Field" FROM obs ORDER BY rowid`).raw().all()).toEqual([
          [20, 1.5],
          [31, null],
          [null, null],
        ]);
      } finally {
        db.close();
      }
    });

    it("should refuse SQLite output without a database file", async () => {
      await expect(run(options({ output: "sqlite" }))).rejects.toThrow("--output sqlite requires --db");
    });

    it("should keep 64-bit integers from the data file exact", async () => {
      const wideSchema = join(dir, "wide.schema.json");
      const wideData = join(dir, "wide.json");
      writeFileSync(wideSchema, JSON.stringify({ element: "Wide", types: { Wide: { fields: { U: "uint64", I: "int64" } } } }));
      writeFileSync(
        wideData,
        '[{"U": 18446744073709551615, "I": 9223372036854775807}, {"U": 1, "I": -9223372036854775808}]'
      );
      await expect(
        run(options({ schema: wideSchema, data: wideData, output: "csv", columns: ["U", "I"] }))
      ).resolves.toBe("U,I\n18446744073709551615,9223372036854775807\n1,-9223372036854775808\n");
    });

    it("should read extra pointer layers nested under current", async () => {
      const deepSchema = join(dir, "deep.schema.json");
      const deepData = join(dir, "deep.json");
      writeFileSync(
        deepSchema,
        JSON.stringify({
          element: "Holder",
          types: { Holder: { fields: { Deep: "**Inner" } }, Inner: { fields: { Field: "float64" } } },
        })
      );
      writeFileSync(
        deepData,
        JSON.stringify([{ Deep: { current: { Field: 1.5 } } }, { Deep: { current: null } }, { Deep: null }])
      );
      await expect(run(options({ schema: deepSchema, data: deepData, columns: ["Deep.Field"] }))).resolves.toBe(
        "Deep.Field\n1.5\n\n\n"
      );
    });

    it("should log when verbose", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      await run(options({ verbose: true, columns: ["Age"] }));
      expect(log).toHaveBeenCalledWith(`[CLI] Loaded 3 record(s) from ${dataPath}`);
    });

    it("should require schema, data and columns", async () => {
      await expect(run(options({ schema: "" }))).rejects.toThrow("Missing required --schema or --data");
      await expect(run(options({ columns: [] }))).rejects.toThrow("No columns given");
    });

    it("should require an array of records", async () => {
      const objectPath = join(dir, "object.json");
      writeFileSync(objectPath, JSON.stringify({ Age: 1 }));
      await expect(run(options({ data: objectPath }))).rejects.toThrow(`${objectPath} must contain a JSON array`);
    });

    it("should report bad columns", async () => {
      await expect(run(options({ columns: ["Inner.Nope"] }))).rejects.toThrow(
        "export: no such field or accessor Nope in Inner"
      );
    });
  });
});
