/**
 * recdump command line
 *
 * Exports JSON records described by a JSON schema document.
 */

import { readFile } from "node:fs/promises";
import Database from "better-sqlite3";
import { isInteger, isSafeNumber, parse as parseJson } from "lossless-json";
import { loadConfig, resolveFormat, type OutputKind } from "./config.js";
import { CSVDumper } from "./dump/csv.js";
import { RVecDumper } from "./dump/rvec.js";
import { SqliteDumper } from "./dump/sqlite.js";
import { TabDumper } from "./dump/tab.js";
import { collection, newExtractor } from "./export/extractor.js";
import type { FormatPreset } from "./format/format.js";
import { loadSchema } from "./schema/schema-file.js";

export interface CLIOptions {
  schema: string;
  data: string;
  columns: string[];
  output?: OutputKind;
  format?: FormatPreset;
  database?: string;
  table?: string;
  config: string;
  omitHeader: boolean;
  verbose: boolean;
  help: boolean;
}

export const HELP = `
Usage: recdump --schema <file> --data <file> [options] <column>...

Arguments:
  column             Dotted path into each record, e.g. Age or Outer.Inner.Field

Options:
  --schema <file>    JSON schema document describing the records
  --data <file>      JSON file holding an array of records
  --output <kind>    csv, tab, r or sqlite (default: tab)
  --format <preset>  default, precise or r (default: default)
  --db <file>        SQLite database file, required for --output sqlite
  --table <name>     SQLite table for --output sqlite (default: records)
  --config <path>    Path to config file (default: ./recdump.config.json)
  --omit-header      Do not print a header line
  --verbose          Enable verbose output
  --help             Show this help message

Examples:
  recdump --schema obs.schema.json --data obs.json Age Origin Height
  recdump --schema obs.schema.json --data obs.json --output csv --format precise Partner.Age
`;

const OUTPUT_KINDS: readonly OutputKind[] = ["csv", "tab", "r", "sqlite"];
const FORMAT_NAMES: readonly FormatPreset[] = ["default", "precise", "r"];

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    schema: "",
    data: "",
    columns: [],
    config: "",
    omitHeader: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--schema") {
      options.schema = args[++i] ?? "";
    } else if (arg === "--data") {
      options.data = args[++i] ?? "";
    } else if (arg === "--output") {
      options.output = pick(OUTPUT_KINDS, args[++i], "--output");
    } else if (arg === "--format") {
      options.format = pick(FORMAT_NAMES, args[++i], "--format");
    } else if (arg === "--db") {
      options.database = args[++i];
    } else if (arg === "--table") {
      options.table = args[++i];
    } else if (arg === "--config") {
      options.config = args[++i] ?? "";
    } else if (arg === "--omit-header") {
      options.omitHeader = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (!arg.startsWith("-")) {
      options.columns.push(arg);
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Run an export and return what should be printed
 */
export async function run(options: CLIOptions): Promise<string> {
  if (!options.schema || !options.data) {
    throw new Error("Missing required --schema or --data");
  }
  if (options.columns.length === 0) {
    throw new Error("No columns given");
  }

  const config = await loadConfig(options.config || undefined);
  const verbose = options.verbose || config.verbose;

  const schema = await loadSchema(options.schema);
  const records = parseJson(await readFile(options.data, "utf-8"), null, parseNumber);
  if (!Array.isArray(records)) {
    throw new Error(`${options.data} must contain a JSON array`);
  }
  if (verbose) {
    console.log(`[CLI] Loaded ${records.length} record(s) from ${options.data}`);
  }

  const extractor = newExtractor(collection(schema.element, records), options.columns, { verbose });
  const formatter = resolveFormat(options.format ? { ...config.format, preset: options.format } : config.format);
  const output = { ...config.output };
  if (options.output) output.kind = options.output;
  if (options.omitHeader) output.omitHeader = true;
  if (options.database) output.database = options.database;
  if (options.table) output.table = options.table;

  switch (output.kind) {
    case "csv":
      return new CSVDumper({ omitHeader: output.omitHeader, delimiter: output.delimiter }).dump(extractor, formatter);

    case "tab":
      return new TabDumper({ omitHeader: output.omitHeader }).dump(extractor, formatter);

    case "r":
      return new RVecDumper({ dataFrame: output.dataFrame }).dump(extractor, formatter);

    case "sqlite": {
      if (!output.database) {
        throw new Error("--output sqlite requires --db");
      }
      const db = new Database(output.database);
      try {
        const written = new SqliteDumper({ db, table: output.table }).dump(extractor, formatter);
        return `Wrote ${written} row(s) to ${output.table}\n`;
      } finally {
        db.close();
      }
    }
  }
}

/**
 * JSON numbers: integers beyond the safe range are kept exact as bigint
 */
function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : parseFloat(text);
}

function pick<T extends string>(allowed: readonly T[], value: string | undefined, option: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${option} must be one of ${allowed.join(", ")}`);
  }
  return match;
}
