/**
 * SQLite output
 *
 * Writes the rows of an extractor into a table, one SQL column per
 * export column. Absent cells become NULL.
 */

import type Database from "better-sqlite3";
import type { Value } from "../export/access.js";
import type { Extractor } from "../export/extractor.js";
import type { CompiledPath } from "../export/path.js";
import type { Formatter } from "../format/format.js";
import type { Dumper } from "./dumper.js";

type SqlValue = null | number | bigint | string;

export interface SqliteDumperOptions {
  /** Open database to write into */
  db: Database.Database;
  /** Target table; created if missing */
  table: string;
  /** Drop an existing table first */
  replace?: boolean;
}

export class SqliteDumper implements Dumper<number> {
  private db: Database.Database;
  private table: string;
  private replace: boolean;

  constructor(options: SqliteDumperOptions) {
    this.db = options.db;
    this.table = options.table;
    this.replace = options.replace ?? false;
  }

  /**
   * Insert all rows; returns the number of rows written
   */
  dump(extractor: Extractor, formatter: Formatter): number {
    const columns = extractor.columns;
    const table = quoteIdent(this.table);
    const definitions = columns.map((c) => `${quoteIdent(c.name)} ${sqlType(c.path)}`).join(", ");

    if (this.replace) {
      this.db.exec(`DROP TABLE IF EXISTS ${table}`);
    }
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${table} (${definitions})`);

    const names = columns.map((c) => quoteIdent(c.name)).join(", ");
    const placeholders = columns.map(() => "?").join(", ");
    const insert = this.db.prepare(`INSERT INTO ${table} (${names}) VALUES (${placeholders})`);

    const writeAll = this.db.transaction((rowCount: number) => {
      for (let row = 0; row < rowCount; row++) {
        insert.run(...columns.map((c) => toSql(c.valueAt(row), c.path, formatter)));
      }
    });
    writeAll(extractor.rowCount);

    return extractor.rowCount;
  }
}

/**
 * Declared SQL type of a column. Unsigned 64-bit integers are kept as
 * decimal text; SQLite integers are signed.
 */
export function sqlType(path: CompiledPath): string {
  if (isWideUnsigned(path)) return "TEXT";

  switch (path.kind) {
    case "bool":
    case "int":
    case "duration":
      return "INTEGER";
    case "float":
      return "REAL";
    case "complex":
    case "string":
    case "time":
      return "TEXT";
  }
}

function toSql(value: Value | null, path: CompiledPath, formatter: Formatter): SqlValue {
  if (value === null) return null;

  switch (value.kind) {
    case "bool":
      return value.value ? 1 : 0;
    case "int":
      return isWideUnsigned(path) ? value.value.toString() : value.value;
    case "float":
      return value.value;
    case "complex":
      return formatter.complex(value.value);
    case "string":
      return value.value;
    case "time":
      return formatter.time(value.value);
    case "duration":
      return value.value;
  }
}

function isWideUnsigned(path: CompiledPath): boolean {
  return path.kind === "int" && path.unsigned && path.bits === 64;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
