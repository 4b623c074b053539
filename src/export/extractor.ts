/**
 * Extractor - columns over a collection of records
 *
 * An Extractor is built once from a collection and a list of column specs.
 * Each column spec is compiled to a path against the element type; the columns are
 * then bound to the collection. Rebinding to another collection of the same
 * element type swaps the data without recompiling anything.
 */

import type { TypeDescriptor } from "../schema/types.js";
import { sameType, stripPointers, typeName } from "../schema/types.js";
import { execute, type Value } from "./access.js";
import { BindError, ExportError } from "./errors.js";
import type { LeafKind } from "./kind.js";
import { compilePath, type CompiledPath } from "./path.js";
import { formatValue, type Formatter } from "../format/format.js";

/**
 * A collection of records of one element type.
 *
 * `type` includes the pointer layers of the elements, e.g. `t.ptr(Obs)`
 * for a collection whose entries may be null.
 */
export interface Collection<T = unknown> {
  readonly type: TypeDescriptor;
  readonly items: readonly T[];
}

export function collection<T>(type: TypeDescriptor, items: readonly T[]): Collection<T> {
  return { type, items };
}

/**
 * Data a column is currently bound to
 */
export interface Binding {
  readonly items: readonly unknown[];
  readonly indirection: number;
}

/**
 * One column of the export
 */
export class Column {
  /** Column header; free to change, the path is unaffected */
  name: string;
  readonly path: CompiledPath;
  private binding: Binding | null = null;

  constructor(path: CompiledPath) {
    this.path = path;
    this.name = path.name;
  }

  get kind(): LeafKind {
    return this.path.kind;
  }

  get isBound(): boolean {
    return this.binding !== null;
  }

  /**
   * Attach the column to new data
   */
  bind(binding: Binding): void {
    this.binding = binding;
  }

  /**
   * Value of this column in the given row; null when absent
   */
  valueAt(row: number): Value | null {
    if (!this.binding) {
      throw new RangeError(`column ${this.name} is not bound`);
    }
    if (!Number.isInteger(row) || row < 0 || row >= this.binding.items.length) {
      throw new RangeError(`row ${row} out of range [0, ${this.binding.items.length})`);
    }
    return execute(this.binding.items[row], this.path, this.binding.indirection);
  }

  /**
   * Formatted value of this column in the given row
   */
  print(formatter: Formatter, row: number): string {
    return formatValue(formatter, this.valueAt(row));
  }
}

export interface ExtractorOptions {
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Columns extracted from tabular data
 */
export class Extractor {
  /** Number of records in the bound collection */
  rowCount = 0;

  /** Columns in output order; may be renamed, reordered or dropped */
  columns: Column[];

  /** Record type with the collection's pointer layers stripped */
  readonly elementType: TypeDescriptor;

  /** Pointer layers of the collection elements */
  readonly primaryIndirection: number;

  private readonly collectionType: TypeDescriptor;
  private verbose: boolean;

  constructor(collectionType: TypeDescriptor, columnSpecs: readonly string[], options: ExtractorOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.collectionType = collectionType;

    const { type, indirections } = stripPointers(collectionType);
    this.elementType = type;
    this.primaryIndirection = indirections;

    this.columns = columnSpecs.map((spec) => {
      const path = compilePath(type, spec);
      if (this.verbose) {
        console.log(`[Extractor] Compiled "${spec}" to ${path.steps.length} step(s), kind ${path.kind}`);
      }
      return new Column(path);
    });
  }

  /**
   * (Re)bind all columns to `data`, which must have the element type the
   * extractor was built for
   *
   * @throws BindError on a type mismatch
   */
  bind(data: Collection): void {
    if (!sameType(data.type, this.collectionType)) {
      throw new BindError(typeName(this.collectionType), typeName(data.type));
    }

    const binding: Binding = { items: data.items, indirection: this.primaryIndirection };
    this.rowCount = data.items.length;
    for (const column of this.columns) {
      column.bind(binding);
    }

    if (this.verbose) {
      console.log(`[Extractor] Bound ${this.columns.length} column(s) to ${this.rowCount} row(s)`);
    }
  }
}

/**
 * Build an extractor for `data` with one column per spec
 *
 * @throws PathError for the first spec that does not compile
 */
export function newExtractor(data: Collection, columnSpecs: readonly string[], options?: ExtractorOptions): Extractor {
  if (!isCollection(data)) {
    throw new ExportError("export: only collections of records are supported", "UNSUPPORTED_INPUT");
  }
  const extractor = new Extractor(data.type, columnSpecs, options);
  extractor.bind(data);
  return extractor;
}

function isCollection(data: unknown): data is Collection {
  if (typeof data !== "object" || data === null) return false;
  return Array.isArray(Reflect.get(data, "items")) && typeof Reflect.get(data, "type") === "object";
}
