/**
 * Output adapters
 *
 * A Dumper renders every row of an extractor, column by column, with a
 * Formatter chosen by the caller.
 */

import type { Extractor } from "../export/extractor.js";
import type { Formatter } from "../format/format.js";

export interface Dumper<R = string> {
  /** Dump all rows of `extractor` using `formatter` */
  dump(extractor: Extractor, formatter: Formatter): R;
}

/**
 * Formatted cells of one row, in column order
 */
export function formatRow(extractor: Extractor, formatter: Formatter, row: number): string[] {
  return extractor.columns.map((column) => column.print(formatter, row));
}

/**
 * Column names, in column order
 */
export function header(extractor: Extractor): string[] {
  return extractor.columns.map((column) => column.name);
}
