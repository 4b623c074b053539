/**
 * R vectors: one `name <- c(...)` assignment per column, optionally
 * followed by a data frame combining them.
 */

import type { Extractor } from "../export/extractor.js";
import type { Formatter } from "../format/format.js";
import type { Dumper } from "./dumper.js";

/** Values per output line */
const VALUES_PER_LINE = 10;

export interface RVecDumperOptions {
  /** Name of a data frame built from all column vectors; none when empty */
  dataFrame?: string;
}

export class RVecDumper implements Dumper {
  private dataFrame: string;

  constructor(options: RVecDumperOptions = {}) {
    this.dataFrame = options.dataFrame ?? "";
  }

  dump(extractor: Extractor, formatter: Formatter): string {
    let out = "";
    const n = extractor.rowCount;

    for (const column of extractor.columns) {
      out += `${column.name} <- c(`;
      for (let row = 0; row < n; row++) {
        out += column.print(formatter, row);
        if (row < n - 1) {
          out += row % VALUES_PER_LINE === VALUES_PER_LINE - 1 ? ",\n" : ", ";
        }
      }
      out += ")\n";
    }

    if (this.dataFrame !== "") {
      const names = extractor.columns.map((column) => column.name).join(", ");
      out += `${this.dataFrame} <- data.frame(${names})\n`;
    }
    return out;
  }
}
