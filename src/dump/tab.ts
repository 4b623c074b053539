/**
 * Column-aligned plain text
 *
 * Every cell except the last one of a line is padded to the width of its
 * column plus `padding`.
 */

import type { Extractor } from "../export/extractor.js";
import type { Formatter } from "../format/format.js";
import { formatRow, header, type Dumper } from "./dumper.js";

export interface TabDumperOptions {
  /** Suppress the header line */
  omitHeader?: boolean;
  /** Spaces added after the widest cell of a column (default 1) */
  padding?: number;
  /** Minimal column width, padding included (default 1) */
  minWidth?: number;
}

export class TabDumper implements Dumper {
  private omitHeader: boolean;
  private padding: number;
  private minWidth: number;

  constructor(options: TabDumperOptions = {}) {
    this.omitHeader = options.omitHeader ?? false;
    this.padding = options.padding ?? 1;
    this.minWidth = options.minWidth ?? 1;
  }

  dump(extractor: Extractor, formatter: Formatter): string {
    const lines: string[][] = [];
    if (!this.omitHeader) {
      lines.push(header(extractor));
    }
    for (let row = 0; row < extractor.rowCount; row++) {
      lines.push(formatRow(extractor, formatter, row));
    }

    const widths = extractor.columns.map((_, col) => {
      const widest = Math.max(0, ...lines.map((cells) => [...cells[col]].length));
      return Math.max(this.minWidth, widest + this.padding);
    });

    return lines
      .map((cells) =>
        cells
          .map((cell, col) => (col === cells.length - 1 ? cell : cell + " ".repeat(widths[col] - [...cell].length)))
          .join("")
      )
      .map((line) => `${line}\n`)
      .join("");
  }
}
