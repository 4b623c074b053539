/**
 * CSV output via csv-stringify
 */

import { stringify } from "csv-stringify/sync";
import type { Extractor } from "../export/extractor.js";
import type { Formatter } from "../format/format.js";
import { formatRow, header, type Dumper } from "./dumper.js";

export interface CSVDumperOptions {
  /** Suppress the header line */
  omitHeader?: boolean;
  /** Field delimiter (default ",") */
  delimiter?: string;
}

export class CSVDumper implements Dumper {
  private omitHeader: boolean;
  private delimiter: string;

  constructor(options: CSVDumperOptions = {}) {
    this.omitHeader = options.omitHeader ?? false;
    this.delimiter = options.delimiter ?? ",";
  }

  dump(extractor: Extractor, formatter: Formatter): string {
    const records: string[][] = [];
    if (!this.omitHeader) {
      records.push(header(extractor));
    }
    for (let row = 0; row < extractor.rowCount; row++) {
      records.push(formatRow(extractor, formatter, row));
    }
    return stringify(records, { delimiter: this.delimiter });
  }
}
