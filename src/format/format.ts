/**
 * Value formatting
 *
 * Turns the kind-tagged values of a column into text. Adapters pick a
 * Formatter (usually one of the presets below) at render time; the
 * extractor itself never formats anything.
 */

import { format as formatDate } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type { Complex } from "../schema/types.js";
import type { Value } from "../export/access.js";
import { formatDuration } from "./duration.js";
import { sprintf } from "./verbs.js";

/**
 * Converts each kind of value to a string
 */
export interface Formatter {
  bool(b: boolean): string;
  int(i: bigint): string;
  float(x: number): string;
  complex(c: Complex): string;
  string(s: string): string;
  time(t: Date): string;
  duration(ns: bigint): string;
  /** Text for absent values: nil pointers and failed accessors */
  na(): string;
}

export interface FormatOptions {
  /** Text for true and false */
  trueRep: string;
  falseRep: string;
  /** printf-style format for integers, e.g. "%d" */
  intFmt: string;
  /** printf-style format for floats and complex parts, e.g. "%.4g" */
  floatFmt: string;
  /** printf-style format for strings, e.g. "%s" or "%q" */
  stringFmt: string;
  /** date-fns pattern for timestamps */
  timeFmt: string;
  /** IANA time zone for timestamps; local time when unset */
  timeZone?: string;
  /** "%s" for human readable durations, "%d" for nanoseconds */
  durationFmt: string;
  naRep: string;
  nanRep: string;
  /** Positive and negative infinity. Complex uses posInfRep only. */
  posInfRep: string;
  negInfRep: string;
}

const HUMAN_VERB = /%[-+ 0#\d.]*[sqv]/;

/**
 * Formatter driven by FormatOptions
 */
export class Format implements Formatter {
  readonly options: Readonly<FormatOptions>;

  constructor(options: FormatOptions) {
    this.options = Object.freeze({ ...options });
  }

  /**
   * Copy of this format with some options replaced
   */
  with(overrides: Partial<FormatOptions>): Format {
    return new Format({ ...this.options, ...overrides });
  }

  bool(b: boolean): string {
    return b ? this.options.trueRep : this.options.falseRep;
  }

  int(i: bigint): string {
    return sprintf(this.options.intFmt, i);
  }

  float(x: number): string {
    if (Number.isNaN(x)) return this.options.nanRep;
    if (x === Infinity) return this.options.posInfRep;
    if (x === -Infinity) return this.options.negInfRep;
    return sprintf(this.options.floatFmt, x);
  }

  complex(c: Complex): string {
    if (Number.isNaN(c.re) || Number.isNaN(c.im)) return this.options.nanRep;
    if (!Number.isFinite(c.re) || !Number.isFinite(c.im)) return this.options.posInfRep;

    const re = sprintf(this.options.floatFmt, c.re);
    let im = sprintf(this.options.floatFmt, c.im);
    if (!im.startsWith("-") && !im.startsWith("+")) im = `+${im}`;
    return `(${re}${im}i)`;
  }

  string(s: string): string {
    return sprintf(this.options.stringFmt, s);
  }

  time(t: Date): string {
    const { timeFmt, timeZone } = this.options;
    return timeZone ? formatInTimeZone(t, timeZone, timeFmt) : formatDate(t, timeFmt);
  }

  duration(ns: bigint): string {
    const { durationFmt } = this.options;
    return HUMAN_VERB.test(durationFmt) ? sprintf(durationFmt, formatDuration(ns)) : sprintf(durationFmt, ns);
  }

  na(): string {
    return this.options.naRep;
  }
}

/**
 * Format a (possibly absent) value
 */
export function formatValue(formatter: Formatter, value: Value | null): string {
  if (value === null) return formatter.na();

  switch (value.kind) {
    case "bool":
      return formatter.bool(value.value);
    case "int":
      return formatter.int(value.value);
    case "float":
      return formatter.float(value.value);
    case "complex":
      return formatter.complex(value.value);
    case "string":
      return formatter.string(value.value);
    case "time":
      return formatter.time(value.value);
    case "duration":
      return formatter.duration(value.value);
  }
}

/**
 * Pleasant human readable output in local time
 */
export const DefaultFormat = new Format({
  trueRep: "true",
  falseRep: "false",
  intFmt: "%d",
  floatFmt: "%.4g",
  stringFmt: "%s",
  timeFmt: "yyyy-MM-dd'T'HH:mm:ss",
  durationFmt: "%s",
  naRep: "",
  nanRep: "",
  posInfRep: "+∞",
  negInfRep: "-∞",
});

/**
 * Output that keeps the data as exact as possible
 */
export const PreciseFormat = new Format({
  trueRep: "true",
  falseRep: "false",
  intFmt: "%d",
  floatFmt: "%g",
  stringFmt: "%q",
  timeFmt: "yyyy-MM-dd'T'HH:mm:ss.SSSXXX",
  timeZone: "UTC",
  durationFmt: "%s",
  naRep: "",
  nanRep: "NaN",
  posInfRep: "+∞",
  negInfRep: "-∞",
});

/**
 * Output readable by R
 */
export const RFormat = new Format({
  trueRep: "TRUE",
  falseRep: "FALSE",
  intFmt: "%d",
  floatFmt: "%.9g",
  stringFmt: "%q",
  timeFmt: "'as.POSIXct(\"'yyyy-MM-dd HH:mm:ss'\")'",
  durationFmt: "%d",
  naRep: "NA",
  nanRep: "NA",
  posInfRep: "Inf",
  negInfRep: "-Inf",
});

export type FormatPreset = "default" | "precise" | "r";

export const FORMAT_PRESETS: Record<FormatPreset, Format> = {
  default: DefaultFormat,
  precise: PreciseFormat,
  r: RFormat,
};
