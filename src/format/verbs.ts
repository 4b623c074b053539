/**
 * printf-style verbs for formatting a single value
 *
 * Supported: %d %x %X %o %b (integers), %f %F %e %E %g %G (floats),
 * %s %q %v, and %% for a literal percent sign. Flags "-", "+", " ", "0",
 * width and precision work as in C. Every verb in the format string is
 * applied to the same argument, so "%.1f%%" renders a percentage.
 */

export type FormatArg = string | number | bigint | boolean;

const VERB = /%([-+ 0#]*)(\d+)?(?:\.(\d+))?([a-zA-Z%])/g;

interface Spec {
  minus: boolean;
  plus: boolean;
  space: boolean;
  zero: boolean;
  width: number;
  precision: number | undefined;
}

/**
 * Format `arg` according to `format`
 */
export function sprintf(format: string, arg: FormatArg): string {
  return format.replace(
    VERB,
    (_match: string, flags: string, width: string | undefined, precision: string | undefined, verb: string) => {
      if (verb === "%") return "%";
      const spec: Spec = {
        minus: flags.includes("-"),
        plus: flags.includes("+"),
        space: flags.includes(" "),
        zero: flags.includes("0"),
        width: width ? parseInt(width, 10) : 0,
        precision: precision !== undefined ? parseInt(precision, 10) : undefined,
      };
      return formatOne(verb, spec, arg);
    }
  );
}

function formatOne(verb: string, spec: Spec, arg: FormatArg): string {
  switch (verb) {
    case "d":
    case "x":
    case "X":
    case "o":
    case "b": {
      const n = toInteger(arg);
      if (n === null) return badVerb(verb, arg);
      const radix = verb === "d" ? 10 : verb === "o" ? 8 : verb === "b" ? 2 : 16;
      let digits = (n < 0n ? -n : n).toString(radix);
      if (verb === "X") digits = digits.toUpperCase();
      return pad(withSign(digits, n < 0n, spec), spec, true);
    }

    case "f":
    case "F":
    case "e":
    case "E":
    case "g":
    case "G": {
      const x = toFloat(arg);
      if (x === null) return badVerb(verb, arg);
      if (!Number.isFinite(x)) return pad(nonFinite(x, spec), spec, false);
      const magnitude = Math.abs(x);
      let digits: string;
      if (verb === "f" || verb === "F") {
        digits = magnitude.toFixed(spec.precision ?? 6);
      } else if (verb === "e" || verb === "E") {
        digits = formatExponent(magnitude, spec.precision ?? 6);
      } else {
        digits = formatGeneral(magnitude, spec.precision, 6);
      }
      if (verb === "E" || verb === "G") digits = digits.toUpperCase();
      return pad(withSign(digits, x < 0 || Object.is(x, -0), spec), spec, true);
    }

    case "s":
    case "v": {
      let text = verb === "v" || typeof arg !== "string" ? plain(arg) : arg;
      if (spec.precision !== undefined) text = text.slice(0, spec.precision);
      return pad(text, spec, false);
    }

    case "q":
      return pad(JSON.stringify(String(arg)), spec, false);

    default:
      return badVerb(verb, arg);
  }
}

/**
 * Default rendering, the way %v prints
 */
function plain(arg: FormatArg): string {
  if (typeof arg === "number") {
    if (!Number.isFinite(arg)) return nonFinite(arg, { plus: false, space: false });
    const sign = arg < 0 ? "-" : "";
    return sign + formatGeneral(Math.abs(arg), undefined, 21);
  }
  return String(arg);
}

/**
 * %e body: mantissa with `precision` decimals and an exponent of at least
 * two digits
 */
function formatExponent(x: number, precision: number): string {
  const [mantissa, exponent] = x.toExponential(precision).split("e");
  return mantissa + exponentSuffix(parseInt(exponent, 10));
}

/**
 * %g body. Exponent form when exp < -4 or exp >= precision; trailing
 * zeros are dropped. Without a precision the shortest representation is
 * used and `shortestLimit` decides about the exponent form.
 */
function formatGeneral(x: number, precision: number | undefined, shortestLimit: number): string {
  if (x === 0) return "0";

  if (precision === undefined) {
    const [mantissa, exponent] = x.toExponential().split("e");
    const exp = parseInt(exponent, 10);
    if (exp < -4 || exp >= shortestLimit) {
      return mantissa + exponentSuffix(exp);
    }
    return x.toFixed(Math.max(0, mantissa.replace(".", "").length - 1 - exp));
  }

  const digits = Math.max(precision, 1);
  const [mantissa, exponent] = x.toExponential(digits - 1).split("e");
  const exp = parseInt(exponent, 10);
  if (exp < -4 || exp >= digits) {
    return trimZeros(mantissa) + exponentSuffix(exp);
  }
  return trimZeros(x.toFixed(Math.max(0, digits - 1 - exp)));
}

function exponentSuffix(exp: number): string {
  const sign = exp < 0 ? "-" : "+";
  return `e${sign}${String(Math.abs(exp)).padStart(2, "0")}`;
}

function trimZeros(digits: string): string {
  if (!digits.includes(".")) return digits;
  return digits.replace(/0+$/, "").replace(/\.$/, "");
}

function nonFinite(x: number, spec: Pick<Spec, "plus" | "space">): string {
  if (Number.isNaN(x)) return "NaN";
  if (x < 0) return "-Inf";
  return spec.plus || !spec.space ? "+Inf" : " Inf";
}

function withSign(digits: string, negative: boolean, spec: Spec): string {
  if (negative) return `-${digits}`;
  if (spec.plus) return `+${digits}`;
  if (spec.space) return ` ${digits}`;
  return digits;
}

function pad(text: string, spec: Spec, numeric: boolean): string {
  if (text.length >= spec.width) return text;
  if (spec.minus) return text.padEnd(spec.width, " ");
  if (spec.zero && numeric) {
    const sign = /^[-+ ]/.test(text) ? text[0] : "";
    return sign + text.slice(sign.length).padStart(spec.width - sign.length, "0");
  }
  return text.padStart(spec.width, " ");
}

function toInteger(arg: FormatArg): bigint | null {
  if (typeof arg === "bigint") return arg;
  if (typeof arg === "number" && Number.isFinite(arg)) return BigInt(Math.trunc(arg));
  return null;
}

function toFloat(arg: FormatArg): number | null {
  if (typeof arg === "number") return arg;
  if (typeof arg === "bigint") return Number(arg);
  return null;
}

function badVerb(verb: string, arg: FormatArg): string {
  return `%!${verb}(${typeof arg}=${String(arg)})`;
}
