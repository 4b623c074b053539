/**
 * Human readable durations, e.g. "1h2m3.5s", "1.5ms", "0s"
 */

const MICROSECOND = 1_000n;
const MILLISECOND = 1_000_000n;
const SECOND = 1_000_000_000n;
const MINUTE = 60n * SECOND;
const HOUR = 60n * MINUTE;

/**
 * Format a duration given in nanoseconds
 */
export function formatDuration(ns: bigint): string {
  if (ns === 0n) return "0s";

  const negative = ns < 0n;
  let rest = negative ? -ns : ns;
  let text: string;

  if (rest < SECOND) {
    if (rest < MICROSECOND) {
      text = `${rest}ns`;
    } else if (rest < MILLISECOND) {
      text = `${fraction(rest, MICROSECOND)}µs`;
    } else {
      text = `${fraction(rest, MILLISECOND)}ms`;
    }
  } else {
    const hours = rest / HOUR;
    rest %= HOUR;
    const minutes = rest / MINUTE;
    rest %= MINUTE;
    const seconds = `${fraction(rest, SECOND)}s`;

    if (hours > 0n) {
      text = `${hours}h${minutes}m${seconds}`;
    } else if (minutes > 0n) {
      text = `${minutes}m${seconds}`;
    } else {
      text = seconds;
    }
  }

  return negative ? `-${text}` : text;
}

/**
 * value / unit as a decimal without trailing zeros
 */
function fraction(value: bigint, unit: bigint): string {
  const whole = value / unit;
  const remainder = value % unit;
  if (remainder === 0n) return whole.toString();

  const places = unit.toString().length - 1;
  const decimals = remainder.toString().padStart(places, "0").replace(/0+$/, "");
  return `${whole}.${decimals}`;
}
