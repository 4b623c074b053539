/**
 * Path Executor
 *
 * Walks a compiled path over one record. The first nil pointer or failing
 * accessor ends the walk and the cell is absent (null); nothing after it is
 * evaluated.
 */

import type { Complex } from "../schema/types.js";
import type { CallStep, CompiledPath } from "./path.js";

/**
 * A kind-tagged leaf value
 */
export type Value =
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "complex"; value: Complex }
  | { kind: "string"; value: string }
  | { kind: "time"; value: Date }
  | { kind: "duration"; value: bigint };

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Follow `levels` pointer layers. Returns null on nil.
 *
 * The innermost layer holds the pointee; outer layers are Refs.
 */
export function deref(value: unknown, levels: number): unknown {
  let current = value;
  for (let i = 0; i < levels; i++) {
    if (current === null || current === undefined) return null;
    if (i < levels - 1) {
      if (typeof current !== "object") return null;
      current = Reflect.get(current, "current");
    }
  }
  if (current === undefined) return null;
  return current;
}

/**
 * Retrieve the value of `path` from `record`
 *
 * @param primaryIndirection - pointer layers of the collection element
 *   itself, e.g. 1 for a collection of nullable records
 */
export function execute(record: unknown, path: CompiledPath, primaryIndirection: number): Value | null {
  let current = deref(record, primaryIndirection);
  if (current === null) return null;

  for (const step of path.steps) {
    if (step.tag === "call") {
      const result = invoke(current, step);
      if (result === null) return null;
      current = result.value;
    } else {
      if (typeof current !== "object" && typeof current !== "function") return null;
      if (current === null) return null;
      current = Reflect.get(current, step.name);
    }

    current = deref(current, step.indirections);
    if (current === null) return null;
  }

  return convert(current, path);
}

/**
 * Call an accessor. Null means the call failed or the receiver has no
 * such member.
 */
function invoke(receiver: unknown, step: CallStep): { value: unknown } | null {
  let result: unknown;
  if (step.method.call) {
    result = step.method.call(receiver);
  } else {
    const fn: unknown = Reflect.get(Object(receiver), step.name);
    if (typeof fn !== "function") return null;
    result = Reflect.apply(fn, receiver, []);
  }

  if (!step.mayFail) return { value: result };

  if (!Array.isArray(result)) return null;
  const [value, failure]: unknown[] = result;
  if (isFailure(failure)) return null;
  return { value };
}

/**
 * Only a non-empty failure slot fails the call: null, undefined, false,
 * 0 and "" all mean success.
 */
function isFailure(failure: unknown): boolean {
  return !(
    failure === null ||
    failure === undefined ||
    failure === false ||
    failure === 0 ||
    failure === 0n ||
    failure === ""
  );
}

/**
 * Convert a leaf to the kind fixed at compile time. Values that do not
 * have the declared shape are treated as absent.
 */
function convert(raw: unknown, path: CompiledPath): Value | null {
  switch (path.kind) {
    case "bool":
      return typeof raw === "boolean" ? { kind: "bool", value: raw } : null;

    case "int": {
      const n = toBigInt(raw);
      if (n === null) return null;
      const value = path.unsigned ? BigInt.asUintN(path.bits, n) : BigInt.asIntN(path.bits, n);
      return { kind: "int", value };
    }

    case "float": {
      const x = typeof raw === "bigint" ? Number(raw) : raw;
      if (typeof x !== "number") return null;
      const float = path.bits === 32 ? Math.fround(x) : x;
      return { kind: "float", value: float };
    }

    case "complex": {
      if (typeof raw !== "object" || raw === null) return null;
      const re: unknown = Reflect.get(raw, "re");
      const im: unknown = Reflect.get(raw, "im");
      if (typeof re !== "number" || typeof im !== "number") return null;
      return { kind: "complex", value: { re, im } };
    }

    case "string":
      return typeof raw === "string" ? { kind: "string", value: raw } : null;

    case "time": {
      const date = toDate(raw);
      return date ? { kind: "time", value: date } : null;
    }

    case "duration": {
      const n = toBigInt(raw);
      return n === null ? null : { kind: "duration", value: BigInt.asIntN(64, n) };
    }
  }
}

/**
 * Numbers outside the safe integer range have already lost digits, so they
 * are rejected; wide integers must come as bigint or decimal text.
 */
function toBigInt(raw: unknown): bigint | null {
  if (typeof raw === "bigint") return raw;
  if (typeof raw === "number") {
    const whole = Math.trunc(raw);
    return Number.isSafeInteger(whole) ? BigInt(whole) : null;
  }
  if (typeof raw === "string" && INTEGER_TEXT.test(raw)) return BigInt(raw);
  return null;
}

function toDate(raw: unknown): Date | null {
  let date: Date;
  if (raw instanceof Date) {
    date = raw;
  } else if (typeof raw === "string" || typeof raw === "number") {
    date = new Date(raw);
  } else {
    return null;
  }
  return Number.isNaN(date.getTime()) ? null : date;
}
