/**
 * Path Compiler
 *
 * Turns a dotted column spec like "Outer.Inner.Field" into a list of
 * access steps over a record type. All type checking happens here, once
 * per column; the executor just follows the recipe for every row.
 */

import type { MethodDescriptor, TypeDescriptor } from "../schema/types.js";
import { methodsOf, stripPointers, typeName } from "../schema/types.js";
import { classify, findStringer, isUnsigned, type LeafKind } from "./kind.js";
import { PathError } from "./errors.js";

/**
 * Read a member of a record, then follow `indirections` pointer layers
 */
export interface FieldStep {
  tag: "field";
  name: string;
  indirections: number;
  /** Member type with pointer layers stripped */
  type: TypeDescriptor;
}

/**
 * Invoke a zero-argument accessor
 */
export interface CallStep {
  tag: "call";
  name: string;
  /** Accessor returns [value, failure] */
  mayFail: boolean;
  indirections: number;
  method: MethodDescriptor;
  /** First result type with pointer layers stripped */
  type: TypeDescriptor;
  /** Appended string conversion, not named in the column spec */
  synthetic: boolean;
}

export type Step = FieldStep | CallStep;

export interface CompiledPath {
  readonly spec: string;
  readonly name: string;
  readonly steps: readonly Step[];
  readonly kind: LeafKind;
  /** Integer paths only */
  readonly unsigned: boolean;
  /** Integer or float width; 0 for other kinds */
  readonly bits: number;
  /** Some step follows a pointer or may fail */
  readonly mayBeAbsent: boolean;
}

/**
 * Compile a column spec against a (pointer-free) record type
 *
 * @throws PathError if a segment cannot be resolved or the final type
 *   cannot be exported
 */
export function compilePath(startType: TypeDescriptor, spec: string): CompiledPath {
  const segments = spec.split(".");
  const steps: Step[] = [];
  let current = startType;

  for (const segment of segments) {
    if (segment === "") {
      throw new PathError(`empty segment in column spec "${spec}"`, "EMPTY_SEGMENT", spec, segment);
    }
    const step = resolveField(current, segment) ?? resolveCall(current, segment, spec);
    if (!step) {
      throw new PathError(
        `no such field or accessor ${segment} in ${typeName(current)}`,
        "NO_SUCH_MEMBER",
        spec,
        segment
      );
    }
    steps.push(step);
    current = step.type;
  }

  let kind = classify(current);
  if (kind === "na") {
    const stringer = findStringer(current);
    if (!stringer) {
      throw new PathError(
        `cannot use ${typeName(current)} as final element of "${spec}"`,
        "UNSUPPORTED_TERMINAL",
        spec,
        segments[segments.length - 1]
      );
    }
    steps.push({
      tag: "call",
      name: stringer.name,
      mayFail: false,
      indirections: 0,
      method: stringer,
      type: stringer.results[0],
      synthetic: true,
    });
    kind = "string";
  }

  return Object.freeze({
    spec,
    name: segments.join("."),
    steps: Object.freeze(steps),
    kind,
    unsigned: kind === "int" && isUnsigned(current),
    bits: current.tag === "int" || current.tag === "float" ? current.bits : 0,
    mayBeAbsent: steps.some((s) => s.indirections > 0 || (s.tag === "call" && s.mayFail)),
  });
}

function resolveField(type: TypeDescriptor, name: string): FieldStep | null {
  if (type.tag !== "record") return null;

  const field = type.fields.find((f) => f.name === name);
  if (!field) return null;

  const { type: target, indirections } = stripPointers(field.type);
  return { tag: "field", name, indirections, type: target };
}

/**
 * Accessors must look like `() => T` or `() => [T, error]`
 */
function resolveCall(type: TypeDescriptor, name: string, spec: string): CallStep | null {
  const method = methodsOf(type).find((m) => m.name === name);
  if (!method) return null;

  const { params, results } = method;
  if (params.length !== 0 || (results.length !== 1 && results.length !== 2)) {
    throw new PathError(
      `cannot use accessor ${name} of ${typeName(type)}: want no parameters and one or two results`,
      "BAD_SIGNATURE",
      spec,
      name
    );
  }

  let mayFail = false;
  if (results.length === 2) {
    if (results[1].tag !== "error") {
      throw new PathError(
        `cannot use accessor ${name} of ${typeName(type)}: second result is ${typeName(results[1])}, not error`,
        "BAD_SIGNATURE",
        spec,
        name
      );
    }
    mayFail = true;
  }

  const { type: target, indirections } = stripPointers(results[0]);
  return { tag: "call", name, mayFail, indirections, method, type: target, synthetic: false };
}
