/**
 * Type Classifier
 *
 * Maps a type descriptor to the kind of value a column produces.
 * The kind belongs to the compiled path, not to individual rows.
 */

import type { MethodDescriptor, TypeDescriptor } from "../schema/types.js";
import { methodsOf } from "../schema/types.js";

/**
 * Value kinds. "na" means the type cannot be exported as is.
 */
export type ValueKind = "na" | "bool" | "int" | "float" | "complex" | "string" | "time" | "duration";

/** Kinds a compiled path can actually produce */
export type LeafKind = Exclude<ValueKind, "na">;

/**
 * Classify a (pointer-free) type
 */
export function classify(type: TypeDescriptor): ValueKind {
  // Durations are integers underneath; they must win over "int".
  if (type.tag === "duration") return "duration";

  switch (type.tag) {
    case "bool":
      return "bool";
    case "int":
      return "int";
    case "float":
      return "float";
    case "complex":
      return "complex";
    case "string":
      return "string";
    case "time":
      return "time";
    case "error":
    case "ptr":
    case "record":
    case "opaque":
      return "na";
  }
}

/**
 * Whether an integer type must be read unsigned
 */
export function isUnsigned(type: TypeDescriptor): boolean {
  return type.tag === "int" && type.unsigned;
}

/**
 * The canonical string conversion of a type: `toString()` returning a string
 */
export function findStringer(type: TypeDescriptor): MethodDescriptor | undefined {
  return methodsOf(type).find(
    (m) => m.name === "toString" && m.params.length === 0 && m.results.length === 1 && m.results[0].tag === "string"
  );
}

/**
 * Human readable kind name
 */
export function kindName(kind: ValueKind): string {
  switch (kind) {
    case "na":
      return "NA";
    case "bool":
      return "Bool";
    case "int":
      return "Int";
    case "float":
      return "Float";
    case "complex":
      return "Complex";
    case "string":
      return "String";
    case "time":
      return "Time";
    case "duration":
      return "Duration";
  }
}
