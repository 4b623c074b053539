/**
 * Type descriptors for record schemas
 *
 * TypeScript types are gone at run time, so the shape of a record is
 * described by plain data instead. The path compiler only ever looks at
 * these descriptors; the values themselves are touched by the executor.
 */

export type IntWidth = 8 | 16 | 32 | 64;
export type FloatWidth = 32 | 64;
export type ComplexWidth = 64 | 128;

/**
 * Name and method set shared by every non-pointer descriptor
 */
interface Named {
  name?: string;
  methods?: readonly MethodDescriptor[];
}

export interface BoolType extends Named {
  tag: "bool";
}

export interface IntType extends Named {
  tag: "int";
  bits: IntWidth;
  unsigned: boolean;
}

export interface FloatType extends Named {
  tag: "float";
  bits: FloatWidth;
}

export interface ComplexType extends Named {
  tag: "complex";
  bits: ComplexWidth;
}

export interface StringType extends Named {
  tag: "string";
}

/** A calendar timestamp, held as a Date */
export interface TimeType extends Named {
  tag: "time";
}

/** Elapsed time in nanoseconds */
export interface DurationType extends Named {
  tag: "duration";
}

/** The failure slot of a fallible accessor */
export interface ErrorType extends Named {
  tag: "error";
}

/**
 * An optional reference. Nil is null or undefined at run time.
 */
export interface PointerType {
  tag: "ptr";
  elem: TypeDescriptor;
}

export interface RecordType extends Named {
  tag: "record";
  name: string;
  fields: readonly FieldDescriptor[];
}

/** Anything the exporter cannot look into: byte buffers, maps, foreign classes */
export interface OpaqueType extends Named {
  tag: "opaque";
  name: string;
}

export type TypeDescriptor =
  | BoolType
  | IntType
  | FloatType
  | ComplexType
  | StringType
  | TimeType
  | DurationType
  | ErrorType
  | PointerType
  | RecordType
  | OpaqueType;

export interface FieldDescriptor {
  name: string;
  type: TypeDescriptor;
}

/**
 * An accessor on a type.
 *
 * Without `call`, the executor invokes the receiver's own member of the
 * same name. Accessors with two results return `[value, failure]`.
 */
export interface MethodDescriptor {
  name: string;
  params: readonly TypeDescriptor[];
  results: readonly TypeDescriptor[];
  call?: (receiver: unknown) => unknown;
}

/**
 * Outer layer of a multi-level pointer. The innermost layer of a pointer
 * chain holds its pointee directly.
 */
export interface Ref<T> {
  current: T;
}

export interface Complex {
  re: number;
  im: number;
}

/**
 * Strip all pointer layers off a type
 */
export function stripPointers(type: TypeDescriptor): { type: TypeDescriptor; indirections: number } {
  let indirections = 0;
  let current = type;
  while (current.tag === "ptr") {
    current = current.elem;
    indirections++;
  }
  return { type: current, indirections };
}

/**
 * Methods declared on a type; pointers have none of their own
 */
export function methodsOf(type: TypeDescriptor): readonly MethodDescriptor[] {
  if (type.tag === "ptr") return [];
  return type.methods ?? [];
}

/**
 * Display name of a type, e.g. `uint8`, `*Obs`, `complex128`
 */
export function typeName(type: TypeDescriptor): string {
  if (type.tag === "ptr") return `*${typeName(type.elem)}`;
  if (type.name) return type.name;

  switch (type.tag) {
    case "int":
      return `${type.unsigned ? "u" : ""}int${type.bits}`;
    case "float":
      return `float${type.bits}`;
    case "complex":
      return `complex${type.bits}`;
    case "bool":
    case "string":
    case "time":
    case "duration":
    case "error":
      return type.tag;
    case "record":
    case "opaque":
      return type.name;
  }
}

/**
 * Type identity.
 *
 * Records and opaque types are nominal: only the same descriptor object
 * is the same type. Everything else compares structurally.
 */
export function sameType(a: TypeDescriptor, b: TypeDescriptor): boolean {
  if (a === b) return true;

  switch (a.tag) {
    case "ptr":
      return b.tag === "ptr" && sameType(a.elem, b.elem);
    case "record":
    case "opaque":
      return false;
    case "int":
      return b.tag === "int" && a.bits === b.bits && a.unsigned === b.unsigned && a.name === b.name;
    case "float":
      return b.tag === "float" && a.bits === b.bits && a.name === b.name;
    case "complex":
      return b.tag === "complex" && a.bits === b.bits && a.name === b.name;
    case "bool":
    case "string":
    case "time":
    case "duration":
    case "error":
      return b.tag !== "ptr" && b.tag === a.tag && a.name === b.name;
  }
}
