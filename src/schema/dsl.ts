/**
 * Schema DSL
 *
 * Small constructors for type descriptors:
 *
 *   const Obs = t.record("Obs", {
 *     Age: t.int(),
 *     Height: t.float(),
 *     Partner: t.ptr(Person),
 *   }, [
 *     method("BMI", [t.float()]),
 *     method("Fancy", [t.int(), t.error]),
 *   ]);
 */

import type {
  BoolType,
  ComplexType,
  ComplexWidth,
  DurationType,
  ErrorType,
  FieldDescriptor,
  FloatType,
  FloatWidth,
  IntType,
  IntWidth,
  MethodDescriptor,
  OpaqueType,
  PointerType,
  RecordType,
  Ref,
  StringType,
  TimeType,
  TypeDescriptor,
} from "./types.js";

const bool: BoolType = { tag: "bool" };
const string: StringType = { tag: "string" };
const time: TimeType = { tag: "time" };
const duration: DurationType = { tag: "duration" };
const error: ErrorType = { tag: "error" };

function int(bits: IntWidth = 64): IntType {
  return { tag: "int", bits, unsigned: false };
}

function uint(bits: IntWidth = 64): IntType {
  return { tag: "int", bits, unsigned: true };
}

function float(bits: FloatWidth = 64): FloatType {
  return { tag: "float", bits };
}

function complex(bits: ComplexWidth = 128): ComplexType {
  return { tag: "complex", bits };
}

function ptr(elem: TypeDescriptor): PointerType {
  return { tag: "ptr", elem };
}

function record(
  name: string,
  fields: Record<string, TypeDescriptor> | readonly FieldDescriptor[],
  methods: readonly MethodDescriptor[] = []
): RecordType {
  const list = isFieldList(fields)
    ? [...fields]
    : Object.entries(fields).map(([fieldName, type]) => ({ name: fieldName, type }));
  return { tag: "record", name, fields: list, methods };
}

function opaque(name: string, methods: readonly MethodDescriptor[] = []): OpaqueType {
  return { tag: "opaque", name, methods };
}

function isFieldList(
  fields: Record<string, TypeDescriptor> | readonly FieldDescriptor[]
): fields is readonly FieldDescriptor[] {
  return Array.isArray(fields);
}

export const t = {
  bool,
  string,
  time,
  duration,
  error,
  int,
  uint,
  float,
  complex,
  ptr,
  record,
  opaque,
};

export interface MethodOptions {
  /** Parameter types; anything non-empty is rejected by the path compiler */
  params?: readonly TypeDescriptor[];
  /** Implementation used instead of the receiver's own member */
  call?: (receiver: unknown) => unknown;
}

/**
 * Declare an accessor
 */
export function method(
  name: string,
  results: readonly TypeDescriptor[],
  options: MethodOptions = {}
): MethodDescriptor {
  return { name, params: options.params ?? [], results, call: options.call };
}

/**
 * Give a scalar type a name and a method set, e.g. a uint8 named Clarity
 * with a Label accessor
 */
export function named<T extends Exclude<TypeDescriptor, PointerType>>(
  base: T,
  name: string,
  methods: readonly MethodDescriptor[] = []
): T {
  return { ...base, name, methods };
}

/**
 * Wrap a value as one outer pointer layer
 */
export function ref<T>(current: T): Ref<T> {
  return { current };
}
