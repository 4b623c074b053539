/**
 * recdump Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Schemas
export { t, method, named, ref, type MethodOptions } from "./schema/dsl.js";
export {
  sameType,
  stripPointers,
  typeName,
  type Complex,
  type FieldDescriptor,
  type MethodDescriptor,
  type RecordType,
  type Ref,
  type TypeDescriptor,
} from "./schema/types.js";
export { parseSchema, loadSchema, type Schema, type SchemaDocument } from "./schema/schema-file.js";

// Extraction
export { classify, isUnsigned, kindName, type LeafKind, type ValueKind } from "./export/kind.js";
export { compilePath, type CompiledPath, type Step, type FieldStep, type CallStep } from "./export/path.js";
export { execute, deref, type Value } from "./export/access.js";
export {
  Column,
  Extractor,
  collection,
  newExtractor,
  type Collection,
  type ExtractorOptions,
} from "./export/extractor.js";
export { ExportError, PathError, BindError, SchemaError, type ExportErrorCode } from "./export/errors.js";

// Formatting
export {
  Format,
  DefaultFormat,
  PreciseFormat,
  RFormat,
  formatValue,
  type Formatter,
  type FormatOptions,
  type FormatPreset,
} from "./format/format.js";
export { sprintf } from "./format/verbs.js";
export { formatDuration } from "./format/duration.js";

// Output
export type { Dumper } from "./dump/dumper.js";
export { CSVDumper, type CSVDumperOptions } from "./dump/csv.js";
export { TabDumper, type TabDumperOptions } from "./dump/tab.js";
export { RVecDumper, type RVecDumperOptions } from "./dump/rvec.js";
export { SqliteDumper, type SqliteDumperOptions } from "./dump/sqlite.js";

// Config
export { loadConfig, resolveFormat, type Config } from "./config.js";
