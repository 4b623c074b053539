/**
 * Error types for the exporter
 *
 * Compile-time problems (bad column specs, bad schemas) are recoverable:
 * the caller can fix the column spec and try again. Binding an extractor to data
 * of another type is a contract violation and is not.
 *
 * A nil pointer or a failing accessor met while reading a row is not an
 * error at all; that cell is simply absent.
 */

export type ExportErrorCode =
  | "EMPTY_SEGMENT"
  | "NO_SUCH_MEMBER"
  | "BAD_SIGNATURE"
  | "UNSUPPORTED_TERMINAL"
  | "BIND_TYPE_MISMATCH"
  | "UNSUPPORTED_INPUT"
  | "INVALID_SCHEMA";

/**
 * Base class of all exporter errors
 */
export class ExportError extends Error {
  constructor(
    message: string,
    public code: ExportErrorCode,
    public recoverable: boolean = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A column spec that cannot be compiled against the record type
 */
export class PathError extends ExportError {
  constructor(
    message: string,
    code: ExportErrorCode,
    public spec: string,
    public segment: string,
  ) {
    super(`export: ${message}`, code);
  }
}

/**
 * Rebinding an extractor to a collection of a different element type
 */
export class BindError extends ExportError {
  constructor(
    public expected: string,
    public actual: string,
  ) {
    super(
      `export: cannot bind extractor for ${expected} to data of type ${actual}`,
      "BIND_TYPE_MISMATCH",
      false,
    );
  }
}

/**
 * A JSON schema document that does not describe a usable type
 */
export class SchemaError extends ExportError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(`schema: ${message}`, "INVALID_SCHEMA");
  }
}
