/**
 * Structured error types for table loading and access
 */

/** Error codes */
export type TableErrorCode =
  | "FileNotFound"
  | "ExtensionMismatch"
  | "ReadError"
  | "FieldNotFound"
  | "RowNotFound"
  | "ColumnNotFound"
  | "CellNotFound";

/** Error thrown by TableParser loads and accessors */
export class TableError extends Error {
  override readonly name = "TableError";
  /** Specific error code */
  readonly code: TableErrorCode;

  constructor(code: TableErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/**
 * Check whether a value is a TableError, optionally of a given code.
 */
export function isTableError(value: unknown, code?: TableErrorCode): value is TableError {
  return value instanceof TableError && (code === undefined || value.code === code);
}
