// runtime/src/errors.ts
// Error taxonomy shared by the store, the stats engines and the engine facade.
//
//   ValidationError   caller-correctable (unknown dataset/column, bad argument);
//                     returned as { status: "invalid" } at the engine boundary
//   SourceParseError  malformed CSV/Parquet during ingest; thrown
//   StoreError        the analytic store cannot be opened, written or queried; thrown

export type ValidationCode =
  | "dataset_not_found"
  | "column_not_found"
  | "column_not_numeric"
  | "insufficient_columns"
  | "no_columns"
  | "invalid_argument"
  | "unsupported_format";

export class EngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends EngineError {
  declare readonly code: ValidationCode;
  readonly details: Record<string, unknown>;

  constructor(code: ValidationCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message);
    this.details = details;
  }
}

export class SourceParseError extends EngineError {
  readonly source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super("source_parse", message, { cause });
    this.source = source;
  }
}

export class StoreError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super("store", message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* ------------------------------ constructors ------------------------------ */

export const columnNotFound = (column: string, table: string) =>
  new ValidationError("column_not_found", `Column '${column}' not found`, { column, table });

export const datasetNotFound = (datasetId: string) =>
  new ValidationError("dataset_not_found", `Dataset '${datasetId}' not found`, { datasetId });

export const invalidArgument = (name: string, value: unknown, expected: string) =>
  new ValidationError("invalid_argument", `Invalid ${name}: expected ${expected}`, { name, value });
