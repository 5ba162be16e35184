// store/src/schema.ts
// Schema inspection and the numeric/categorical column classifier.
// The kind is decided once per schema fetch from the declared type; engines
// switch on `kind` and never parse type strings themselves.

import type { Session } from "./driver";
import { ident } from "./sql";
import { toText } from "./values";

export type ColumnKind = "numeric" | "categorical";

export type ColumnInfo = {
  columnName: string;
  columnType: string;       // declared DuckDB type, e.g. "BIGINT", "DECIMAL(18,3)"
  kind: ColumnKind;
};

export type TableSchema = {
  table: string;
  columns: ColumnInfo[];
};

const NUMERIC_TYPES = new Set([
  "TINYINT", "SMALLINT", "INTEGER", "BIGINT", "HUGEINT",
  "UTINYINT", "USMALLINT", "UINTEGER", "UBIGINT", "UHUGEINT",
  "FLOAT", "REAL", "DOUBLE", "DECIMAL", "NUMERIC",
  // aliases DuckDB may echo back
  "INT1", "INT2", "INT4", "INT8", "INT", "LONG", "SHORT", "FLOAT4", "FLOAT8",
]);

/** Classify a declared type; parameters such as DECIMAL(18,3) are ignored. */
export function classifyType(columnType: string): ColumnKind {
  const base = columnType.trim().toUpperCase().replace(/\s*\(.*$/, "");
  return NUMERIC_TYPES.has(base) ? "numeric" : "categorical";
}

export async function describeTable(s: Session, table: string): Promise<TableSchema> {
  const rows = await s.all(`DESCRIBE SELECT * FROM ${ident(table)}`);
  return {
    table,
    columns: rows.map((r) => {
      const columnType = toText(r.column_type);
      return { columnName: toText(r.column_name), columnType, kind: classifyType(columnType) };
    }),
  };
}

export function findColumn(schema: TableSchema, name: string): ColumnInfo | undefined {
  return schema.columns.find((c) => c.columnName === name);
}

export function hasColumn(schema: TableSchema, name: string): boolean {
  return findColumn(schema, name) !== undefined;
}

export function numericColumns(schema: TableSchema): string[] {
  return schema.columns.filter((c) => c.kind === "numeric").map((c) => c.columnName);
}

export function kindOf(schema: TableSchema, name: string): ColumnKind | undefined {
  return findColumn(schema, name)?.kind;
}
