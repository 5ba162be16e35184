// store/src/preview.ts
// First rows of a dataset table, with driver values made JSON-safe.

import type { Session } from "./driver";
import { describeTable } from "./schema";
import { ident } from "./sql";

export type PlainValue = string | number | boolean | null;

export type Preview = {
  columns: string[];
  rows: PlainValue[][];
};

export async function preview(s: Session, table: string, limit: number): Promise<Preview> {
  const schema = await describeTable(s, table);
  const columns = schema.columns.map((c) => c.columnName);
  const rows = await s.all(`SELECT * FROM ${ident(table)} LIMIT ${Math.max(0, Math.floor(limit))}`);
  return {
    columns,
    rows: rows.map((r) => columns.map((c) => plain(r[c]))),
  };
}

export function plain(v: unknown): PlainValue {
  if (v == null) return null;
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : String(v);
  if (typeof v === "bigint") return Number.isSafeInteger(Number(v)) ? Number(v) : v.toString();
  if (v instanceof Date) return v.toISOString();
  return String(v);
}
