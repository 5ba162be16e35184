// store/src/values.ts
// Coercion of driver values (number | bigint | string | Date | null ...) into plain JS.

import { StoreError } from "../../runtime/src";

/** Finite number, or null for NULL / NaN / ±Infinity / non-numeric values. */
export function toNumber(v: unknown): number | null {
  if (v == null) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "bigint") return Number(v);
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Integer counts; NULL counts as 0 (SUM over zero rows). */
export function toCount(v: unknown): number {
  const n = toNumber(v);
  return n == null ? 0 : Math.round(n);
}

export function toText(v: unknown): string {
  if (v == null) return "";
  if (typeof v === "string") return v;
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

/** First row of an aggregate query, which always yields exactly one. */
export function firstRow<T>(rows: T[]): T {
  const row = rows[0];
  if (row === undefined) throw new StoreError("aggregate query returned no rows");
  return row;
}
