// stats/src/distribution.ts
// Histograms and value counts computed inside the store (push-down aggregation).
// Only aggregates and a bounded display sample ever leave DuckDB.

import { Maybe, ok, unavailable } from "../../runtime/src";
import { NULL_LABEL, Session, firstRow, ident, literal, toCount, toNumber, toText } from "../../store/src";
import type { HistogramBin, HistogramResult, ValueCount } from "./types";

/**
 * The column as DOUBLE, with NaN and ±Infinity mapped to NULL so that every
 * numeric aggregate sees only finite values, as the in-memory paths do.
 */
export function asDouble(column: string): string {
  const x = `CAST(${ident(column)} AS DOUBLE)`;
  return `(CASE WHEN isfinite(${x}) THEN ${x} END)`;
}

export type Range = { min: number; max: number; count: number };

/** MIN/MAX/COUNT over the finite values of a column; undefined when there are none. */
export async function valueRange(s: Session, table: string, column: string): Promise<Range | undefined> {
  const x = asDouble(column);
  const r = firstRow(await s.all(`SELECT MIN(${x}) AS min_val, MAX(${x}) AS max_val, COUNT(${x}) AS n FROM ${ident(table)}`));
  const min = toNumber(r.min_val);
  const max = toNumber(r.max_val);
  const count = toCount(r.n);
  if (min == null || max == null || count === 0) return undefined;
  return { min, max, count };
}

/**
 * Uniform-width bin counts anchored at `min`: index = floor((v − min) / width).
 * The maximum lands in index `bins` (a bin starting at max) exactly as the
 * formula gives; callers order or truncate as they need.
 */
export async function binCounts(
  s: Session,
  table: string,
  column: string,
  min: number,
  width: number,
  order: "index" | "count" = "index",
  limit?: number
): Promise<Array<{ index: number; count: number }>> {
  const orderBy = order === "index" ? "idx" : "n DESC, idx";
  const rows = await s.all(
    `SELECT FLOOR((${asDouble(column)} - $1::DOUBLE) / $2::DOUBLE) AS idx, COUNT(*) AS n
     FROM ${ident(table)}
     WHERE ${asDouble(column)} IS NOT NULL
     GROUP BY idx
     ORDER BY ${orderBy}${limit != null ? ` LIMIT ${Math.floor(limit)}` : ""}`,
    [min, width]
  );
  return rows.map((r) => ({ index: toNumber(r.idx) ?? 0, count: toCount(r.n) }));
}

/** Engine-native reservoir sample of finite values, display only. */
export async function sampleValues(s: Session, table: string, column: string, size: number): Promise<number[]> {
  const n = Math.floor(size);
  if (n <= 0) return [];
  const rows = await s.all(
    `SELECT v FROM (
       SELECT ${asDouble(column)} AS v FROM ${ident(table)} WHERE ${asDouble(column)} IS NOT NULL
     ) USING SAMPLE reservoir(${n} ROWS)`
  );
  const out: number[] = [];
  for (const r of rows) {
    const v = toNumber(r.v);
    if (v != null) out.push(v);
  }
  return out;
}

export async function histogram(
  s: Session,
  table: string,
  column: string,
  bins: number,
  sampleSize: number
): Promise<Maybe<HistogramResult>> {
  const range = await valueRange(s, table, column);
  if (!range) return unavailable("no_values");

  const width = (range.max - range.min) / bins;
  if (width === 0) return unavailable("constant_column");

  const counts = await binCounts(s, table, column, range.min, width);
  const out: HistogramBin[] = counts.map((c) => ({ start: range.min + c.index * width, count: c.count }));
  const sample = await sampleValues(s, table, column, Math.min(sampleSize, range.count));

  return ok({
    min: range.min,
    max: range.max,
    binWidth: width,
    nonNullCount: range.count,
    bins: out,
    sample,
  });
}

/** Top-k values by count (ties by value); nulls are counted under "<NA>". */
export async function valueCounts(s: Session, table: string, column: string, topK: number): Promise<ValueCount[]> {
  const rows = await s.all(
    `SELECT COALESCE(CAST(${ident(column)} AS VARCHAR), ${literal(NULL_LABEL)}) AS value,
            COUNT(*) AS n,
            COUNT(*)::DOUBLE / SUM(COUNT(*)) OVER () AS share
     FROM ${ident(table)}
     GROUP BY ${ident(column)}
     ORDER BY n DESC, value
     LIMIT ${Math.floor(topK)}`
  );
  return rows.map((r) => ({ value: toText(r.value), count: toCount(r.n), share: toNumber(r.share) ?? 0 }));
}
