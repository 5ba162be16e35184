// stats/src/drift.ts
// Population-drift table between a reference and a current dataset.
// Quantile edges, bucket counts and category counts are computed in the
// store; only the aligned count vectors reach the PSI formula.

import {
  ColumnInfo,
  Session,
  TableSchema,
  findColumn,
  firstRow,
  ident,
  literal,
  toCount,
  toNumber,
  toText,
} from "../../store/src";
import { asDouble } from "./distribution";
import { PSI_NA, alignCategories, psiFromBucketCounts, psiFromCounts, quantileLevels, uniqueEdges } from "./psi";
import type { PsiRow } from "./types";

export const PSI_FLAG_THRESHOLD = 0.2;

export type DriftOptions = {
  bins?: number;            // quantile bins for numeric columns (default 10)
  threshold?: number;       // flag rows with psi above this (default 0.2)
};

/** Values a side contributes: finite numbers for numeric drift, any non-null value otherwise. */
async function valueCount(s: Session, table: string, column: string, kind: "numeric" | "categorical"): Promise<number> {
  const expr = kind === "numeric" ? asDouble(column) : ident(column);
  const r = firstRow(await s.all(`SELECT COUNT(${expr}) AS n FROM ${ident(table)}`));
  return toCount(r.n);
}

/** Reference quantiles at 0, 1/bins, ..., 1; empty when the column has no values. */
async function referenceQuantiles(s: Session, table: string, column: string, bins: number): Promise<number[]> {
  const x = asDouble(column);
  const levels = quantileLevels(bins);
  const select = levels.map((q, i) => `QUANTILE_CONT(${x}, ${q}) AS q${i}`).join(", ");
  const r = firstRow(await s.all(`SELECT ${select} FROM ${ident(table)}`));
  const out: number[] = [];
  for (let i = 0; i < levels.length; i++) {
    const v = toNumber(r[`q${i}`]);
    if (v != null) out.push(v);
  }
  return out;
}

/**
 * Counts per bucket [e0, e1], (e1, e2], ..., (e_{m-1}, e_m]; values outside
 * the reference range fall in no bucket.
 */
async function bucketCountsSql(s: Session, table: string, column: string, edges: number[]): Promise<number[]> {
  const x = asDouble(column);
  const last = edges.length - 1;
  const whens: string[] = [];
  for (let i = 0; i < last; i++) whens.push(`WHEN ${x} <= $${i + 2}::DOUBLE THEN ${i}`);
  const rows = await s.all(
    `SELECT b, COUNT(*) AS n FROM (
       SELECT CASE WHEN ${x} < $1::DOUBLE OR ${x} > $${last + 1}::DOUBLE THEN NULL ${whens.join(" ")} END AS b
       FROM ${ident(table)}
       WHERE ${x} IS NOT NULL
     )
     WHERE b IS NOT NULL
     GROUP BY b`,
    edges
  );
  const counts = new Array<number>(last).fill(0);
  for (const r of rows) {
    const b = toNumber(r.b);
    if (b != null && b >= 0 && b < last) counts[b] = toCount(r.n);
  }
  return counts;
}

async function categoryCountsSql(s: Session, table: string, column: string): Promise<Map<string, number>> {
  const rows = await s.all(
    `SELECT COALESCE(CAST(${ident(column)} AS VARCHAR), ${literal(PSI_NA)}) AS value, COUNT(*) AS n
     FROM ${ident(table)}
     GROUP BY value`
  );
  const m = new Map<string, number>();
  for (const r of rows) m.set(toText(r.value), toCount(r.n));
  return m;
}

export async function numericPsi(s: Session, refTable: string, curTable: string, column: string, bins: number): Promise<number | null> {
  const qs = await referenceQuantiles(s, refTable, column, bins);
  if (!qs.length) return null;
  const edges = uniqueEdges(qs);
  // constant reference: no shift is detectable
  if (edges.length < 2) return 0;
  const ref = await bucketCountsSql(s, refTable, column, edges);
  const cur = await bucketCountsSql(s, curTable, column, edges);
  return psiFromBucketCounts(ref, cur);
}

export async function categoricalPsi(s: Session, refTable: string, curTable: string, column: string): Promise<number | null> {
  const aligned = alignCategories(await categoryCountsSql(s, refTable, column), await categoryCountsSql(s, curTable, column));
  return psiFromCounts(aligned.ref, aligned.cur);
}

/** Numeric only if both sides declare a numeric type. */
export function driftKind(ref: ColumnInfo, cur: ColumnInfo): "numeric" | "categorical" {
  return ref.kind === "numeric" && cur.kind === "numeric" ? "numeric" : "categorical";
}

/** Sort key: an undefined PSI ranks as -1, below every real value. */
export function psiSortKey(row: PsiRow): number {
  return row.psi ?? -1;
}

/**
 * One PSI row per column, sorted by psi descending (undefined last).
 * Every column must exist in both schemas; the caller validates that.
 */
export async function computeDriftTable(
  s: Session,
  ref: TableSchema,
  cur: TableSchema,
  columns: string[],
  opts: DriftOptions = {}
): Promise<PsiRow[]> {
  const bins = opts.bins ?? 10;
  const threshold = opts.threshold ?? PSI_FLAG_THRESHOLD;
  const rows: PsiRow[] = [];

  for (const column of columns) {
    const refCol = findColumn(ref, column);
    const curCol = findColumn(cur, column);
    if (!refCol || !curCol) throw new RangeError(`column '${column}' missing from a drift side`);

    const kind = driftKind(refCol, curCol);
    const refN = await valueCount(s, ref.table, column, kind);
    const curN = await valueCount(s, cur.table, column, kind);

    let value: number | null;
    if (kind === "numeric") {
      value = refN === 0 || curN === 0 ? null : await numericPsi(s, ref.table, cur.table, column, bins);
    } else {
      value = await categoricalPsi(s, ref.table, cur.table, column);
    }

    rows.push({ column, kind, refN, curN, psi: value, flagged: value != null && value > threshold });
  }

  // Array.prototype.sort is stable: equal keys keep column order
  return rows.sort((a, b) => psiSortKey(b) - psiSortKey(a));
}
