// stats/src/bias.ts
// Per-column data-quality signals with severity levels.
//
//   numeric:      skew, Tukey outliers, zero/missing share, bin concentration
//   categorical:  majority/minority share, imbalance ratio, entropy, effective k
//
// Every figure is a push-down aggregate; no column is transferred row by row.

import { Maybe, ok, unavailable } from "../../runtime/src";
import { NULL_LABEL, Session, firstRow, ident, literal, toCount, toNumber, toText } from "../../store/src";
import { asDouble, binCounts } from "./distribution";
import {
  BIN_CONCENTRATION,
  IMBALANCE_RATIO,
  MAJORITY_SHARE,
  OUTLIER_FRACTION,
  severity,
} from "./severity";
import type { BinShare, CategoricalBiasResult, NumericBiasResult, ValueCount } from "./types";

export const TOP_BINS = 10;
export const TOP_VALUES = 20;
export const TUKEY_K = 1.5;

/* ──────────────────────────────── Numeric ──────────────────────────────── */

type NumericStats = {
  totalRows: number;
  nonNull: number;
  mean: number | null;
  std: number | null;
  skew: number | null;
  q1: number | null;
  q3: number | null;
  min: number | null;
  max: number | null;
  zeroCount: number;
  nullCount: number;
};

async function numericStats(s: Session, table: string, column: string): Promise<NumericStats> {
  const x = asDouble(column);
  const r = firstRow(await s.all(
    `SELECT COUNT(*) AS total_rows,
            COUNT(${x}) AS non_null,
            AVG(${x}) AS mean_val,
            STDDEV_SAMP(${x}) AS std_val,
            SKEWNESS(${x}) AS skew_val,
            QUANTILE_CONT(${x}, 0.25) AS q1,
            QUANTILE_CONT(${x}, 0.75) AS q3,
            MIN(${x}) AS min_val,
            MAX(${x}) AS max_val,
            COUNT(*) FILTER (WHERE ${x} = 0) AS zero_count,
            COUNT(*) FILTER (WHERE ${x} IS NULL) AS null_count
     FROM ${ident(table)}`
  ));
  return {
    totalRows: toCount(r.total_rows),
    nonNull: toCount(r.non_null),
    mean: toNumber(r.mean_val),
    std: toNumber(r.std_val),
    skew: toNumber(r.skew_val),
    q1: toNumber(r.q1),
    q3: toNumber(r.q3),
    min: toNumber(r.min_val),
    max: toNumber(r.max_val),
    zeroCount: toCount(r.zero_count),
    nullCount: toCount(r.null_count),
  };
}

/** Tukey's rule; a zero IQR means a degenerate spread and no outliers. */
async function outlierFraction(s: Session, table: string, column: string, st: NumericStats): Promise<number> {
  if (st.q1 == null || st.q3 == null || st.nonNull === 0) return 0;
  const iqr = st.q3 - st.q1;
  if (!(iqr > 0)) return 0;
  const x = asDouble(column);
  const r = firstRow(await s.all(
    `SELECT COUNT(*) AS n FROM ${ident(table)}
     WHERE ${x} IS NOT NULL AND (${x} < $1::DOUBLE OR ${x} > $2::DOUBLE)`,
    [st.q1 - TUKEY_K * iqr, st.q3 + TUKEY_K * iqr]
  ));
  return toCount(r.n) / st.nonNull;
}

export function binLabel(start: number, width: number): string {
  return `[${start.toFixed(2)}, ${(start + width).toFixed(2)})`;
}

/** Largest uniform-width bins by share of non-null values. */
async function topBins(
  s: Session,
  table: string,
  column: string,
  min: number,
  max: number,
  nonNull: number,
  bins: number
): Promise<BinShare[]> {
  const width = (max - min) / bins;
  // constant column: every value sits in one bin, no division by a zero width
  if (width === 0) return [{ bin: binLabel(min, 0), start: min, count: nonNull, share: 1 }];

  const counts = await binCounts(s, table, column, min, width, "count", TOP_BINS);
  return counts.map((c) => {
    const start = min + c.index * width;
    return { bin: binLabel(start, width), start, count: c.count, share: c.count / nonNull };
  });
}

export async function numericBias(
  s: Session,
  table: string,
  column: string,
  bins: number
): Promise<Maybe<NumericBiasResult>> {
  const st = await numericStats(s, table, column);
  if (st.totalRows === 0) return unavailable("no_rows");
  if (st.min == null || st.max == null) return unavailable("no_values");

  const outlierFrac = await outlierFraction(s, table, column, st);
  const top = await topBins(s, table, column, st.min, st.max, st.nonNull, bins);
  const maxBinShare = top.reduce((m, b) => Math.max(m, b.share), 0);

  return ok({
    totalRows: st.totalRows,
    nonNullCount: st.nonNull,
    mean: st.mean,
    std: st.std,
    maxBinShare,
    binSeverity: severity(maxBinShare, BIN_CONCENTRATION),
    skew: st.skew ?? 0,
    outlierFrac,
    outlierSeverity: severity(outlierFrac, OUTLIER_FRACTION),
    zeroShare: st.zeroCount / st.totalRows,
    missingShare: st.nullCount / st.totalRows,
    topBins: top,
  });
}

/* ────────────────────────────── Categorical ────────────────────────────── */

type CategoryTotals = { totalRows: number; nullCount: number; top: ValueCount[] };

async function topCategories(s: Session, table: string, column: string): Promise<CategoryTotals | undefined> {
  const c = ident(column);
  const t = ident(table);
  const rows = await s.all(
    `WITH value_counts AS (
       SELECT COALESCE(CAST(${c} AS VARCHAR), ${literal(NULL_LABEL)}) AS value, COUNT(*) AS n
       FROM ${t}
       GROUP BY ${c}
     ),
     totals AS (
       SELECT COUNT(*) AS total_rows, COUNT(*) FILTER (WHERE ${c} IS NULL) AS null_count
       FROM ${t}
     )
     SELECT v.value, v.n, v.n::DOUBLE / t.total_rows AS share, t.total_rows, t.null_count
     FROM value_counts v CROSS JOIN totals t
     ORDER BY v.n DESC, v.value
     LIMIT ${TOP_VALUES}`
  );
  if (!rows.length) return undefined;
  const head = rows[0];
  return {
    totalRows: toCount(head.total_rows),
    nullCount: toCount(head.null_count),
    top: rows.map((r) => ({ value: toText(r.value), count: toCount(r.n), share: toNumber(r.share) ?? 0 })),
  };
}

/**
 * Shannon entropy (natural log) over every distinct non-null value, with
 * shares taken among the non-null rows so that exp(H) ≤ observed k.
 */
async function entropyOf(s: Session, table: string, column: string): Promise<{ entropy: number; observedK: number }> {
  const c = ident(column);
  const r = firstRow(await s.all(
    `SELECT COUNT(*) AS observed_k, COALESCE(SUM(-p * LN(p)), 0) AS entropy
     FROM (
       SELECT COUNT(*)::DOUBLE / SUM(COUNT(*)) OVER () AS p
       FROM ${ident(table)}
       WHERE ${c} IS NOT NULL
       GROUP BY ${c}
     )
     WHERE p > 0`
  ));
  return { entropy: Math.max(0, toNumber(r.entropy) ?? 0), observedK: toCount(r.observed_k) };
}

export async function categoricalBias(s: Session, table: string, column: string): Promise<Maybe<CategoricalBiasResult>> {
  const cats = await topCategories(s, table, column);
  if (!cats || cats.totalRows === 0) return unavailable("no_rows");

  const shares = cats.top.map((v) => v.share);
  const majorityShare = shares[0];
  // among the retained top values only; with more than TOP_VALUES distinct
  // values this is not the global minimum
  const nonZero = shares.filter((p) => p > 0);
  const minorityShare = nonZero.length ? Math.min(...nonZero) : 0;
  const imbalanceRatio = minorityShare > 0 ? majorityShare / minorityShare : Number.POSITIVE_INFINITY;

  const { entropy, observedK } = await entropyOf(s, table, column);
  const effectiveK = observedK === 0 ? 0 : Math.min(Math.exp(entropy), observedK);

  return ok({
    totalRows: cats.totalRows,
    majorityLabel: cats.top[0].value,
    majorityShare,
    minorityShare,
    imbalanceRatio,
    entropy,
    effectiveK,
    observedK,
    missingShare: cats.nullCount / cats.totalRows,
    majoritySeverity: severity(majorityShare, MAJORITY_SHARE),
    imbalanceSeverity: severity(imbalanceRatio, IMBALANCE_RATIO),
    topValues: cats.top,
  });
}
