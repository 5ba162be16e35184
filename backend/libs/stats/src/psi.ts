// stats/src/psi.ts
// Population Stability Index over in-memory series, plus the pieces the
// push-down drift engine shares with it (edges, bucketing, the core formula).
//
//   PSI = Σ (p_ref − p_cur) · ln(p_ref / p_cur),  every p clipped to ≥ 1e-6
//
// Numeric columns bin both sides on quantile edges of the reference;
// categorical columns align both sides on the union of categories, with
// missing values counted as their own "NA" category.

import type { ColumnKind } from "../../store/src";
import { toNumber } from "../../store/src";

export const PSI_EPSILON = 1e-6;
export const PSI_NA = "NA";

/** Core formula over two aligned proportion vectors. */
export function psiFromProportions(ref: number[], cur: number[]): number {
  if (ref.length !== cur.length) throw new RangeError(`PSI needs aligned vectors (${ref.length} vs ${cur.length})`);
  let total = 0;
  for (let i = 0; i < ref.length; i++) {
    const p = Math.max(ref[i], PSI_EPSILON);
    const q = Math.max(cur[i], PSI_EPSILON);
    total += (p - q) * Math.log(p / q);
  }
  return total;
}

/** Counts → proportions; undefined when a side has nothing in any bucket. */
export function proportions(counts: number[]): number[] | undefined {
  let n = 0;
  for (const c of counts) n += c;
  if (n <= 0) return undefined;
  return counts.map((c) => c / n);
}

/** PSI of two aligned count vectors; null when either side is empty. */
export function psiFromCounts(ref: number[], cur: number[]): number | null {
  const p = proportions(ref);
  const q = proportions(cur);
  if (!p || !q) return null;
  return psiFromProportions(p, q);
}

/**
 * PSI of aligned bucket counts for two sides already known to hold values.
 * A side with nothing inside the reference range keeps all-zero shares,
 * which the epsilon clip turns into a large index rather than none.
 */
export function psiFromBucketCounts(ref: number[], cur: number[]): number {
  const zeros = (n: number) => new Array<number>(n).fill(0);
  return psiFromProportions(proportions(ref) ?? zeros(ref.length), proportions(cur) ?? zeros(cur.length));
}

/** i / bins for i = 0..bins. */
export function quantileLevels(bins: number): number[] {
  const out: number[] = [];
  for (let i = 0; i <= bins; i++) out.push(i === bins ? 1 : i / bins);
  return out;
}

/** Linear-interpolated quantile of an ascending array (same as QUANTILE_CONT). */
export function quantileSorted(sorted: number[], q: number): number {
  const idx = (sorted.length - 1) * q;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (idx - lo);
}

/** Ascending, de-duplicated edges. */
export function uniqueEdges(values: number[]): number[] {
  const sorted = values.slice().sort((a, b) => a - b);
  const out: number[] = [];
  for (const v of sorted) if (!out.length || out[out.length - 1] !== v) out.push(v);
  return out;
}

export function quantileEdges(sortedRef: number[], bins: number): number[] {
  return uniqueEdges(quantileLevels(bins).map((q) => quantileSorted(sortedRef, q)));
}

/**
 * Bucket of v among edges: [e0, e1], (e1, e2], ..., (e_{m-1}, e_m].
 * Values outside [e0, e_m] belong to no bucket (-1).
 */
export function bucketIndex(v: number, edges: number[]): number {
  const last = edges.length - 1;
  if (last < 1 || v < edges[0] || v > edges[last]) return -1;
  // first i with v <= edges[i + 1]
  let lo = 0;
  let hi = last - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (v <= edges[mid + 1]) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}

export function bucketCounts(values: number[], edges: number[]): number[] {
  const counts = new Array<number>(Math.max(0, edges.length - 1)).fill(0);
  for (const v of values) {
    const i = bucketIndex(v, edges);
    if (i >= 0) counts[i]++;
  }
  return counts;
}

/** Align two category → count maps on the union of their keys (sorted). */
export function alignCategories(ref: Map<string, number>, cur: Map<string, number>): { ref: number[]; cur: number[]; categories: string[] } {
  const categories = Array.from(new Set([...ref.keys(), ...cur.keys()])).sort();
  return {
    categories,
    ref: categories.map((c) => ref.get(c) ?? 0),
    cur: categories.map((c) => cur.get(c) ?? 0),
  };
}

/* ───────────────────────────── Series API ───────────────────────────── */

function numericValues(series: readonly unknown[]): number[] {
  const out: number[] = [];
  for (const v of series) {
    const n = toNumber(v);
    if (n != null) out.push(n);
  }
  return out;
}

/**
 * Numeric PSI. Non-numeric and missing values are dropped; an empty side
 * gives null, a reference with a single distinct value gives 0.
 */
export function psiNumeric(ref: readonly unknown[], cur: readonly unknown[], bins = 10): number | null {
  const r = numericValues(ref).sort((a, b) => a - b);
  const c = numericValues(cur);
  if (!r.length || !c.length) return null;

  const edges = quantileEdges(r, bins);
  if (edges.length < 2) return 0;
  return psiFromBucketCounts(bucketCounts(r, edges), bucketCounts(c, edges));
}

function categoryCounts(series: readonly unknown[]): Map<string, number> {
  const m = new Map<string, number>();
  for (const v of series) {
    const key = v == null || (typeof v === "number" && Number.isNaN(v)) ? PSI_NA : String(v);
    m.set(key, (m.get(key) ?? 0) + 1);
  }
  return m;
}

export function psiCategorical(ref: readonly unknown[], cur: readonly unknown[]): number | null {
  const aligned = alignCategories(categoryCounts(ref), categoryCounts(cur));
  return psiFromCounts(aligned.ref, aligned.cur);
}

export function psi(ref: readonly unknown[], cur: readonly unknown[], kind: ColumnKind, bins = 10): number | null {
  return kind === "numeric" ? psiNumeric(ref, cur, bins) : psiCategorical(ref, cur);
}
