// stats/src/types.ts
// Metric result value objects. Recomputed on every call, never persisted.

import type { ColumnKind } from "../../store/src";

export type Severity = "ok" | "info" | "mild" | "severe";

/* ─────────────────────────────── Distribution ─────────────────────────────── */

export type HistogramBin = {
  start: number;            // min + index · width
  count: number;
};

export type HistogramResult = {
  min: number;
  max: number;
  binWidth: number;
  nonNullCount: number;
  bins: HistogramBin[];     // ordered by start
  sample: number[];         // display-only random sample, never used for counts
};

export type ValueCount = {
  value: string;            // nulls reported as "<NA>"
  count: number;
  share: number;            // count / total rows
};

/* ──────────────────────────────── Bias ───────────────────────────────── */

export type BinShare = {
  bin: string;              // "[start, end)" with 2 decimals
  start: number;
  count: number;
  share: number;            // count / non-null count
};

export type NumericBiasResult = {
  totalRows: number;
  nonNullCount: number;
  mean: number | null;
  std: number | null;
  maxBinShare: number;
  binSeverity: Severity;
  skew: number;
  outlierFrac: number;
  outlierSeverity: Severity;
  zeroShare: number;        // zero values / all rows
  missingShare: number;     // nulls / all rows
  topBins: BinShare[];      // at most 10, by share descending
};

export type CategoricalBiasResult = {
  totalRows: number;
  majorityLabel: string;
  majorityShare: number;
  minorityShare: number;    // smallest share among the retained top values
  imbalanceRatio: number;   // ≥ 1, Infinity when minorityShare is 0
  entropy: number;          // natural log
  effectiveK: number;       // exp(entropy), ≤ observedK
  observedK: number;        // distinct non-null values
  missingShare: number;
  majoritySeverity: Severity;
  imbalanceSeverity: Severity;
  topValues: ValueCount[];  // at most 20, by count descending
};

/* ──────────────────────────────── Drift ──────────────────────────────── */

export type PsiRow = {
  column: string;
  kind: ColumnKind;
  refN: number;             // non-null values in the reference
  curN: number;             // non-null values in the current dataset
  psi: number | null;       // null when either side has nothing to compare
  flagged: boolean;         // psi > threshold
};

/* ─────────────────────────────── Fairness ────────────────────────────── */

export type ComparisonOperator = ">" | "<=";

export type GroupSelection = {
  group: string;
  selectionRate: number;
  n: number;
};

export type FairnessResult =
  | { kind: "overall"; overallSelectionRate: number }
  | { kind: "grouped"; parityDifference: number; groups: GroupSelection[] };

/* ────────────────────────────── Correlation ───────────────────────────── */

export type CorrelationMatrix = {
  columns: string[];
  matrix: Array<Array<number | null>>; // symmetric, diagonal 1.0, null where undefined
};
