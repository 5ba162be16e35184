// stats/src/severity.ts
// Threshold ladders for the bias heuristics. A value at or above a threshold
// gets that level; the first matching rung wins.

import type { Severity } from "./types";

export type Ladder = { severe: number; mild: number; info: number };

export const BIN_CONCENTRATION: Ladder = { severe: 0.40, mild: 0.25, info: 0.20 };
export const OUTLIER_FRACTION: Ladder = { severe: 0.20, mild: 0.10, info: 0.05 };
export const MAJORITY_SHARE: Ladder = { severe: 0.90, mild: 0.70, info: 0.60 };
export const IMBALANCE_RATIO: Ladder = { severe: 10, mild: 5, info: 3 };

export function severity(value: number, ladder: Ladder): Severity {
  if (value >= ladder.severe) return "severe";
  if (value >= ladder.mild) return "mild";
  if (value >= ladder.info) return "info";
  return "ok";
}
