// config/schema.ts
// Engine configuration types + range checks (pure TS, no imports beyond the logger type)

import type { LogLevelName } from "../../../../libs/runtime/src";

/* ============================== Types ============================== */

export type StoreConfig = {
  path: string;               // DuckDB file, ":memory:" for an in-process store
  openRetries: number;        // integer >= 0
  openBackoffMs: number;      // ms
};

export type StatsConfig = {
  histBins: number;           // 5..80
  sampleSize: number;         // 1000..500000, display sample only
  topK: number;               // 5..50
  driftBins: number;          // 5..30
  psiThreshold: number;       // flag drift above this
  previewLimit: number;       // 1..500
};

export type LogConfig = {
  level: LogLevelName;
  json: boolean;
};

export type EngineConfig = {
  serviceName: string;        // tracer name
  store: StoreConfig;
  stats: StatsConfig;
  log: LogConfig;
};

export type ConfigOverrides = {
  serviceName?: string;
  store?: Partial<StoreConfig>;
  stats?: Partial<StatsConfig>;
  log?: Partial<LogConfig>;
};

/* ============================== Ranges ============================== */

export type NumericRange = { min: number; max: number; integer: boolean };

export const STATS_RANGES: Record<keyof StatsConfig, NumericRange> = {
  histBins: { min: 5, max: 80, integer: true },
  sampleSize: { min: 1000, max: 500000, integer: true },
  topK: { min: 5, max: 50, integer: true },
  driftBins: { min: 5, max: 30, integer: true },
  psiThreshold: { min: 0, max: Number.MAX_VALUE, integer: false },
  previewLimit: { min: 1, max: 500, integer: true },
};

export const STORE_RANGES: Record<"openRetries" | "openBackoffMs", NumericRange> = {
  openRetries: { min: 0, max: 20, integer: true },
  openBackoffMs: { min: 0, max: 60000, integer: false },
};

export function inRange(v: number, r: NumericRange): boolean {
  return Number.isFinite(v) && v >= r.min && v <= r.max && (!r.integer || Number.isInteger(v));
}
