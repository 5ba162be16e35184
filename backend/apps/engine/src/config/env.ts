// config/env.ts
// Merge .env / process.env onto the defaults, then overrides; validate ranges.

import * as dotenv from "dotenv";
import { Logger, parseLevel, silentLogger } from "../../../../libs/runtime/src";
import { defaults } from "./defaults";
import {
  ConfigOverrides,
  EngineConfig,
  NumericRange,
  STATS_RANGES,
  STORE_RANGES,
  StatsConfig,
  inRange,
} from "./schema";

dotenv.config(); // loads from .env if present

type Env = Record<string, string | undefined>;

export function str(env: Env, key: string, def: string): string {
  const v = env[key];
  return v === undefined || v.trim() === "" ? def : v.trim();
}

/** Parsed number, or undefined when unset; NaN when set but unparseable. */
export function num(env: Env, key: string): number | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  return Number(v);
}

export function int(env: Env, key: string): number | undefined {
  const n = num(env, key);
  if (n === undefined) return undefined;
  return Number.isInteger(n) ? n : NaN;
}

export function bool(env: Env, key: string, def: boolean): boolean {
  const v = env[key];
  if (v === undefined || v.trim() === "") return def;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}

function ranged(log: Logger, env: Env, key: string, range: NumericRange, def: number): number {
  const v = range.integer ? int(env, key) : num(env, key);
  if (v === undefined) return def;
  if (!inRange(v, range)) {
    log.warn("config value out of range, using default", { key, value: env[key], min: range.min, max: range.max, default: def });
    return def;
  }
  return v;
}

const STATS_ENV: Record<keyof StatsConfig, string> = {
  histBins: "EDA_HIST_BINS",
  sampleSize: "EDA_SAMPLE_SIZE",
  topK: "EDA_TOP_K",
  driftBins: "EDA_DRIFT_BINS",
  psiThreshold: "EDA_PSI_THRESHOLD",
  previewLimit: "EDA_PREVIEW_LIMIT",
};

export type LoadOptions = {
  env?: Env;                  // default process.env
  logger?: Logger;            // receives out-of-range warnings
};

/**
 * Build the engine configuration: defaults ← environment ← overrides.
 * Environment values outside their range fall back to the default.
 * Overrides are trusted as given; the engine validates call arguments itself.
 */
export function loadConfig(overrides: ConfigOverrides = {}, opts: LoadOptions = {}): EngineConfig {
  const env = opts.env ?? process.env;
  const log = opts.logger ?? silentLogger();

  const stats: StatsConfig = {
    histBins: ranged(log, env, STATS_ENV.histBins, STATS_RANGES.histBins, defaults.stats.histBins),
    sampleSize: ranged(log, env, STATS_ENV.sampleSize, STATS_RANGES.sampleSize, defaults.stats.sampleSize),
    topK: ranged(log, env, STATS_ENV.topK, STATS_RANGES.topK, defaults.stats.topK),
    driftBins: ranged(log, env, STATS_ENV.driftBins, STATS_RANGES.driftBins, defaults.stats.driftBins),
    psiThreshold: ranged(log, env, STATS_ENV.psiThreshold, STATS_RANGES.psiThreshold, defaults.stats.psiThreshold),
    previewLimit: ranged(log, env, STATS_ENV.previewLimit, STATS_RANGES.previewLimit, defaults.stats.previewLimit),
  };

  const level = parseLevel(env.LOG_LEVEL);
  if (env.LOG_LEVEL && !level) log.warn("unknown LOG_LEVEL, using default", { value: env.LOG_LEVEL });

  const cfg: EngineConfig = {
    serviceName: str(env, "OTEL_SERVICE_NAME", defaults.serviceName),
    store: {
      path: str(env, "EDA_STORE_PATH", defaults.store.path),
      openRetries: ranged(log, env, "EDA_STORE_OPEN_RETRIES", STORE_RANGES.openRetries, defaults.store.openRetries),
      openBackoffMs: ranged(log, env, "EDA_STORE_OPEN_BACKOFF_MS", STORE_RANGES.openBackoffMs, defaults.store.openBackoffMs),
    },
    stats,
    log: {
      level: level ?? defaults.log.level,
      json: bool(env, "LOG_JSON", defaults.log.json),
    },
  };

  return {
    serviceName: overrides.serviceName ?? cfg.serviceName,
    store: { ...cfg.store, ...overrides.store },
    stats: { ...cfg.stats, ...overrides.stats },
    log: { ...cfg.log, ...overrides.log },
  };
}
