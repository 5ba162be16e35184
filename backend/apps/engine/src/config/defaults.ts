// config/defaults.ts
// Default engine configuration (no imports, pure data)

export const defaults = Object.freeze({
  serviceName: "eda-engine",

  store: Object.freeze({
    path: "data/duckdb/eda.duckdb",
    openRetries: 3,
    openBackoffMs: 200,
  }),

  stats: Object.freeze({
    histBins: 30,
    sampleSize: 100000,        // histogram display sample
    topK: 20,
    driftBins: 10,
    psiThreshold: 0.2,
    previewLimit: 25,
  }),

  log: Object.freeze({
    level: "info",
    json: false,
  }),
} as const);
