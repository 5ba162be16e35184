// engine/src/engine.ts
// The engine facade: one Store per engine, every operation under the store
// lock, inside a span, with validation failures returned as values.
//
// Usage:
//   const engine = createEngine({ store: { path: "data/duckdb/eda.duckdb" } });
//   await engine.ingest("data/raw/train.csv", "train");
//   const h = await engine.getHistogram("train", "age");
//   if (h.status === "ok") render(h.value);
//   await engine.close();

import type { Attributes } from "@opentelemetry/api";
import {
  Checked,
  Invalid,
  Logger,
  Outcome,
  ValidationError,
  addSpanEvent,
  columnNotFound,
  createLogger,
  datasetNotFound,
  errorMessage,
  initTracer,
  invalid,
  invalidArgument,
  ok,
  startSpan,
} from "../../../libs/runtime/src";
import {
  ColumnKind,
  DatasetRecord,
  Driver,
  IngestResult,
  Preview,
  Session,
  Store,
  TableSchema,
  createStore,
  describeTable,
  findColumn,
  getDataset,
  ingest as ingestSource,
  listDatasets as listRegistered,
  listTables as listPhysical,
  preview as previewRows,
  tableName,
} from "../../../libs/store/src";
import {
  CategoricalBiasResult,
  CorrelationMatrix,
  FairnessResult,
  HistogramResult,
  NumericBiasResult,
  PsiRow,
  ValueCount,
  categoricalBias,
  computeDriftTable,
  correlationMatrix,
  demographicParity,
  histogram,
  isComparisonOperator,
  numericBias,
  valueCounts,
} from "../../../libs/stats/src";
import { ConfigOverrides, EngineConfig, loadConfig } from "./config";

export type EngineDeps = {
  logger?: Logger;                              // default: built from config.log
  env?: Record<string, string | undefined>;     // default: process.env
  open?: (path: string) => Promise<Driver>;     // store driver factory, DuckDB by default
};

export type Engine = {
  readonly config: EngineConfig;
  readonly store: Store;

  open(): Promise<void>;
  close(): Promise<void>;

  ingest(sourcePath: string, datasetId: string): Promise<Checked<IngestResult>>;
  listDatasets(): Promise<DatasetRecord[]>;
  listTables(): Promise<string[]>;
  getSchema(datasetId: string): Promise<Checked<TableSchema>>;
  preview(datasetId: string, limit?: number): Promise<Checked<Preview>>;

  getHistogram(datasetId: string, column: string, bins?: number, sampleSize?: number): Promise<Outcome<HistogramResult>>;
  getValueCounts(datasetId: string, column: string, topK?: number): Promise<Checked<ValueCount[]>>;
  getNumericBias(datasetId: string, column: string, bins?: number): Promise<Outcome<NumericBiasResult>>;
  getCategoricalBias(datasetId: string, column: string): Promise<Outcome<CategoricalBiasResult>>;
  getCorrelation(datasetId: string): Promise<Checked<CorrelationMatrix>>;
  computeDrift(refId: string, curId: string, columns?: string[], bins?: number): Promise<Checked<PsiRow[]>>;
  computeFairness(
    datasetId: string,
    targetColumn: string,
    threshold: number,
    operator: string,
    sensitiveAttribute?: string
  ): Promise<Outcome<FairnessResult>>;
};

/* ============================== Validation ============================== */

function positiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 1) throw invalidArgument(name, v, "a positive integer");
  return v;
}

function nonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) throw invalidArgument(name, v, "a non-negative integer");
  return v;
}

/** Registered dataset → live schema of its table. */
async function resolve(s: Session, datasetId: string): Promise<TableSchema> {
  if (!(await getDataset(s, datasetId))) throw datasetNotFound(datasetId);
  return describeTable(s, tableName(datasetId));
}

function requireColumn(schema: TableSchema, column: string, kind?: ColumnKind): void {
  const col = findColumn(schema, column);
  if (!col) throw columnNotFound(column, schema.table);
  if (kind === "numeric" && col.kind !== "numeric") {
    throw new ValidationError("column_not_numeric", `Column '${column}' is not numeric (${col.columnType})`, {
      column,
      table: schema.table,
      columnType: col.columnType,
    });
  }
}

/** Columns to compare: the requested ones (each present on both sides), or the shared ones in reference order. */
export function driftColumns(ref: TableSchema, cur: TableSchema, requested?: string[]): string[] {
  if (requested) {
    for (const c of requested) {
      if (!findColumn(ref, c)) throw columnNotFound(c, ref.table);
      if (!findColumn(cur, c)) throw columnNotFound(c, cur.table);
    }
  }
  const columns = requested ?? ref.columns.map((c) => c.columnName).filter((c) => findColumn(cur, c) !== undefined);
  if (!columns.length) {
    throw new ValidationError("no_columns", "No columns to compare", { ref: ref.table, cur: cur.table });
  }
  return columns;
}

/* ================================ Engine ================================ */

export function createEngine(overrides: ConfigOverrides = {}, deps: EngineDeps = {}): Engine {
  const boot = deps.logger ?? createLogger({ name: "eda-engine" });
  const config = loadConfig(overrides, { env: deps.env, logger: boot });
  const log = deps.logger ?? createLogger({ name: "eda-engine", level: config.log.level, json: config.log.json });
  initTracer(config.serviceName);

  const store = createStore({
    path: config.store.path,
    logger: log,
    openRetries: config.store.openRetries,
    openBackoffMs: config.store.openBackoffMs,
    open: deps.open,
  });
  const stats = config.stats;

  /**
   * Span + lock + timing around one operation. A ValidationError becomes
   * { status: "invalid" }; anything else propagates.
   */
  async function run<R>(op: string, attrs: Attributes, fn: (s: Session) => Promise<R>): Promise<R | Invalid> {
    return startSpan(`engine.${op}`, attrs, async () => {
      const done = log.time(op, attrs);
      try {
        const out = await store.withLock(fn);
        done();
        return out;
      } catch (err) {
        if (err instanceof ValidationError) {
          log.warn(`${op} rejected`, { ...attrs, code: err.code, error: err.message });
          return invalid(err);
        }
        log.error(`${op} failed`, { ...attrs, error: errorMessage(err) });
        throw err;
      }
    });
  }

  function noteUnavailable<T extends { status: string; reason?: unknown }>(op: string, r: T, attrs: Attributes): T {
    if (r.status === "unavailable") log.debug(`${op} unavailable`, { ...attrs, reason: r.reason });
    return r;
  }

  return {
    config,
    store,

    async open() {
      await store.connect();
    },

    async close() {
      await store.close();
    },

    async ingest(sourcePath, datasetId) {
      const attrs = { datasetId, sourcePath };
      return startSpan("engine.ingest", attrs, async (span) => {
        try {
          const out = await ingestSource(store, sourcePath, datasetId, log);
          addSpanEvent(span, "ingested", { table: out.tableName, nRows: out.nRows, nCols: out.nCols });
          return ok(out);
        } catch (err) {
          if (err instanceof ValidationError) {
            log.warn("ingest rejected", { ...attrs, code: err.code, error: err.message });
            return invalid(err);
          }
          throw err;
        }
      });
    },

    async listDatasets() {
      return startSpan("engine.listDatasets", {}, () => store.withLock(listRegistered));
    },

    async listTables() {
      return startSpan("engine.listTables", {}, () => store.withLock(listPhysical));
    },

    getSchema(datasetId) {
      return run("getSchema", { datasetId }, async (s) => ok(await resolve(s, datasetId)));
    },

    preview(datasetId, limit = stats.previewLimit) {
      return run("preview", { datasetId, limit }, async (s) => {
        positiveInt("limit", limit);
        const schema = await resolve(s, datasetId);
        return ok(await previewRows(s, schema.table, limit));
      });
    },

    getHistogram(datasetId, column, bins = stats.histBins, sampleSize = stats.sampleSize) {
      const attrs = { datasetId, column, bins };
      return run("getHistogram", attrs, async (s) => {
        positiveInt("bins", bins);
        nonNegativeInt("sampleSize", sampleSize);
        const schema = await resolve(s, datasetId);
        requireColumn(schema, column, "numeric");
        return noteUnavailable("getHistogram", await histogram(s, schema.table, column, bins, sampleSize), attrs);
      });
    },

    getValueCounts(datasetId, column, topK = stats.topK) {
      return run("getValueCounts", { datasetId, column, topK }, async (s) => {
        positiveInt("topK", topK);
        const schema = await resolve(s, datasetId);
        requireColumn(schema, column);
        return ok(await valueCounts(s, schema.table, column, topK));
      });
    },

    getNumericBias(datasetId, column, bins = stats.histBins) {
      const attrs = { datasetId, column, bins };
      return run("getNumericBias", attrs, async (s) => {
        positiveInt("bins", bins);
        const schema = await resolve(s, datasetId);
        requireColumn(schema, column, "numeric");
        return noteUnavailable("getNumericBias", await numericBias(s, schema.table, column, bins), attrs);
      });
    },

    getCategoricalBias(datasetId, column) {
      const attrs = { datasetId, column };
      return run("getCategoricalBias", attrs, async (s) => {
        const schema = await resolve(s, datasetId);
        requireColumn(schema, column);
        return noteUnavailable("getCategoricalBias", await categoricalBias(s, schema.table, column), attrs);
      });
    },

    getCorrelation(datasetId) {
      return run("getCorrelation", { datasetId }, async (s) => ok(await correlationMatrix(s, await resolve(s, datasetId))));
    },

    computeDrift(refId, curId, columns, bins = stats.driftBins) {
      return run("computeDrift", { refId, curId, bins }, async (s) => {
        positiveInt("bins", bins);
        const ref = await resolve(s, refId);
        const cur = await resolve(s, curId);
        const selected = driftColumns(ref, cur, columns);
        return ok(await computeDriftTable(s, ref, cur, selected, { bins, threshold: stats.psiThreshold }));
      });
    },

    computeFairness(datasetId, targetColumn, threshold, operator, sensitiveAttribute) {
      const attrs: Attributes = { datasetId, targetColumn, threshold, operator };
      if (sensitiveAttribute != null) attrs.sensitiveAttribute = sensitiveAttribute;
      return run("computeFairness", attrs, async (s) => {
        if (!Number.isFinite(threshold)) throw invalidArgument("threshold", threshold, "a finite number");
        if (!isComparisonOperator(operator)) throw invalidArgument("operator", operator, `">" or "<="`);
        const schema = await resolve(s, datasetId);
        requireColumn(schema, targetColumn);
        if (sensitiveAttribute != null) requireColumn(schema, sensitiveAttribute);
        return noteUnavailable(
          "computeFairness",
          await demographicParity(s, schema.table, targetColumn, threshold, operator, sensitiveAttribute),
          attrs
        );
      });
    },
  };
}
