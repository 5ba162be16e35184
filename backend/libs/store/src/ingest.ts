// store/src/ingest.ts
// Ingestion: materialize a CSV/Parquet source as the dataset's table and upsert
// its registry row, as one critical section and one transaction.

import { extname } from "node:path";
import {
  Logger,
  SourceParseError,
  StoreError,
  ValidationError,
  errorMessage,
  invalidArgument,
  silentLogger,
} from "../../runtime/src";
import type { Session } from "./driver";
import { registerDataset } from "./registry";
import { describeTable } from "./schema";
import { ident, literal, tableName } from "./sql";
import type { Store } from "./store";
import { firstRow, toCount } from "./values";

export type SourceFormat = "csv" | "parquet";

export type IngestResult = {
  tableName: string;
  nRows: number;
  nCols: number;
};

// Column types are still sniffed; the dialect is fixed so that ragged rows or
// an unterminated quote fail the read instead of collapsing into one column.
const CSV_OPTIONS = `delim = ',', quote = '"', escape = '"', header = true, strict_mode = true, null_padding = false, ignore_errors = false`;

function readerSql(format: SourceFormat, sourcePath: string): string {
  const path = literal(sourcePath);
  return format === "csv" ? `read_csv(${path}, ${CSV_OPTIONS})` : `read_parquet(${path})`;
}

// Driver messages that mean "the file was read but its content is malformed".
const PARSE_FAILURE = /Invalid Input Error|Conversion Error|Parser Error|CSV Error|magic bytes|too small to be a Parquet file/i;

export function sourceFormat(sourcePath: string): SourceFormat {
  const ext = extname(sourcePath).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".parquet") return "parquet";
  throw new ValidationError("unsupported_format", `Unsupported source format '${ext || sourcePath}': expected .csv or .parquet`, {
    sourcePath,
  });
}

/**
 * Replace the dataset's table with the content of sourcePath and upsert the
 * registry row. Row and column counts are read back from the new table.
 * If the table cannot be created the transaction is rolled back and the
 * previous registry row (and table) stay as they were.
 */
export async function ingest(
  store: Store,
  sourcePath: string,
  datasetId: string,
  logger: Logger = silentLogger()
): Promise<IngestResult> {
  if (datasetId.trim() === "") throw invalidArgument("datasetId", datasetId, "a non-empty identifier");
  const format = sourceFormat(sourcePath);
  const table = tableName(datasetId);
  const log = logger.child({ datasetId, table });

  return store.withLock(async (s) => {
    const done = log.time("ingested", { format, sourcePath }, "info");
    await s.run("BEGIN TRANSACTION");
    try {
      await materialize(s, table, sourcePath, format);
      const nRows = toCount(firstRow(await s.all(`SELECT COUNT(*) AS n FROM ${ident(table)}`)).n);
      const nCols = (await describeTable(s, table)).columns.length;
      await registerDataset(s, datasetId, sourcePath, nRows, nCols);
      await s.run("COMMIT");
      done({ nRows, nCols });
      return { tableName: table, nRows, nCols };
    } catch (err) {
      await rollback(s, log);
      log.warn("ingest failed", { sourcePath, error: errorMessage(err) });
      throw err;
    }
  });
}

async function materialize(s: Session, table: string, sourcePath: string, format: SourceFormat): Promise<void> {
  try {
    await s.run(`CREATE OR REPLACE TABLE ${ident(table)} AS SELECT * FROM ${readerSql(format, sourcePath)}`);
  } catch (err) {
    const cause = err instanceof StoreError && err.cause !== undefined ? err.cause : err;
    if (PARSE_FAILURE.test(errorMessage(cause))) {
      throw new SourceParseError(sourcePath, `Failed to parse ${format.toUpperCase()} source: ${errorMessage(cause)}`, cause);
    }
    throw err;
  }
}

async function rollback(s: Session, log: Logger): Promise<void> {
  try {
    await s.run("ROLLBACK");
  } catch (err) {
    // the failed statement may already have aborted the transaction
    log.debug("rollback skipped", { error: errorMessage(err) });
  }
}
