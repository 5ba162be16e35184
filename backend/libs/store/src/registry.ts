// store/src/registry.ts
// Dataset Registry: one metadata row per ingested dataset, keyed by dataset_id.

import type { Session } from "./driver";
import { REGISTRY_TABLE, TABLE_PREFIX } from "./sql";
import { toCount, toNumber, toText } from "./values";

export type DatasetRecord = {
  datasetId: string;
  path: string;             // source file the table was materialized from
  nRows: number;
  nCols: number;
  lastIngested: Date;
};

export async function ensureRegistry(s: Session): Promise<void> {
  await s.run(`
    CREATE TABLE IF NOT EXISTS ${REGISTRY_TABLE} (
      dataset_id TEXT PRIMARY KEY,
      path TEXT NOT NULL,
      n_rows BIGINT,
      n_cols INTEGER,
      last_ingested TIMESTAMP DEFAULT now()
    )`);
}

/** Insert-or-update keyed by dataset_id; last_ingested is refreshed on both paths. */
export async function registerDataset(
  s: Session,
  datasetId: string,
  path: string,
  nRows: number,
  nCols: number
): Promise<void> {
  await ensureRegistry(s);
  await s.run(
    `INSERT INTO ${REGISTRY_TABLE} (dataset_id, path, n_rows, n_cols, last_ingested)
     VALUES ($1, $2, $3, $4, now())
     ON CONFLICT (dataset_id) DO UPDATE SET
       path = excluded.path,
       n_rows = excluded.n_rows,
       n_cols = excluded.n_cols,
       last_ingested = now()`,
    [datasetId, path, nRows, nCols]
  );
}

const SELECT_RECORDS = `
  SELECT dataset_id, path, n_rows, n_cols, epoch_ms(last_ingested) AS last_ingested_ms
  FROM ${REGISTRY_TABLE}`;

export async function listDatasets(s: Session): Promise<DatasetRecord[]> {
  await ensureRegistry(s);
  const rows = await s.all(`${SELECT_RECORDS} ORDER BY dataset_id`);
  return rows.map(toRecord);
}

export async function getDataset(s: Session, datasetId: string): Promise<DatasetRecord | undefined> {
  await ensureRegistry(s);
  const rows = await s.all(`${SELECT_RECORDS} WHERE dataset_id = $1`, [datasetId]);
  return rows.length ? toRecord(rows[0]) : undefined;
}

/** Physical dataset tables in the store (the registry itself excluded). */
export async function listTables(s: Session): Promise<string[]> {
  const rows = await s.all(
    `SELECT table_name FROM information_schema.tables
     WHERE table_schema = 'main' AND table_name <> $1 AND starts_with(table_name, $2)
     ORDER BY table_name`,
    [REGISTRY_TABLE, TABLE_PREFIX]
  );
  return rows.map((r) => toText(r.table_name));
}

function toRecord(r: Record<string, unknown>): DatasetRecord {
  return {
    datasetId: toText(r.dataset_id),
    path: toText(r.path),
    nRows: toCount(r.n_rows),
    nCols: toCount(r.n_cols),
    lastIngested: new Date(toNumber(r.last_ingested_ms) ?? 0),
  };
}
