// store/src/driver.ts
// The one physical connection to DuckDB, behind a narrow Session interface.

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { DuckDBConnection, DuckDBInstance } from "@duckdb/node-api";

export type SqlParam = string | number | boolean | bigint | null;

export type Row = Record<string, unknown>;

/** Statements issued while the store lock is held. */
export type Session = {
  /** Run a query and materialize every row as a plain object. */
  all(sql: string, params?: SqlParam[]): Promise<Row[]>;
  /** Run a statement, discarding any result. */
  run(sql: string, params?: SqlParam[]): Promise<void>;
};

export type Driver = Session & {
  close(): void;
};

export const MEMORY_PATH = ":memory:";

export async function openDuckDB(path: string): Promise<Driver> {
  if (path !== MEMORY_PATH) mkdirSync(dirname(path), { recursive: true });

  const instance = await DuckDBInstance.create(path);
  let connection: DuckDBConnection;
  try {
    connection = await instance.connect();
  } catch (err) {
    instance.closeSync();
    throw err;
  }

  return {
    async all(sql, params) {
      const reader = await connection.runAndReadAll(sql, params);
      return reader.getRowObjectsJS();
    },
    async run(sql, params) {
      await connection.run(sql, params);
    },
    close() {
      connection.closeSync();
      instance.closeSync();
    },
  };
}
