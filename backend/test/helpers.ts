// test/helpers.ts
// Shared fixtures: in-process DuckDB stores, temp CSV files, a fake driver.

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Driver, Row, Session, SqlParam, Store } from "../libs/store/src";
import { MEMORY_PATH, createStore } from "../libs/store/src";

/** A connected in-memory store. */
export async function memoryStore(): Promise<Store> {
  return createStore({ path: MEMORY_PATH }).connect();
}

/** Run fn with a session on a fresh in-memory store, closing it afterwards. */
export async function withSession<T>(fn: (s: Session) => Promise<T>): Promise<T> {
  const store = await memoryStore();
  try {
    return await store.withLock(fn);
  } finally {
    await store.close();
  }
}

export type TempDir = { path: string; file(name: string, lines: string[]): string; remove(): void };

export function tempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "eda-test-"));
  return {
    path,
    file(name, lines) {
      const p = join(path, name);
      writeFileSync(p, lines.join("\n") + "\n");
      return p;
    },
    remove() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

/** CSV lines for a header and rows. */
export function csv(header: string[], rows: Array<Array<string | number>>): string[] {
  return [header.join(","), ...rows.map((r) => r.join(","))];
}

export type FakeDriver = Driver & { statements: string[]; closed: number };

/** Driver that records statements and answers every query with `rows`. */
export function fakeDriver(rows: Row[] = [], delayMs = 0): FakeDriver {
  const statements: string[] = [];
  const d: FakeDriver = {
    statements,
    closed: 0,
    async all(sql: string, _params?: SqlParam[]) {
      statements.push(sql);
      if (delayMs) await new Promise((r) => setTimeout(r, delayMs));
      return rows;
    },
    async run(sql: string, _params?: SqlParam[]) {
      statements.push(sql);
      if (delayMs) await new Promise((r) => setTimeout(r, delayMs));
    },
    close() {
      d.closed++;
    },
  };
  return d;
}
