import { describe, it, expect } from "vitest";
import { StoreError } from "../../runtime/src";
import { fakeDriver, memoryStore } from "../../../test/helpers";
import type { Driver } from "./driver";
import { createStore, isLockContention } from "./store";

describe("Store", () => {
  it("opens lazily and once, however many callers race", async () => {
    let opens = 0;
    const driver = fakeDriver();
    const store = createStore({
      open: async () => {
        opens++;
        return driver;
      },
    });
    expect(store.isOpen).toBe(false);

    await Promise.all([store.connect(), store.connect(), store.withLock((s) => s.all("SELECT 1"))]);
    expect(opens).toBe(1);
    expect(store.isOpen).toBe(true);
  });

  it("retries a failing open with backoff", async () => {
    let attempts = 0;
    const store = createStore({
      openRetries: 3,
      openBackoffMs: 1,
      open: async () => {
        attempts++;
        if (attempts < 3) throw new Error("Could not set lock on file");
        return fakeDriver();
      },
    });
    await store.connect();
    expect(attempts).toBe(3);
  });

  it("throws StoreError once retries run out, and does not cache the failure", async () => {
    let attempts = 0;
    const open = async (): Promise<Driver> => {
      attempts++;
      throw new Error("IO Error: Could not set lock on file \"eda.duckdb\"");
    };
    const store = createStore({ openRetries: 2, openBackoffMs: 1, open });

    await expect(store.connect()).rejects.toBeInstanceOf(StoreError);
    expect(attempts).toBe(2);
    expect(store.isOpen).toBe(false);

    await expect(store.connect()).rejects.toThrow(/Could not set lock/);
    expect(attempts).toBe(4);
  });

  it("fails at once on errors other than lock contention", async () => {
    let attempts = 0;
    const open = async (): Promise<Driver> => {
      attempts++;
      throw new Error("permission denied");
    };
    const store = createStore({ openRetries: 5, openBackoffMs: 1, open });

    await expect(store.connect()).rejects.toThrow(/permission denied/);
    expect(attempts).toBe(1);
  });

  it("recognizes lock contention messages", () => {
    expect(isLockContention(new Error("IO Error: Could not set lock on file \"a.duckdb\": Conflicting lock is held"))).toBe(true);
    expect(isLockContention(new Error("No such file or directory"))).toBe(false);
  });

  it("close is idempotent and a later call reopens", async () => {
    const drivers: Array<ReturnType<typeof fakeDriver>> = [];
    const store = createStore({
      open: async () => {
        const d = fakeDriver();
        drivers.push(d);
        return d;
      },
    });
    await store.connect();
    await store.close();
    await store.close();
    expect(drivers[0].closed).toBe(1);
    expect(store.isOpen).toBe(false);

    await store.withLock((s) => s.run("SELECT 1"));
    expect(drivers).toHaveLength(2);
    await store.close();
  });

  it("serializes every unit of work under one lock", async () => {
    const store = createStore({ open: async () => fakeDriver([], 5) });
    let active = 0;
    let maxActive = 0;
    const unit = () =>
      store.withLock(async (s) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await s.all("SELECT 1");
        await s.run("SELECT 2");
        active--;
      });

    await Promise.all([unit(), unit(), unit(), unit()]);
    expect(maxActive).toBe(1);
    expect(store.waiting).toBe(0);
  });

  it("wraps driver failures as StoreError keeping the cause", async () => {
    const store = await memoryStore();
    try {
      const err = await store.withLock((s) => s.all("SELECT * FROM missing_table")).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(StoreError);
      expect(err instanceof StoreError && err.cause instanceof Error).toBe(true);
    } finally {
      await store.close();
    }
  });

  it("runs real queries on an in-memory DuckDB", async () => {
    const store = await memoryStore();
    try {
      const rows = await store.withLock((s) => s.all("SELECT 40 + 2 AS answer"));
      expect(rows).toEqual([{ answer: 42 }]);
    } finally {
      await store.close();
    }
  });
});
