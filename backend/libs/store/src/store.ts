// store/src/store.ts
// Store Handle: owns the single DuckDB connection and the process-wide lock.
//
// Every statement, read or write, runs inside withLock(). The lock is held from
// the first statement until results are materialized, so a multi-statement
// unit (ingest: replace table + upsert registry) is atomic with respect to
// every other caller. Two unrelated reads never overlap either.
//
// Usage:
//   const store = createStore({ path: "data/duckdb/eda.duckdb", logger });
//   const rows = await store.withLock((s) => s.all("SELECT 1 AS x"));
//   await store.close();

import {
  Logger,
  Mutex,
  StoreError,
  errorMessage,
  retry,
  silentLogger,
} from "../../runtime/src";
import { Driver, MEMORY_PATH, Session, openDuckDB } from "./driver";

// Another process holding the database file; worth waiting for.
const LOCK_CONTENTION = /could not set lock|conflicting lock|lock on file/i;

export function isLockContention(err: unknown): boolean {
  return LOCK_CONTENTION.test(errorMessage(err));
}

export type StoreOptions = {
  path?: string;              // database file, ":memory:" for an in-process store
  logger?: Logger;
  openRetries?: number;       // attempts when the file is locked by another process (default 3)
  openBackoffMs?: number;     // base backoff between attempts (default 200)
  slowLockMs?: number;        // lock waits above this are logged (default 250)
  open?: (path: string) => Promise<Driver>; // driver factory, DuckDB by default
};

export class Store {
  readonly path: string;
  private readonly log: Logger;
  private readonly mutex = new Mutex();
  private readonly opts: Required<Pick<StoreOptions, "openRetries" | "openBackoffMs" | "slowLockMs">>;
  private readonly openDriver: (path: string) => Promise<Driver>;
  private driver: Promise<Driver> | null = null;

  constructor(opts: StoreOptions = {}) {
    this.path = opts.path ?? MEMORY_PATH;
    this.log = (opts.logger ?? silentLogger()).child("store");
    this.opts = {
      openRetries: opts.openRetries ?? 3,
      openBackoffMs: opts.openBackoffMs ?? 200,
      slowLockMs: opts.slowLockMs ?? 250,
    };
    this.openDriver = opts.open ?? openDuckDB;
  }

  /** True once connect() has been called and close() has not. */
  get isOpen(): boolean {
    return this.driver !== null;
  }

  /** Callers currently waiting for the lock. */
  get waiting(): number {
    return this.mutex.queued;
  }

  /**
   * Open the handle if needed and return it. Concurrent and repeated calls
   * share one connection; a failed open is not cached, the next call retries.
   */
  async connect(): Promise<Store> {
    await this.ensureDriver();
    return this;
  }

  /** Release the handle; safe to call any number of times. */
  async close(): Promise<void> {
    await this.mutex.withPermit(async () => {
      const pending = this.driver;
      if (!pending) return;
      this.driver = null;
      let driver: Driver;
      try {
        driver = await pending;
      } catch {
        return; // never opened, nothing to release
      }
      driver.close();
      this.log.info("closed", { path: this.path });
    });
  }

  /**
   * Run fn with exclusive use of the connection. The lock is released only
   * after fn's promise settles, i.e. after every row has been materialized.
   */
  async withLock<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const waitStart = Date.now();
    const release = await this.mutex.acquire();
    const waited = Date.now() - waitStart;
    if (waited >= this.opts.slowLockMs) this.log.debug("lock wait", { ms: waited, queued: this.mutex.queued });
    try {
      const driver = await this.ensureDriver();
      return await fn(guarded(driver));
    } finally {
      release();
    }
  }

  private ensureDriver(): Promise<Driver> {
    if (!this.driver) {
      const pending = this.open();
      this.driver = pending;
      void pending.catch(() => {
        if (this.driver === pending) this.driver = null;
      });
    }
    return this.driver;
  }

  private async open(): Promise<Driver> {
    const done = this.log.time("opened", { path: this.path }, "info");
    try {
      const driver = await retry(() => this.openDriver(this.path), {
        retries: this.opts.openRetries,
        baseDelayMs: this.opts.openBackoffMs,
        retryIf: isLockContention,
        onRetry: (err, attempt, delayMs) =>
          this.log.warn("open failed, retrying", { attempt, delayMs: Math.round(delayMs), error: errorMessage(err) }),
      });
      done();
      return driver;
    } catch (err) {
      this.log.error("open failed", { path: this.path, error: errorMessage(err) });
      throw new StoreError(`Cannot open analytic store at ${this.path}: ${errorMessage(err)}`, err);
    }
  }
}

export function createStore(opts: StoreOptions = {}): Store {
  return new Store(opts);
}

/** Session whose driver failures surface as StoreError (original error kept as cause). */
function guarded(driver: Driver): Session {
  return {
    async all(sql, params) {
      try {
        return await driver.all(sql, params);
      } catch (err) {
        throw new StoreError(errorMessage(err), err);
      }
    },
    async run(sql, params) {
      try {
        await driver.run(sql, params);
      } catch (err) {
        throw new StoreError(errorMessage(err), err);
      }
    },
  };
}
