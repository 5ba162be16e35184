import { describe, it, expect } from "vitest";
import { LogRecord, createLogger, parseLevel, silentLogger } from "./logger";

function capture() {
  const lines: string[] = [];
  const records: LogRecord[] = [];
  return {
    lines,
    records,
    sink: (rec: LogRecord, line: string) => {
      records.push(rec);
      lines.push(line);
    },
  };
}

describe("parseLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(parseLevel(" WARN ")).toBe("warn");
    expect(parseLevel("silent")).toBe("silent");
  });

  it("rejects unknown or empty values", () => {
    expect(parseLevel("verbose")).toBeUndefined();
    expect(parseLevel("")).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });
});

describe("createLogger", () => {
  it("drops records below the level", () => {
    const c = capture();
    const log = createLogger({ name: "t", level: "info", sink: c.sink });
    log.debug("hidden");
    log.info("shown");
    expect(c.records.map((r) => r.msg)).toEqual(["shown"]);
    expect(log.isEnabled("debug")).toBe(false);
    expect(log.isEnabled("error")).toBe(true);
  });

  it("renders JSON lines with merged context", () => {
    const c = capture();
    const log = createLogger({ name: "t", level: "info", json: true, context: { env: "test" }, sink: c.sink });
    log.info("hello", { n: 2 });
    const parsed: unknown = JSON.parse(c.lines[0]);
    expect(parsed).toMatchObject({ level: "info", name: "t", msg: "hello", env: "test", n: 2 });
  });

  it("renders pretty key=value pairs, quoting strings with spaces", () => {
    const c = capture();
    const log = createLogger({ level: "info", json: false, sink: c.sink });
    log.warn("slow", { ms: 12, path: "a b" });
    expect(c.lines[0].endsWith(`WARN  slow ms=12 path="a b"`)).toBe(true);
  });

  it("children append to the name and share context", () => {
    const c = capture();
    const root = createLogger({ name: "eda", level: "debug", context: { a: 1 }, sink: c.sink });
    const child = root.child("store").child({ table: "ds_x" });
    child.debug("opened");
    expect(c.records[0].name).toBe("eda:store");
    expect(c.records[0].data).toEqual({ a: 1, table: "ds_x" });
  });

  it("timers log the label with elapsed ms", () => {
    const c = capture();
    const log = createLogger({ level: "debug", sink: c.sink });
    const done = log.time("query", { table: "ds_x" });
    const ms = done({ rows: 3 });
    expect(c.records[0].msg).toBe("query");
    expect(c.records[0].level).toBe("debug");
    expect(c.records[0].data).toEqual({ table: "ds_x", rows: 3, ms });
  });

  it("keeps a bounded history", () => {
    const log = createLogger({ level: "info", bufferSize: 2, sink: () => undefined });
    log.info("one");
    log.info("two");
    log.info("three");
    expect(log.history().map((r) => r.msg)).toEqual(["two", "three"]);
  });

  it("silentLogger records nothing", () => {
    const log = silentLogger();
    log.error("boom");
    expect(log.history()).toEqual([]);
  });
});
