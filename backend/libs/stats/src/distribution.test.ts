import { describe, it, expect } from "vitest";
import { withSession } from "../../../test/helpers";
import { binCounts, histogram, valueCounts } from "./distribution";

describe("histogram", () => {
  it("counts uniform-width bins anchored at the minimum", async () => {
    const h = await withSession(async (s) => {
      await s.run("CREATE TABLE t AS SELECT range::DOUBLE AS x FROM range(10)");
      await s.run("INSERT INTO t VALUES (NULL)");
      return histogram(s, "t", "x", 3, 1000);
    });

    expect(h.status).toBe("ok");
    if (h.status !== "ok") return;
    expect(h.value.min).toBe(0);
    expect(h.value.max).toBe(9);
    expect(h.value.binWidth).toBe(3);
    expect(h.value.nonNullCount).toBe(10);
    // the maximum sits in its own bin starting at max
    expect(h.value.bins).toEqual([
      { start: 0, count: 3 },
      { start: 3, count: 3 },
      { start: 6, count: 3 },
      { start: 9, count: 1 },
    ]);
    expect(h.value.sample).toHaveLength(10);
    expect([...h.value.sample].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("caps the display sample", async () => {
    const h = await withSession(async (s) => {
      await s.run("CREATE TABLE t AS SELECT range AS x FROM range(500)");
      return histogram(s, "t", "x", 10, 50);
    });
    expect(h.status === "ok" && h.value.sample.length).toBe(50);
  });

  it("is unavailable for a constant column", async () => {
    const h = await withSession(async (s) => {
      await s.run("CREATE TABLE t AS SELECT 7 AS x FROM range(20)");
      return histogram(s, "t", "x", 10, 100);
    });
    expect(h).toEqual({ status: "unavailable", reason: "constant_column" });
  });

  it("ignores NaN and infinite values", async () => {
    const h = await withSession(async (s) => {
      await s.run("CREATE TABLE t (x DOUBLE)");
      await s.run("INSERT INTO t VALUES (0), (10), ('nan'::DOUBLE), ('inf'::DOUBLE)");
      return histogram(s, "t", "x", 2, 100);
    });
    expect(h.status).toBe("ok");
    if (h.status !== "ok") return;
    expect(h.value.min).toBe(0);
    expect(h.value.max).toBe(10);
    expect(h.value.nonNullCount).toBe(2);
    expect(h.value.bins).toEqual([
      { start: 0, count: 1 },
      { start: 10, count: 1 },
    ]);
    expect([...h.value.sample].sort((a, b) => a - b)).toEqual([0, 10]);
  });

  it("is unavailable when there are no values", async () => {
    const h = await withSession(async (s) => {
      await s.run("CREATE TABLE t (x DOUBLE)");
      await s.run("INSERT INTO t VALUES (NULL), (NULL)");
      return histogram(s, "t", "x", 10, 100);
    });
    expect(h).toEqual({ status: "unavailable", reason: "no_values" });
  });
});

describe("binCounts", () => {
  it("orders by count when asked and truncates", async () => {
    const counts = await withSession(async (s) => {
      await s.run("CREATE TABLE t (x INTEGER)");
      await s.run("INSERT INTO t VALUES (0), (5), (5), (5), (9), (9)");
      return binCounts(s, "t", "x", 0, 5, "count", 2);
    });
    expect(counts).toEqual([
      { index: 1, count: 5 },
      { index: 0, count: 1 },
    ]);
  });
});

describe("valueCounts", () => {
  it("ranks by count, ties by value, with nulls as <NA>", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE t (c VARCHAR)");
      await s.run("INSERT INTO t VALUES ('a'), ('a'), ('a'), ('b'), ('b'), (NULL), (NULL), ('c')");
      return valueCounts(s, "t", "c", 3);
    });
    expect(rows).toEqual([
      { value: "a", count: 3, share: 0.375 },
      { value: "<NA>", count: 2, share: 0.25 },
      { value: "b", count: 2, share: 0.25 },
    ]);
  });

  it("stringifies numeric values", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE t (n INTEGER)");
      await s.run("INSERT INTO t VALUES (1), (2), (2)");
      return valueCounts(s, "t", "n", 10);
    });
    expect(rows.map((r) => r.value)).toEqual(["2", "1"]);
  });
});
