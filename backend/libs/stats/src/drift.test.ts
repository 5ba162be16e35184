import { describe, it, expect } from "vitest";
import { withSession } from "../../../test/helpers";
import type { Session } from "../../store/src";
import { describeTable } from "../../store/src";
import { computeDriftTable, driftKind, psiSortKey } from "./drift";
import { psiCategorical, psiNumeric } from "./psi";
import type { PsiRow } from "./types";

async function drift(s: Session, columns: string[], bins = 10): Promise<PsiRow[]> {
  const ref = await describeTable(s, "ref");
  const cur = await describeTable(s, "cur");
  return computeDriftTable(s, ref, cur, columns, { bins });
}

const range = (n: number, offset = 0) => Array.from({ length: n }, (_, i) => i + offset);

describe("computeDriftTable", () => {
  it("matches the in-memory PSI for numeric columns", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE ref AS SELECT range::DOUBLE AS x FROM range(100)");
      await s.run("CREATE TABLE cur AS SELECT (range + 30)::DOUBLE AS x FROM range(100)");
      return drift(s, ["x"]);
    });
    const expected = psiNumeric(range(100), range(100, 30), 10);
    expect(expected).not.toBeNull();
    expect(rows).toHaveLength(1);
    expect(rows[0].kind).toBe("numeric");
    expect(rows[0].refN).toBe(100);
    expect(rows[0].curN).toBe(100);
    expect(rows[0].psi).toBeCloseTo(expected ?? -1, 9);
  });

  it("matches the in-memory PSI for categorical columns, nulls included", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE ref (g VARCHAR)");
      await s.run("INSERT INTO ref VALUES ('a'), ('a'), ('b'), (NULL)");
      await s.run("CREATE TABLE cur (g VARCHAR)");
      await s.run("INSERT INTO cur VALUES ('a'), ('b'), ('b'), ('c')");
      return drift(s, ["g"]);
    });
    const expected = psiCategorical(["a", "a", "b", null], ["a", "b", "b", "c"]);
    expect(rows[0].kind).toBe("categorical");
    expect(rows[0].refN).toBe(3);
    expect(rows[0].curN).toBe(4);
    expect(rows[0].psi).toBeCloseTo(expected ?? -1, 12);
  });

  it("flags the U[0,100] → U[50,150] shift and sorts undefined PSI last", async () => {
    const rows = await withSession(async (s) => {
      await s.run(
        `CREATE TABLE ref AS SELECT range / 10.0 AS shift, (range % 7)::DOUBLE AS same, range::DOUBLE AS gone
         FROM range(1001)`
      );
      await s.run(
        `CREATE TABLE cur AS SELECT 50 + range / 10.0 AS shift, (range % 7)::DOUBLE AS same, NULL::DOUBLE AS gone
         FROM range(1001)`
      );
      return drift(s, ["gone", "same", "shift"]);
    });

    expect(rows.map((r) => r.column)).toEqual(["shift", "same", "gone"]);
    expect(rows[0].psi ?? 0).toBeGreaterThan(0.2);
    expect(rows[0].flagged).toBe(true);
    expect(rows[1].psi).toBe(0);
    expect(rows[1].flagged).toBe(false);
    expect(rows[2]).toEqual({ column: "gone", kind: "numeric", refN: 1001, curN: 0, psi: null, flagged: false });
  });

  it("flags a current side that lies entirely outside the reference range", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE ref AS SELECT range::DOUBLE AS x FROM range(100)");
      await s.run("CREATE TABLE cur AS SELECT (range + 500)::DOUBLE AS x FROM range(100)");
      return drift(s, ["x"]);
    });
    const expected = 10 * (0.1 - 1e-6) * Math.log(0.1 / 1e-6);
    expect(rows[0].refN).toBe(100);
    expect(rows[0].curN).toBe(100);
    expect(rows[0].psi).toBeCloseTo(expected, 9);
    expect(rows[0].flagged).toBe(true);
  });

  it("compares as categorical when the sides disagree on the type", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE ref AS SELECT range::DOUBLE AS v FROM range(3)");
      await s.run("CREATE TABLE cur AS SELECT CAST(range AS VARCHAR) AS v FROM range(3)");
      return drift(s, ["v"]);
    });
    expect(rows[0].kind).toBe("categorical");
    expect(rows[0].psi).not.toBeNull();
  });

  it("uses the threshold it is given", async () => {
    const rows = await withSession(async (s) => {
      await s.run("CREATE TABLE ref AS SELECT range::DOUBLE AS x FROM range(100)");
      await s.run("CREATE TABLE cur AS SELECT (range + 5)::DOUBLE AS x FROM range(100)");
      const ref = await describeTable(s, "ref");
      const cur = await describeTable(s, "cur");
      return computeDriftTable(s, ref, cur, ["x"], { bins: 10, threshold: 0 });
    });
    expect(rows[0].psi ?? 0).toBeGreaterThan(0);
    expect(rows[0].flagged).toBe(true);
  });
});

describe("helpers", () => {
  it("is numeric only when both sides are", () => {
    const num = { columnName: "a", columnType: "DOUBLE", kind: "numeric" } as const;
    const cat = { columnName: "a", columnType: "VARCHAR", kind: "categorical" } as const;
    expect(driftKind(num, num)).toBe("numeric");
    expect(driftKind(num, cat)).toBe("categorical");
    expect(driftKind(cat, num)).toBe("categorical");
  });

  it("ranks undefined PSI below zero", () => {
    const row = (psi: number | null): PsiRow => ({ column: "c", kind: "numeric", refN: 1, curN: 1, psi, flagged: false });
    expect(psiSortKey(row(null))).toBe(-1);
    expect(psiSortKey(row(0))).toBe(0);
  });
});
