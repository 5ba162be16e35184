// stats/src/fairness.ts
// Demographic parity: selection rate of a binarized target, overall or per
// group of a sensitive attribute.

import { Maybe, ok, unavailable } from "../../runtime/src";
import { NULL_LABEL, Session, firstRow, ident, literal, toCount, toNumber, toText } from "../../store/src";
import type { ComparisonOperator, FairnessResult, GroupSelection } from "./types";

const SQL_OPERATOR: Record<ComparisonOperator, string> = { ">": ">", "<=": "<=" };

export function isComparisonOperator(op: string): op is ComparisonOperator {
  return op === ">" || op === "<=";
}

/** y = 1 when `target op threshold`, else 0; a missing or non-numeric target counts as 0. */
export function selectionExpr(target: string, op: ComparisonOperator): string {
  return `CASE WHEN TRY_CAST(${ident(target)} AS DOUBLE) ${SQL_OPERATOR[op]} $1::DOUBLE THEN 1.0 ELSE 0.0 END`;
}

/** max − min over the groups' selection rates; 0 for fewer than two groups. */
export function parityDifference(groups: GroupSelection[]): number {
  if (!groups.length) return 0;
  let lo = Infinity;
  let hi = -Infinity;
  for (const g of groups) {
    if (g.selectionRate < lo) lo = g.selectionRate;
    if (g.selectionRate > hi) hi = g.selectionRate;
  }
  return hi - lo;
}

export async function demographicParity(
  s: Session,
  table: string,
  target: string,
  threshold: number,
  op: ComparisonOperator,
  sensitive?: string
): Promise<Maybe<FairnessResult>> {
  const y = selectionExpr(target, op);

  if (sensitive == null) {
    const r = firstRow(await s.all(`SELECT COUNT(*) AS n, AVG(${y}) AS rate FROM ${ident(table)}`, [threshold]));
    if (toCount(r.n) === 0) return unavailable("no_rows");
    return ok({ kind: "overall", overallSelectionRate: toNumber(r.rate) ?? 0 });
  }

  const rows = await s.all(
    `SELECT COALESCE(CAST(${ident(sensitive)} AS VARCHAR), ${literal(NULL_LABEL)}) AS grp,
            AVG(${y}) AS rate,
            COUNT(*) AS n
     FROM ${ident(table)}
     GROUP BY grp
     ORDER BY rate DESC, grp`,
    [threshold]
  );
  if (!rows.length) return unavailable("no_rows");

  const groups: GroupSelection[] = rows.map((r) => ({
    group: toText(r.grp),
    selectionRate: toNumber(r.rate) ?? 0,
    n: toCount(r.n),
  }));
  return ok({ kind: "grouped", parityDifference: parityDifference(groups), groups });
}
