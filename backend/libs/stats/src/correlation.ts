// stats/src/correlation.ts
// Pairwise Pearson correlation of the numeric columns in one aggregate query.

import { ValidationError } from "../../runtime/src";
import { Session, TableSchema, firstRow, ident, numericColumns, toNumber } from "../../store/src";
import { asDouble } from "./distribution";
import type { CorrelationMatrix } from "./types";

type Pair = { i: number; j: number; alias: string };

/** Diagonal plus every unordered pair once; columns in name order. */
export function correlationPairs(columns: string[]): Pair[] {
  const pairs: Pair[] = [];
  for (let i = 0; i < columns.length; i++) {
    for (let j = i; j < columns.length; j++) pairs.push({ i, j, alias: `c_${i}_${j}` });
  }
  return pairs;
}

export async function correlationMatrix(s: Session, schema: TableSchema): Promise<CorrelationMatrix> {
  const columns = numericColumns(schema).sort();
  if (columns.length < 2) {
    throw new ValidationError(
      "insufficient_columns",
      `Correlation needs at least 2 numeric columns, found ${columns.length}`,
      { table: schema.table, numericColumns: columns }
    );
  }

  const pairs = correlationPairs(columns);
  const select = pairs
    .map((p) => `CORR(${asDouble(columns[p.i])}, ${asDouble(columns[p.j])}) AS ${ident(p.alias)}`)
    .join(",\n       ");
  const r = firstRow(await s.all(`SELECT ${select}\nFROM ${ident(schema.table)}`));

  const n = columns.length;
  const matrix: Array<Array<number | null>> = [];
  for (let i = 0; i < n; i++) matrix.push(new Array<number | null>(n).fill(null));

  for (const p of pairs) {
    if (p.i === p.j) {
      matrix[p.i][p.j] = 1;
      continue;
    }
    const v = toNumber(r[p.alias]);
    matrix[p.i][p.j] = v;
    matrix[p.j][p.i] = v;
  }
  return { columns, matrix };
}
