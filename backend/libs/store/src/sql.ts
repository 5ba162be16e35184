// store/src/sql.ts
// Identifier/literal quoting and the dataset → table naming rule.

export const TABLE_PREFIX = "ds_";
export const REGISTRY_TABLE = "datasets";
export const NULL_LABEL = "<NA>";

/** Replace every character outside [A-Za-z0-9_] with "_". */
export function sanitizeId(id: string): string {
  return id.replace(/[^A-Za-z0-9_]/g, "_");
}

/** Physical table backing a dataset id; pure and deterministic. */
export function tableName(datasetId: string): string {
  return TABLE_PREFIX + sanitizeId(datasetId);
}

/** Double-quoted SQL identifier ("a""b"). */
export function ident(name: string): string {
  return '"' + name.replace(/"/g, '""') + '"';
}

/** Single-quoted SQL string literal ('it''s'). */
export function literal(value: string): string {
  return "'" + value.replace(/'/g, "''") + "'";
}
