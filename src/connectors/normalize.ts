import type { Row, RowValue } from "../analysis/types.js";

function numericOrText(value: string): RowValue {
  if (value.trim() === "") return value;
  const n = Number(value);
  return Number.isFinite(n) && (Number.isSafeInteger(n) || !/^-?\d+$/.test(value)) ? n : value;
}

export function toRowValue(value: unknown, numeric = false): RowValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "string") return numeric ? numericOrText(value) : value;
  if (typeof value === "bigint") return numericOrText(value.toString());
  if (value instanceof Date) return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  return JSON.stringify(value);
}

/**
 * Map a driver row onto scalar cells. Drivers that deliver wide integers and
 * decimals as strings name those columns in `numericColumns`.
 */
export function normalizeRow(raw: Record<string, unknown>, numericColumns?: ReadonlySet<string>): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toRowValue(value, numericColumns?.has(key) ?? false);
  }
  return row;
}
