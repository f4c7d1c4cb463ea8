/**
 * Row Materializer
 *
 * Flattens a driver result into rows of lower-cased column name -> text.
 * No coercion happens here; the same rows serve any target schema.
 */

import type { QueryResult } from "../../ports/connection-provider.port.js";

export type RawRow = ReadonlyMap<string, string | null>;

export type RowSet = RawRow[];

export function materialize(result: QueryResult): RowSet {
  const columns = result.columns.map((column) => column.toLowerCase());
  const rows: RowSet = [];

  for (const cells of result.rows) {
    const row = new Map<string, string | null>();
    columns.forEach((column, position) => {
      // Repeated column names keep their first occurrence
      if (!row.has(column)) {
        row.set(column, renderCell(cells[position]));
      }
    });
    rows.push(row);
  }

  return rows;
}

/**
 * Render a driver-native cell value as text
 */
export function renderCell(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("base64");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}
