/**
 * Plain data shapes shared by the JSON and YAML serializers
 */

import type { Table } from "../types/index.js";
import { stripAnsi } from "../utils/string-width.js";

export type RowRecord = Record<string, string>;
export type TableRecords = RowRecord[] | Record<string, RowRecord> | string[][];

// Object.fromEntries defines keys as own properties, so "__proto__" stays a key
function toRecord(headers: readonly string[], cells: readonly string[], from: number): RowRecord {
  const entries: [string, string][] = [];
  for (let i = from; i < cells.length && i < headers.length; i++) {
    entries.push([stripAnsi(headers[i] ?? ""), stripAnsi(cells[i] ?? "")]);
  }
  return Object.fromEntries(entries);
}

/**
 * Rows keyed by header name. Without headers the rows stay arrays.
 * With `titleColumn`, each data row's first cell becomes the key of an
 * object holding the remaining cells; separator rows have no key and are
 * left out.
 */
export function toRecords(table: Table, titleColumn: boolean): TableRecords {
  if (table.headers.length === 0) {
    return table.rows.map((row) => row.cells.map(stripAnsi));
  }

  if (titleColumn) {
    const keyed: [string, RowRecord][] = [];
    for (const row of table.rows) {
      const key = row.cells[0];
      if (row.kind === "separator" || key === undefined) continue;
      keyed.push([stripAnsi(key), toRecord(table.headers, row.cells, 1)]);
    }
    return Object.fromEntries(keyed);
  }

  return table.rows.map((row) => toRecord(table.headers, row.cells, 0));
}
