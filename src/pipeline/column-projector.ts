import { ColumnSpecError } from "../errors.js";
import type { Table, TableRow } from "../types/index.js";
import { dataRow } from "../types/index.js";

const COLUMN_NUMBER = /^\+?\d+$/;

function parseColumnNumber(spec: string, part: string, label: string): number {
  if (!COLUMN_NUMBER.test(part)) {
    throw new ColumnSpecError(spec, `${label} '${part}' is not a number`);
  }
  const value = parseInt(part, 10);
  if (value === 0) {
    throw new ColumnSpecError(spec, "column numbers are 1-based");
  }
  return value;
}

/**
 * Turn specs like "3", "1:4" or "5:2" into zero-based source indices.
 * A reversed range counts down, so "3:1" gives [2, 1, 0].
 */
export function parseColumnSpecs(specs: readonly string[]): number[] {
  const indices: number[] = [];

  for (const spec of specs) {
    if (!spec.includes(":")) {
      indices.push(parseColumnNumber(spec, spec, "column") - 1);
      continue;
    }

    const parts = spec.split(":");
    if (parts.length !== 2) {
      throw new ColumnSpecError(spec, "expected a range like START:END");
    }
    const start = parseColumnNumber(spec, parts[0] ?? "", "range start");
    const end = parseColumnNumber(spec, parts[1] ?? "", "range end");

    if (start <= end) {
      for (let i = start; i <= end; i++) indices.push(i - 1);
    } else {
      for (let i = start; i >= end; i--) indices.push(i - 1);
    }
  }

  return indices;
}

export function defaultColumns(headers: readonly string[], rows: readonly string[][]): number[] {
  const longest = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const count = Math.max(longest, headers.length);
  return Array.from({ length: count }, (_, i) => i);
}

function pick(cells: readonly string[], selected: readonly number[]): string[] {
  return selected.map((index) => cells[index] ?? "");
}

/** Pad with "" or cut so the explicit header matches the output width. */
export function fitHeader(header: readonly string[], width: number): string[] {
  const fitted = header.slice(0, width);
  while (fitted.length < width) fitted.push("");
  return fitted;
}

export function projectTable(
  headers: readonly string[],
  rows: readonly string[][],
  selected: readonly number[],
  explicitHeader?: readonly string[],
): Table {
  const projectedRows: TableRow[] = rows.map((row) => dataRow(pick(row, selected)));
  const projectedHeaders = explicitHeader
    ? fitHeader(explicitHeader, selected.length)
    : headers.length > 0
      ? pick(headers, selected)
      : [];

  return {
    headers: projectedHeaders,
    rows: projectedRows,
    selectedColumns: [...selected],
  };
}
