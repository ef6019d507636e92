import type { TableRow } from "../types/index.js";
import { parseNumber } from "../utils/numeric.js";

/** Code point order, so astral characters sort after the whole BMP. */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return left.length === right.length ? 0 : left.length < right.length ? -1 : 1;
}

export function compareValues(a: string, b: string): number {
  const numA = parseNumber(a);
  const numB = parseNumber(b);

  if (numA !== undefined && numB !== undefined) {
    // NaN on either side compares equal
    if (numA < numB) return -1;
    if (numA > numB) return 1;
    return 0;
  }
  return compareCodePoints(a, b);
}

/**
 * Stable in-place sort by a 1-based output column.
 * A column outside the table leaves the rows untouched.
 */
export function sortRows(rows: TableRow[], column: number, width: number): TableRow[] {
  if (column < 1 || column > width) {
    return rows;
  }

  const index = column - 1;
  return rows.sort((a, b) => compareValues(a.cells[index] ?? "", b.cells[index] ?? ""));
}
