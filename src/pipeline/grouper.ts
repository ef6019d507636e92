import type { TableRow } from "../types/index.js";
import { separatorRow } from "../types/index.js";

/**
 * Collapse runs of equal values in a 1-based output column.
 *
 * A separator row goes in front of every row that starts a new group
 * (except the first). Within a group the repeated value is blanked unless
 * `keepValues` is set. Comparison always uses the value before blanking.
 */
export function groupRows(
  rows: readonly TableRow[],
  column: number,
  width: number,
  keepValues: boolean,
): TableRow[] {
  if (column < 1 || column > width) {
    return [...rows];
  }

  const index = column - 1;
  const grouped: TableRow[] = [];
  let previous: string | undefined;

  for (const row of rows) {
    const value = row.cells[index] ?? "";

    if (previous !== undefined && value !== previous) {
      grouped.push(separatorRow(row.cells.length));
    }

    if (previous !== undefined && value === previous && !keepValues) {
      const cells = [...row.cells];
      cells[index] = "";
      grouped.push({ ...row, cells });
    } else {
      grouped.push(row);
    }

    previous = value;
  }

  return grouped;
}
