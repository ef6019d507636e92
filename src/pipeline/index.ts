/**
 * Pipeline driver: filter → header → projection → sort → group
 */

import type { AppConfig, Table } from "../types/index.js";
import { debug } from "../utils/debug.js";
import { defaultColumns, parseColumnSpecs, projectTable } from "./column-projector.js";
import { groupRows } from "./grouper.js";
import { resolveHeader } from "./header-resolver.js";
import { filterLines } from "./line-filter.js";
import { sortRows } from "./sorter.js";

export type PipelineConfig = Pick<AppConfig, "filter" | "tokenizer" | "header" | "columns" | "sort" | "group">;

function warnOutOfRange(option: string, column: number, width: number): void {
  if (column < 1 || column > width) {
    debug.warn(`${option} column ${column} is outside 1..${width}, ignored`);
  }
}

export function processLines(lines: readonly string[], config: PipelineConfig): Table {
  // Specs are validated even when there is nothing to project
  const requested = parseColumnSpecs(config.columns);
  const filtered = filterLines(lines, config.filter);
  debug.info(`lines: ${lines.length} read, ${filtered.length} after filter`);

  if (filtered.length === 0) {
    return { headers: [], rows: [], selectedColumns: [] };
  }

  const resolved = resolveHeader(filtered, config.header, config.tokenizer);
  const selected = requested.length > 0 ? requested : defaultColumns(resolved.headers, resolved.rows);
  debug.log(`columns: [${selected.map((index) => index + 1).join(", ")}]`);

  const table = projectTable(resolved.headers, resolved.rows, selected, resolved.explicitHeader);
  const width = selected.length;

  if (config.sort) {
    warnOutOfRange("sort", config.sort.column, width);
    sortRows(table.rows, config.sort.column, width);
  }

  if (config.group) {
    warnOutOfRange("group", config.group.column, width);
    table.rows = groupRows(table.rows, config.group.column, width, config.group.keepValues);
  }

  debug.log(`table: ${table.headers.length} header cells, ${table.rows.length} rows`);
  return table;
}

export { splitLine } from "./tokenizer.js";
export { resolveHeader } from "./header-resolver.js";
export { filterLines, compileFilter } from "./line-filter.js";
export { parseColumnSpecs, projectTable, fitHeader, defaultColumns } from "./column-projector.js";
export { sortRows, compareValues, compareCodePoints } from "./sorter.js";
export { groupRows } from "./grouper.js";
