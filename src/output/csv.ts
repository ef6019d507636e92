import type { Table } from "../types/index.js";

const NEEDS_QUOTES = /[",\r\n]/;

export function csvField(value: string): string {
  return NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvRecord(cells: readonly string[]): string {
  // A lone empty field is quoted so the record is not a blank line
  if (cells.length === 1 && cells[0] === "") return '""';
  return cells.map(csvField).join(",");
}

export function formatCsv(table: Table): string {
  const records: string[] = [];
  if (table.headers.length > 0) {
    records.push(csvRecord(table.headers));
  }
  for (const row of table.rows) {
    records.push(csvRecord(row.cells));
  }
  return records.map((record) => `${record}\n`).join("");
}
