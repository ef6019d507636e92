import type { Table } from "../types/index.js";
import { toRecords } from "./records.js";

export function formatJson(table: Table, titleColumn = false): string {
  return `${JSON.stringify(toRecords(table, titleColumn), null, 2)}\n`;
}
