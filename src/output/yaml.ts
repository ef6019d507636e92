import { stringify } from "yaml";
import type { Table } from "../types/index.js";
import { toRecords } from "./records.js";

export function formatYaml(table: Table, titleColumn = false): string {
  return stringify(toRecords(table, titleColumn));
}
