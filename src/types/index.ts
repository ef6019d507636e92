/**
 * Shared types for the table pipeline
 */

export interface DataRow {
  kind: "data";
  cells: string[];
}

/**
 * Blank divider inserted between groups. Every cell is "".
 */
export interface SeparatorRow {
  kind: "separator";
  cells: string[];
}

export type TableRow = DataRow | SeparatorRow;

export interface Table {
  headers: string[];
  rows: TableRow[];
  // Zero-based source column for each output column
  selectedColumns: number[];
}

export type BorderStyle = "none" | "columnSeparator" | "full";

export type HeaderSource =
  | { kind: "firstLine" }
  | { kind: "none" }
  | { kind: "explicit"; text: string };

export type OutputFormat = "table" | "csv" | "json" | "yaml" | "html";

export interface TokenizerOptions {
  separator: string;
  collapse: boolean;
}

export interface HeaderOptions {
  removeFirstLine: boolean;
  source: HeaderSource;
}

export interface RenderOptions {
  padding: number;
  columnSeparator: string;
  border: BorderStyle;
  titleSeparator: boolean;
  footerSeparator: boolean;
  numbering: boolean;
  format: boolean;
  numericAlign: boolean;
}

export interface OutputOptions {
  format: OutputFormat;
  titleColumn: boolean;
}

export interface AppConfig {
  input: { file?: string };
  filter?: string;
  tokenizer: TokenizerOptions;
  header: HeaderOptions;
  columns: readonly string[];
  sort?: { column: number };
  group?: { column: number; keepValues: boolean };
  render: RenderOptions;
  output: OutputOptions;
}

export function dataRow(cells: string[]): DataRow {
  return { kind: "data", cells };
}

export function separatorRow(width: number): SeparatorRow {
  return { kind: "separator", cells: new Array<string>(width).fill("") };
}
