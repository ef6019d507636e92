/**
 * Text grid renderer
 * Aligns cells by visible width and draws borders, rules and the numbering row
 */

import type { RenderOptions, Table } from "../types/index.js";
import { isNumeric } from "../utils/numeric.js";
import { visibleWidth } from "../utils/string-width.js";
import { type BoxChars, type RulePosition, ruleChars, UNICODE_BOX } from "./box-chars.js";

type Align = "left" | "right";

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  padding: 1,
  columnSeparator: "│",
  border: "none",
  titleSeparator: false,
  footerSeparator: false,
  numbering: false,
  format: true,
  numericAlign: true,
};

/** Header text starting with "-" is shown right-aligned, without the dash. */
function headerCell(header: string): { text: string; align: Align } {
  return header.startsWith("-") ? { text: header.slice(1), align: "right" } : { text: header, align: "left" };
}

export class TableRenderer {
  private options: RenderOptions;
  private box: BoxChars;
  private padding: string;

  constructor(options: Partial<RenderOptions> = {}, box: BoxChars = UNICODE_BOX) {
    this.options = { ...DEFAULT_RENDER_OPTIONS, ...options };
    this.box = box;
    this.padding = " ".repeat(this.options.padding);
  }

  render(table: Table): string[] {
    const widths = this.calculateWidths(table);
    const bordered = this.options.border === "full";
    const lines: string[] = [];

    if (bordered) {
      lines.push(this.createSeparator(widths, "top"));
    }

    if (this.options.numbering) {
      lines.push(this.formatDataRow(this.columnNumbers(table, widths.length), widths));
      if (bordered || this.options.titleSeparator) {
        lines.push(this.createSeparator(widths, "middle"));
      }
    }

    if (table.headers.length > 0) {
      lines.push(this.formatHeaderRow(table.headers, widths));
      if (this.options.titleSeparator) {
        lines.push(this.createSeparator(widths, "middle"));
      }
    }

    const lastIndex = table.rows.length - 1;
    table.rows.forEach((row, index) => {
      if (this.options.footerSeparator && index > 0 && index === lastIndex) {
        lines.push(this.createSeparator(widths, "middle"));
      }
      lines.push(this.formatDataRow(row.cells, widths));
    });

    if (bordered) {
      lines.push(this.createSeparator(widths, "bottom"));
    }

    return lines;
  }

  calculateWidths(table: Table): number[] {
    // The right-align dash still counts toward the column width
    const widths = table.headers.map((header) => visibleWidth(header));

    for (const row of table.rows) {
      while (widths.length < row.cells.length) {
        widths.push(0);
      }
      row.cells.forEach((cell, i) => {
        widths[i] = Math.max(widths[i] ?? 0, visibleWidth(cell));
      });
    }

    if (this.options.numbering) {
      this.columnNumbers(table, widths.length).forEach((number, i) => {
        widths[i] = Math.max(widths[i] ?? 0, visibleWidth(number));
      });
    }

    return widths;
  }

  // Original 1-based source positions, or the output position past the selection
  private columnNumbers(table: Table, count: number): string[] {
    return Array.from({ length: count }, (_, i) => String((table.selectedColumns[i] ?? i) + 1));
  }

  private formatHeaderRow(headers: string[], widths: number[]): string {
    const cells = headers.map((header, i) => {
      const { text, align } = headerCell(header);
      return this.formatCell(text, widths[i] ?? visibleWidth(text), align);
    });
    return this.joinCells(cells);
  }

  private formatDataRow(values: string[], widths: number[]): string {
    const cells = values.map((value, i) => {
      const align: Align = this.options.numericAlign && isNumeric(value) ? "right" : "left";
      return this.formatCell(value, widths[i] ?? visibleWidth(value), align);
    });
    return this.joinCells(cells);
  }

  private formatCell(value: string, width: number, align: Align): string {
    if (!this.options.format) {
      return value;
    }

    const fill = " ".repeat(Math.max(0, width - visibleWidth(value)));
    const content = align === "right" ? `${fill}${value}` : `${value}${fill}`;
    return `${this.padding}${content}${this.padding}`;
  }

  private joinCells(cells: string[]): string {
    switch (this.options.border) {
      case "full":
        return `${this.box.vertical}${cells.join(this.box.vertical)}${this.box.vertical}`;
      case "columnSeparator":
        return cells.join(this.options.columnSeparator);
      case "none":
        return cells.join(this.padding);
    }
  }

  private createSeparator(widths: number[], position: RulePosition): string {
    const { horizontal } = this.box;
    const parts = widths.map((width) => horizontal.repeat(width + 2 * this.options.padding));

    if (this.options.border === "full") {
      const { left, join, right } = ruleChars(this.box, position);
      return `${left}${parts.join(join)}${right}`;
    }

    // Without a border the gap between columns is drawn as a plain line
    const gapWidth =
      this.options.border === "columnSeparator" ? visibleWidth(this.options.columnSeparator) : this.options.padding;
    return parts.join(horizontal.repeat(gapWidth));
  }
}

export default TableRenderer;
