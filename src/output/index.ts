import { TableRenderer } from "../display/table-renderer.js";
import type { OutputOptions, RenderOptions, Table } from "../types/index.js";
import { formatCsv } from "./csv.js";
import { formatHtml } from "./html.js";
import { formatJson } from "./json.js";
import { formatYaml } from "./yaml.js";

/**
 * Render a finished table as text in the requested format.
 * The result always ends with a newline unless it is empty.
 */
export function formatOutput(table: Table, output: OutputOptions, render: RenderOptions): string {
  switch (output.format) {
    case "csv":
      return formatCsv(table);
    case "json":
      return formatJson(table, output.titleColumn);
    case "yaml":
      return formatYaml(table, output.titleColumn);
    case "html":
      return formatHtml(table);
    case "table": {
      const lines = new TableRenderer(render).render(table);
      return lines.map((line) => `${line}\n`).join("");
    }
  }
}

export { formatCsv, formatHtml, formatJson, formatYaml };
