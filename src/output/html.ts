import type { Table } from "../types/index.js";

const ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => ENTITIES[char] ?? char);
}

export function formatHtml(table: Table): string {
  const lines = ["<table>"];

  if (table.headers.length > 0) {
    lines.push("  <thead>", "    <tr>");
    for (const header of table.headers) {
      lines.push(`      <th>${escapeHtml(header)}</th>`);
    }
    lines.push("    </tr>", "  </thead>");
  }

  lines.push("  <tbody>");
  for (const row of table.rows) {
    lines.push("    <tr>");
    for (const cell of row.cells) {
      lines.push(`      <td>${escapeHtml(cell)}</td>`);
    }
    lines.push("    </tr>");
  }
  lines.push("  </tbody>", "</table>");

  return lines.map((line) => `${line}\n`).join("");
}
