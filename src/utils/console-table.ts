import type { ProjectionResult } from "../types";

const COLUMN_GAP = "  ";

/**
 * Renders a projected table as fixed-width text: title, header, dashed
 * underline, then one line per row. Trailing spaces are trimmed.
 */
export function renderConsoleTable(table: ProjectionResult): string {
  if (table.kind === "empty") {
    return `${table.title}\n${table.message}`;
  }

  const headers = table.columns.map((column) => column.displayName);
  const widths = headers.map((header) =>
    Math.max(
      header.length,
      ...table.rows.map((row) => (row[header] ?? "").length)
    )
  );

  const formatLine = (cells: string[]): string =>
    cells
      .map((cell, index) => cell.padEnd(widths[index]))
      .join(COLUMN_GAP)
      .trimEnd();

  return [
    table.title,
    formatLine(headers),
    formatLine(widths.map((width) => "-".repeat(width))),
    ...table.rows.map((row) => formatLine(headers.map((header) => row[header] ?? ""))),
  ].join("\n");
}
