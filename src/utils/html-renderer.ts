import type { ProjectionResult } from "../types";
import { escapeHtml } from "./html";

/**
 * Callbacks that attach presentation classes to rows and cells
 */
export interface HtmlTableRules {
  cellClass: (column: string, value: string) => string | null;
  rowClass: (rowIndex: number) => string;
}

/**
 * Content wrapped around the table fragment to form a full document
 */
export interface HtmlDocumentOptions {
  title: string;
  styleSheet: string;
  greeting: string;
  closing: string;
}

function classAttribute(className: string | null): string {
  return className ? ` class="${escapeHtml(className)}"` : "";
}

/**
 * Renders a projected table as an HTML fragment: a heading and the table,
 * or a heading and a "no results" paragraph
 */
export function renderHtmlTable(
  table: ProjectionResult,
  rules: HtmlTableRules
): string {
  const heading = `<h2>${escapeHtml(table.title)}</h2>`;

  if (table.kind === "empty") {
    return `${heading}\n<p class="no-results">${escapeHtml(table.message)}</p>`;
  }

  const markup = new Set(table.markupColumns);
  const headerCells = table.columns
    .map((column) => `<th>${escapeHtml(column.displayName)}</th>`)
    .join("");

  const bodyRows = table.rows.map((row, rowIndex) => {
    const cells = table.columns
      .map((column) => {
        const value = row[column.displayName] ?? "";
        const content = markup.has(column.displayName) ? value : escapeHtml(value);
        const cellClass = rules.cellClass(column.displayName, value);
        return `<td${classAttribute(cellClass)}>${content}</td>`;
      })
      .join("");
    return `<tr${classAttribute(rules.rowClass(rowIndex))}>${cells}</tr>`;
  });

  return [
    heading,
    "<table>",
    "<thead>",
    `<tr>${headerCells}</tr>`,
    "</thead>",
    "<tbody>",
    ...bodyRows,
    "</tbody>",
    "</table>",
  ].join("\n");
}

/**
 * Wraps a fragment into a complete HTML document with an embedded style sheet
 */
export function renderHtmlDocument(
  fragment: string,
  options: HtmlDocumentOptions
): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(options.title)}</title>`,
    "<style>",
    options.styleSheet.trim(),
    "</style>",
    "</head>",
    "<body>",
    `<p>${escapeHtml(options.greeting)}</p>`,
    fragment,
    `<p>${escapeHtml(options.closing)}</p>`,
    "</body>",
    "</html>",
  ].join("\n");
}
