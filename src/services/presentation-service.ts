import fs from "fs";
import path from "path";
import type {
  CellClassRule,
  OutputMode,
  ProjectionResult,
  RowClass,
} from "../types";
import { renderConsoleTable } from "../utils/console-table";
import {
  HtmlDocumentOptions,
  renderHtmlDocument,
  renderHtmlTable,
} from "../utils/html-renderer";

/**
 * Priority labels that get an alert class in the HTML report
 */
export const DEFAULT_CELL_RULES: CellClassRule[] = [
  { column: "Priority", value: "P0 - Emergency", className: "alert-red" },
  { column: "Priority", value: "P1 - Warning", className: "alert-yellow" },
];

export const DEFAULT_STYLESHEET_PATH = path.join(
  __dirname,
  "..",
  "..",
  "templates",
  "report.css"
);

/**
 * Output of one render call
 */
export interface RenderedOutput {
  mode: OutputMode;
  content: string;
}

/**
 * Reads a style sheet for the HTML report
 */
export function loadStyleSheet(filePath: string = DEFAULT_STYLESHEET_PATH): string {
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Turns projected tables into console text or classified HTML
 */
export class PresentationService {
  constructor(
    private readonly rules: readonly CellClassRule[] = DEFAULT_CELL_RULES
  ) {}

  /**
   * Resolves the presentation class of a cell, or null when no rule matches
   */
  classifyCell(column: string, value: string): string | null {
    const rule = this.rules.find(
      (candidate) => candidate.column === column && candidate.value === value
    );
    return rule ? rule.className : null;
  }

  /**
   * Stripes rows by zero-based position, starting with "odd"
   */
  classifyRow(rowIndex: number): RowClass {
    return rowIndex % 2 === 0 ? "odd" : "even";
  }

  render(table: ProjectionResult, mode: OutputMode): RenderedOutput {
    if (mode === "console") {
      return { mode, content: renderConsoleTable(table) };
    }

    return {
      mode,
      content: renderHtmlTable(table, {
        cellClass: (column, value) => this.classifyCell(column, value),
        rowClass: (rowIndex) => this.classifyRow(rowIndex),
      }),
    };
  }

  /**
   * Wraps an HTML fragment with the greeting, closing and style sheet
   */
  renderDocument(fragment: string, options: HtmlDocumentOptions): string {
    return renderHtmlDocument(fragment, options);
  }
}
