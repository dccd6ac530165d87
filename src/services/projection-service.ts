import type {
  CellError,
  ColumnDefinition,
  ColumnSpec,
  IdentityRef,
  NoResults,
  ProjectedRow,
  ProjectionResult,
  RawItemRecord,
} from "../types";
import { buildWorkItemLink } from "../utils/column-spec";
import { formatUtcDate, parseUtcTimestamp } from "../utils/date-format";
import { escapeHtml } from "../utils/html";

/**
 * Rendered in place of a date cell that could not be parsed
 */
export const INVALID_DATE_PLACEHOLDER = "(invalid date)";

export const NO_RESULTS_MESSAGE = "No results";

/**
 * Options fixed when the projection service is created
 */
export interface ProjectionOptions {
  title: string;
}

/**
 * Rendered cell text and whether the source value was unusable
 */
interface CellOutcome {
  text: string;
  invalid: boolean;
}

function isIdentityRef(value: unknown): value is IdentityRef {
  return (
    typeof value === "object" &&
    value !== null &&
    "displayName" in value &&
    typeof value.displayName === "string"
  );
}

/**
 * Natural string form of a field value
 */
export function toDisplayString(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  if (isIdentityRef(value)) {
    return value.displayName;
  }
  return JSON.stringify(value);
}

/**
 * Maps raw work item records into a flat, display-ready table
 */
export class ProjectionService {
  constructor(private readonly options: ProjectionOptions) {}

  /**
   * Projects records one row per record, one cell per column, in column order
   * @param titleAsLink - Render the Title column as an anchor to the work item
   * @returns The table, or the no-results sentinel for an empty record list
   */
  project(
    records: readonly RawItemRecord[],
    spec: ColumnSpec,
    titleAsLink: boolean
  ): ProjectionResult {
    if (records.length === 0) {
      return this.noResults();
    }

    const cellErrors: CellError[] = [];

    const rows = records.map((record, rowIndex) => {
      const row: ProjectedRow = {};
      const id = String(record.id);

      spec.columns.forEach((column) => {
        const outcome = this.renderCell(record, id, column, spec, titleAsLink);
        row[column.displayName] = outcome.text;

        if (outcome.invalid) {
          cellErrors.push({
            rowIndex,
            itemId: record.id,
            column: column.displayName,
            value: record.fields[column.sourceField],
          });
        }
      });

      return row;
    });

    const markupColumns = titleAsLink
      ? spec.columns
          .filter((column) => column.kind === "linkedTitle")
          .map((column) => column.displayName)
      : [];

    return {
      kind: "table",
      title: this.options.title,
      columns: spec.columns,
      rows,
      markupColumns,
      cellErrors,
    };
  }

  private renderCell(
    record: RawItemRecord,
    id: string,
    column: ColumnDefinition,
    spec: ColumnSpec,
    titleAsLink: boolean
  ): CellOutcome {
    const value = record.fields[column.sourceField];

    switch (column.kind) {
      case "identifier":
        return { text: id, invalid: false };

      case "date": {
        const date = parseUtcTimestamp(value);
        return date
          ? { text: formatUtcDate(date), invalid: false }
          : { text: INVALID_DATE_PLACEHOLDER, invalid: true };
      }

      case "linkedTitle": {
        const title = toDisplayString(value);
        if (!titleAsLink) {
          return { text: title, invalid: false };
        }
        const href = buildWorkItemLink(spec.linkTemplate, id);
        return {
          text: `<a href="${escapeHtml(href)}">${escapeHtml(title)}</a>`,
          invalid: false,
        };
      }

      case "plain":
        return { text: toDisplayString(value), invalid: false };
    }
  }

  private noResults(): NoResults {
    return {
      kind: "empty",
      title: this.options.title,
      message: NO_RESULTS_MESSAGE,
    };
  }
}
