import type { ShiftWindow } from "../types";

/**
 * Parameters for building the shift query
 */
export interface ShiftQueryParams {
  /** Reference name of the date field, e.g. Custom.PickupDate */
  dateField: string;
  window: ShiftWindow;
  workItemType?: string | null;
}

const FIELD_REFERENCE = /^[A-Za-z][A-Za-z0-9_.]*$/;

/**
 * Quotes a WIQL string literal, doubling embedded single quotes
 */
export function quoteWiqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Whether a name can be placed inside WIQL field brackets
 */
export function isFieldReferenceName(name: string): boolean {
  return FIELD_REFERENCE.test(name);
}

function fieldReference(name: string): string {
  if (!isFieldReferenceName(name)) {
    throw new Error(`Invalid field reference name: ${name}`);
  }
  return `[${name}]`;
}

/**
 * Builds the WIQL text selecting work items whose date field falls inside
 * the shift window. Requires the query to be posted with timePrecision.
 */
export function buildShiftQuery({
  dateField,
  window,
  workItemType,
}: ShiftQueryParams): string {
  const field = fieldReference(dateField);
  const clauses = [
    "[System.TeamProject] = @project",
    `${field} >= ${quoteWiqlLiteral(window.start.toISOString())}`,
    `${field} < ${quoteWiqlLiteral(window.end.toISOString())}`,
  ];

  if (workItemType) {
    clauses.push(`[System.WorkItemType] = ${quoteWiqlLiteral(workItemType)}`);
  }

  return [
    "SELECT [System.Id] FROM WorkItems",
    `WHERE ${clauses.join("\nAND ")}`,
    `ORDER BY ${field} ASC`,
  ].join("\n");
}
