/**
 * Type definitions for the Shift Work-Item Report
 */

// ============================================
// Result Types
// ============================================

/**
 * Outcome of an I/O step, returned instead of thrown so the caller
 * decides between reporting and aborting
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================
// Azure DevOps API Types
// ============================================

/**
 * Lightweight reference returned by the WIQL endpoint
 */
export interface WorkItemReference {
  id: number;
  url?: string;
}

/**
 * Raw work item from the batch detail endpoint
 */
export interface RawItemRecord {
  id: number;
  fields: Record<string, unknown>;
}

/**
 * Identity reference as returned for fields like System.AssignedTo
 */
export interface IdentityRef {
  displayName: string;
  uniqueName?: string;
}

// ============================================
// Column Specification Types
// ============================================

/**
 * One user-supplied column: header text plus the field it reads
 */
export interface ColumnPair {
  displayName: string;
  sourceField: string;
}

export type ColumnKind = "identifier" | "date" | "linkedTitle" | "plain";

/**
 * A column tagged once, when the column spec is built, with how its cells render
 */
export interface ColumnDefinition extends ColumnPair {
  kind: ColumnKind;
}

/**
 * Ordered column definitions plus the link template used by linkedTitle
 */
export interface ColumnSpec {
  columns: ColumnDefinition[];
  linkTemplate: string;
}

// ============================================
// Projection Types
// ============================================

/**
 * Display column name → rendered cell text
 */
export type ProjectedRow = Record<string, string>;

/**
 * A cell whose source value could not be rendered
 */
export interface CellError {
  rowIndex: number;
  itemId: number;
  column: string;
  value: unknown;
}

export interface ProjectedTable {
  kind: "table";
  title: string;
  columns: ColumnDefinition[];
  rows: ProjectedRow[];
  /** Columns whose cells already hold HTML markup (linked titles) */
  markupColumns: string[];
  cellErrors: CellError[];
}

/**
 * Substituted for a table when the query returned no work items
 */
export interface NoResults {
  kind: "empty";
  title: string;
  message: string;
}

export type ProjectionResult = ProjectedTable | NoResults;

// ============================================
// Presentation Types
// ============================================

export type OutputMode = "console" | "html";

export type RowClass = "odd" | "even";

/**
 * Assigns a presentation class to a cell based on its projected value
 */
export interface CellClassRule {
  column: string;
  value: string;
  className: string;
}

// ============================================
// Shift Types
// ============================================

export type ShiftName = "morning" | "afternoon" | "night";

/**
 * A concrete UTC time range for one shift on one day
 */
export interface ShiftWindow {
  shift: ShiftName;
  start: Date;
  end: Date;
}

/**
 * What to do when a credential or transport step fails
 */
export type FailurePolicy = "continue" | "abort";
