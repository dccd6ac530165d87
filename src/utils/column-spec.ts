import type { ColumnDefinition, ColumnKind, ColumnPair, ColumnSpec } from "../types";
import { ColumnSpecError } from "./errors";

const DATE_SUFFIX = "Date";
const TITLE_COLUMN = "Title";
const ID_PLACEHOLDER = "{id}";
// Assigning this key on a plain object row sets its prototype instead of a cell
const RESERVED_NAMES = new Set(["__proto__"]);

/**
 * Decides how a column's cells render, from its position and display name
 */
export function classifyColumn(displayName: string, index: number): ColumnKind {
  if (index === 0) {
    return "identifier";
  }
  if (displayName.endsWith(DATE_SUFFIX)) {
    return "date";
  }
  if (displayName === TITLE_COLUMN) {
    return "linkedTitle";
  }
  return "plain";
}

/**
 * Builds a tagged column spec from parallel display-name and source-field lists
 * @throws {ColumnSpecError} When the lists differ in length, are empty,
 *   repeat a display name, or use a reserved one
 */
export function buildColumnSpec(
  displayNames: readonly string[],
  sourceFields: readonly string[],
  linkTemplate: string
): ColumnSpec {
  if (displayNames.length !== sourceFields.length) {
    throw new ColumnSpecError(
      `Column display names (${displayNames.length}) and source fields ` +
        `(${sourceFields.length}) must have the same length`
    );
  }

  if (displayNames.length === 0) {
    throw new ColumnSpecError("At least one column is required");
  }

  if (!linkTemplate.includes(ID_PLACEHOLDER)) {
    throw new ColumnSpecError(
      `Link template must contain ${ID_PLACEHOLDER}: ${linkTemplate}`
    );
  }

  const seen = new Set<string>();
  const columns: ColumnDefinition[] = displayNames.map((displayName, index) => {
    if (displayName.trim() === "") {
      throw new ColumnSpecError(`Column ${index} has an empty display name`);
    }
    if (RESERVED_NAMES.has(displayName)) {
      throw new ColumnSpecError(`Reserved column display name: ${displayName}`);
    }
    if (seen.has(displayName)) {
      throw new ColumnSpecError(`Duplicate column display name: ${displayName}`);
    }
    seen.add(displayName);

    return {
      displayName,
      sourceField: sourceFields[index],
      kind: classifyColumn(displayName, index),
    };
  });

  return { columns, linkTemplate };
}

/**
 * Builds a column spec from { displayName, sourceField } pairs
 */
export function columnSpecFromPairs(
  pairs: readonly ColumnPair[],
  linkTemplate: string
): ColumnSpec {
  return buildColumnSpec(
    pairs.map((pair) => pair.displayName),
    pairs.map((pair) => pair.sourceField),
    linkTemplate
  );
}

/**
 * Fills the work item id into a link template
 */
export function buildWorkItemLink(linkTemplate: string, id: string): string {
  return linkTemplate.split(ID_PLACEHOLDER).join(encodeURIComponent(id));
}
