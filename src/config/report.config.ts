import fs from "fs";
import { z } from "zod";
import type { ColumnPair, FailurePolicy } from "../types";
import { getOptional, parseChoice } from "../utils/validation";
import { isFieldReferenceName } from "../utils/wiql-builder";

const FAILURE_POLICIES = ["continue", "abort"] as const;

/**
 * Columns used when REPORT_COLUMNS_FILE is not set
 */
export const DEFAULT_COLUMNS: ColumnPair[] = [
  { displayName: "ID", sourceField: "System.Id" },
  { displayName: "Title", sourceField: "System.Title" },
  { displayName: "State", sourceField: "System.State" },
  { displayName: "Priority", sourceField: "Custom.PriorityLevel" },
  { displayName: "Assigned To", sourceField: "System.AssignedTo" },
  { displayName: "Pickup Date", sourceField: "Custom.PickupDate" },
];

const columnFileSchema = z
  .array(
    z.object({
      displayName: z.string().min(1),
      sourceField: z.string().min(1),
    })
  )
  .min(1);

/**
 * Report configuration
 */
export interface ReportConfig {
  title: string;
  /** Date field the shift window is applied to */
  dateField: string;
  workItemType: string | null;
  columns: ColumnPair[];
  failurePolicy: FailurePolicy;
}

/**
 * Loads a column list from a JSON file of { displayName, sourceField } pairs
 */
export function loadColumnsFile(filePath: string): ColumnPair[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new Error(
      `Unable to read REPORT_COLUMNS_FILE ${filePath}: ${
        error instanceof Error ? error.message : "Unknown error"
      }`
    );
  }

  const parsed = columnFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid REPORT_COLUMNS_FILE ${filePath}:\n` +
        parsed.error.issues
          .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
          .join("\n")
    );
  }

  return parsed.data;
}

/**
 * Retrieves and validates report configuration from environment variables
 */
export function getReportConfig(
  env: NodeJS.ProcessEnv = process.env
): ReportConfig {
  const title = getOptional(env.REPORT_TITLE, "Shift Work Items");
  const dateField = getOptional(env.REPORT_DATE_FIELD, "Custom.PickupDate");
  if (!isFieldReferenceName(dateField)) {
    throw new Error(
      `Invalid REPORT_DATE_FIELD: ${dateField}\n` +
        `Expected a field reference name such as Custom.PickupDate`
    );
  }
  const workItemType = getOptional(env.REPORT_WORK_ITEM_TYPE, "") || null;

  const columnsFile = getOptional(env.REPORT_COLUMNS_FILE, "");
  const columns = columnsFile ? loadColumnsFile(columnsFile) : DEFAULT_COLUMNS;

  const failurePolicy = parseChoice(
    "REPORT_FAILURE_POLICY",
    getOptional(env.REPORT_FAILURE_POLICY, "continue"),
    FAILURE_POLICIES
  );

  return {
    title,
    dateField,
    workItemType,
    columns,
    failurePolicy,
  };
}
