import { AzureDevOpsService } from "./azure-devops-service";
import { ProjectionService } from "./projection-service";
import { PresentationService, RenderedOutput } from "./presentation-service";
import { CredentialStore } from "./credential-service";
import type { AzureDevOpsConfig, ReportConfig } from "../config/config";
import type {
  ColumnSpec,
  OutputMode,
  ProjectionResult,
  RawItemRecord,
  Result,
  ShiftName,
  ShiftWindow,
} from "../types";
import { ok } from "../types";
import { columnSpecFromPairs } from "../utils/column-spec";
import { CredentialError, QueryError } from "../utils/errors";
import { getShiftWindow } from "../utils/shift-window";
import { buildShiftQuery } from "../utils/wiql-builder";

/**
 * Failure the run recovered from under the "continue" policy
 */
export type RecoveredIssue = CredentialError | QueryError;

/**
 * Parameters for one report run
 */
export interface ShiftReportParams {
  shift: ShiftName;
  mode: OutputMode;
  /** Clock used to resolve the shift window */
  now?: Date;
}

/**
 * Everything one run produced
 */
export interface ShiftReport {
  window: ShiftWindow;
  query: string;
  itemCount: number;
  table: ProjectionResult;
  rendered: RenderedOutput;
  issues: RecoveredIssue[];
}

/**
 * Service responsible for orchestrating one shift report run
 * Coordinates the query executor, projection and presentation services
 */
export class ShiftReportService {
  constructor(
    private readonly executor: Pick<AzureDevOpsService, "fetch">,
    private readonly projectionService: ProjectionService,
    private readonly presentationService: PresentationService,
    private readonly reportConfig: ReportConfig,
    private readonly columnSpec: ColumnSpec,
    private readonly initialIssues: RecoveredIssue[] = []
  ) {}

  /**
   * Queries the shift's work items and renders them for the chosen output
   * @returns The report, or the query error when the policy is "abort"
   */
  async run({
    shift,
    mode,
    now = new Date(),
  }: ShiftReportParams): Promise<Result<ShiftReport, QueryError>> {
    const window = getShiftWindow(shift, now);
    const query = buildShiftQuery({
      dateField: this.reportConfig.dateField,
      window,
      workItemType: this.reportConfig.workItemType,
    });

    const issues: RecoveredIssue[] = [...this.initialIssues];
    let records: RawItemRecord[] = [];

    const fetched = await this.executor.fetch(query);
    if (fetched.ok) {
      records = fetched.value;
    } else if (this.reportConfig.failurePolicy === "abort") {
      return fetched;
    } else {
      issues.push(fetched.error);
    }

    const table = this.projectionService.project(
      records,
      this.columnSpec,
      mode === "html"
    );
    const rendered = this.presentationService.render(table, mode);

    return ok({
      window,
      query,
      itemCount: records.length,
      table,
      rendered,
      issues,
    });
  }

  /**
   * Wraps a rendered HTML fragment into the full mail document
   */
  buildDocument(
    fragment: string,
    content: { greeting: string; closing: string; styleSheet: string }
  ): string {
    return this.presentationService.renderDocument(fragment, {
      title: this.reportConfig.title,
      ...content,
    });
  }
}

/**
 * Creates the query executor from the access token, replaced in tests
 */
export type ExecutorFactory = (
  token: string | null,
  fields: string[]
) => Pick<AzureDevOpsService, "fetch">;

/**
 * Wires the report services from configuration. The access token is read
 * once here; a missing token either aborts or leaves requests unauthenticated.
 */
export function createShiftReportService(
  azureDevOps: AzureDevOpsConfig,
  report: ReportConfig,
  credentials: CredentialStore,
  createExecutor: ExecutorFactory = (token, fields) =>
    new AzureDevOpsService(azureDevOps, { token, fields })
): Result<ShiftReportService, CredentialError> {
  const columnSpec = columnSpecFromPairs(report.columns, azureDevOps.linkTemplate);
  const issues: RecoveredIssue[] = [];

  const token = credentials.getToken(azureDevOps.credentialTarget);
  if (!token.ok) {
    if (report.failurePolicy === "abort") {
      return token;
    }
    issues.push(token.error);
  }

  const executor = createExecutor(
    token.ok ? token.value : null,
    columnSpec.columns.map((column) => column.sourceField)
  );

  return ok(
    new ShiftReportService(
      executor,
      new ProjectionService({ title: report.title }),
      new PresentationService(),
      report,
      columnSpec,
      issues
    )
  );
}
