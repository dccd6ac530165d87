import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { AzureDevOpsConfig } from "../config/config";
import type { RawItemRecord, Result, WorkItemReference } from "../types";
import { err, ok } from "../types";
import { displayWarning } from "../utils/display-utils";
import { QueryError } from "../utils/errors";

const wiqlResponseSchema = z.object({
  workItems: z.array(
    z.object({
      id: z.number().int(),
      url: z.string().optional(),
    })
  ),
});

const workItemsResponseSchema = z.object({
  value: z.array(
    z.object({
      id: z.number().int(),
      fields: z.record(z.unknown()).default({}),
    })
  ),
});

/**
 * Options for creating the service
 */
interface AzureDevOpsServiceOptions {
  /** Personal access token, or null to send requests unauthenticated */
  token: string | null;
  /** Field reference names requested from the batch endpoint */
  fields?: readonly string[];
  /** HTTP client, replaced in tests */
  http?: AxiosInstance;
}

/**
 * Service class for the Azure DevOps work item tracking API
 */
export class AzureDevOpsService {
  private readonly headers: Record<string, string>;
  private readonly http: AxiosInstance;
  private readonly fields: readonly string[];

  constructor(
    private readonly config: AzureDevOpsConfig,
    options: AzureDevOpsServiceOptions
  ) {
    this.headers = {
      Accept: "application/json",
      "Content-Type": "application/json",
    };
    if (options.token) {
      this.headers.Authorization = `Basic ${Buffer.from(
        `:${options.token}`
      ).toString("base64")}`;
    }

    this.fields = options.fields ?? [];
    this.http =
      options.http ?? axios.create({ timeout: this.config.requestTimeoutMs });
  }

  private get projectUrl(): string {
    return `${this.config.serverUrl}/${encodeURIComponent(this.config.project)}`;
  }

  /**
   * Runs a WIQL query and fetches the full records of the matching work items
   * @param queryText - WIQL query text
   * @returns Records in the order the batch endpoint yields them, or the
   *   error of the first call that failed
   */
  async fetch(queryText: string): Promise<Result<RawItemRecord[], QueryError>> {
    const references = await this.queryWorkItems(queryText);
    if (!references.ok) {
      return references;
    }

    if (references.value.length === 0) {
      return ok([]);
    }

    let ids = references.value.map((reference) => reference.id);
    if (ids.length > this.config.maxItems) {
      displayWarning(
        `Query matched ${ids.length} work items; only the first ${this.config.maxItems} are fetched`
      );
      ids = ids.slice(0, this.config.maxItems);
    }

    return this.getWorkItems(ids);
  }

  /**
   * Submits WIQL text to the query endpoint
   * @returns Lightweight references to the matching work items
   */
  async queryWorkItems(
    queryText: string
  ): Promise<Result<WorkItemReference[], QueryError>> {
    const url = `${this.projectUrl}/_apis/wit/wiql?api-version=${encodeURIComponent(
      this.config.apiVersion
    )}&timePrecision=true`;

    const data = await this.request("WIQL query", () =>
      this.http.post<unknown>(url, { query: queryText }, { headers: this.headers })
    );
    if (!data.ok) {
      return data;
    }

    const parsed = wiqlResponseSchema.safeParse(data.value);
    if (!parsed.success) {
      return err(
        new QueryError(
          "invalid-response",
          `Unexpected WIQL response: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
          { cause: parsed.error }
        )
      );
    }

    return ok(parsed.data.workItems);
  }

  /**
   * Fetches full work item records for a list of ids in one batch call
   */
  async getWorkItems(
    ids: readonly number[]
  ): Promise<Result<RawItemRecord[], QueryError>> {
    let url = `${this.projectUrl}/_apis/wit/workitems?ids=${ids.join(",")}`;
    if (this.fields.length > 0) {
      url += `&fields=${this.fields.map(encodeURIComponent).join(",")}`;
    }
    url += `&api-version=${encodeURIComponent(this.config.apiVersion)}`;

    const data = await this.request("work item batch", () =>
      this.http.get<unknown>(url, { headers: this.headers })
    );
    if (!data.ok) {
      return data;
    }

    const parsed = workItemsResponseSchema.safeParse(data.value);
    if (!parsed.success) {
      return err(
        new QueryError(
          "invalid-response",
          `Unexpected work item response: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
          { cause: parsed.error }
        )
      );
    }

    return ok(parsed.data.value);
  }

  /**
   * Runs one HTTP call and converts axios failures into QueryError values
   */
  private async request(
    label: string,
    call: () => Promise<{ data: unknown }>
  ): Promise<Result<unknown, QueryError>> {
    try {
      const response = await call();
      return ok(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        return err(
          new QueryError(
            "status",
            `${label} failed with status ${error.response.status}`,
            { status: error.response.status, cause: error }
          )
        );
      }

      const message = error instanceof Error ? error.message : "Unknown error";
      return err(
        new QueryError("transport", `${label} failed: ${message}`, {
          cause: error,
        })
      );
    }
  }
}
