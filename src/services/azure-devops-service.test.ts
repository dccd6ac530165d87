import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import axios, {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import { AzureDevOpsService } from "./azure-devops-service";
import type { AzureDevOpsConfig } from "../config/config";

// ============================================================================
// Test Helpers
// ============================================================================

type Reply = { status: number; data: unknown };

/**
 * Axios instance whose adapter answers in process and records each request
 */
function createHttp(handler: (config: InternalAxiosRequestConfig) => Reply) {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      calls.push(config);
      const { status, data } = handler(config);
      const response: AxiosResponse = {
        data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });
  return { http, calls };
}

function routeByMethod(wiql: Reply, batch: Reply) {
  return (config: InternalAxiosRequestConfig): Reply =>
    config.method === "post" ? wiql : batch;
}

const config: AzureDevOpsConfig = {
  serverUrl: "https://dev.azure.com/acme",
  project: "Logistics Ops",
  apiVersion: "7.0",
  maxItems: 200,
  requestTimeoutMs: 1000,
  linkTemplate: "https://dev.azure.com/acme/Logistics%20Ops/_workitems/edit/{id}",
  credentialTarget: "azure-devops",
};

const WIQL_URL =
  "https://dev.azure.com/acme/Logistics%20Ops/_apis/wit/wiql?api-version=7.0&timePrecision=true";

// ============================================================================
// Tests
// ============================================================================

describe("AzureDevOpsService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("fetch", () => {
    it("posts the query and fetches the referenced items in one batch", async () => {
      const { http, calls } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 12 }, { id: 7 }] } },
          {
            status: 200,
            data: {
              count: 2,
              value: [
                { id: 12, fields: { "System.Title": "Load trailer" } },
                { id: 7, fields: { "System.Title": "Sweep dock" } },
              ],
            },
          }
        )
      );
      const service = new AzureDevOpsService(config, {
        token: "test-token",
        fields: ["System.Id", "System.Title"],
        http,
      });

      const result = await service.fetch("SELECT [System.Id] FROM WorkItems");

      expect(result).toEqual({
        ok: true,
        value: [
          { id: 12, fields: { "System.Title": "Load trailer" } },
          { id: 7, fields: { "System.Title": "Sweep dock" } },
        ],
      });
      expect(calls).toHaveLength(2);
      expect(calls[0].method).toBe("post");
      expect(calls[0].url).toBe(WIQL_URL);
      expect(JSON.parse(String(calls[0].data))).toEqual({
        query: "SELECT [System.Id] FROM WorkItems",
      });
      expect(calls[1].method).toBe("get");
      expect(calls[1].url).toBe(
        "https://dev.azure.com/acme/Logistics%20Ops/_apis/wit/workitems?ids=12,7&fields=System.Id,System.Title&api-version=7.0"
      );
    });

    it("does not re-sort the records the batch endpoint returns", async () => {
      const { http } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 1 }, { id: 2 }] } },
          { status: 200, data: { value: [{ id: 2, fields: {} }, { id: 1, fields: {} }] } }
        )
      );
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result.ok && result.value.map((record) => record.id)).toEqual([2, 1]);
    });

    it("skips the batch call when the query matches nothing", async () => {
      const { http, calls } = createHttp(() => ({
        status: 200,
        data: { workItems: [] },
      }));
      const service = new AzureDevOpsService(config, { token: "test-token", http });

      const result = await service.fetch("query");

      expect(result).toEqual({ ok: true, value: [] });
      expect(calls).toHaveLength(1);
    });

    it("sends basic auth with the token as password", async () => {
      const { http, calls } = createHttp(() => ({
        status: 200,
        data: { workItems: [] },
      }));
      const service = new AzureDevOpsService(config, { token: "test-token", http });

      await service.fetch("query");

      expect(calls[0].headers.get("Authorization")).toBe("Basic OnRlc3QtdG9rZW4=");
    });

    it("sends no Authorization header without a token", async () => {
      const { http, calls } = createHttp(() => ({
        status: 200,
        data: { workItems: [] },
      }));
      const service = new AzureDevOpsService(config, { token: null, http });

      await service.fetch("query");

      expect(calls[0].headers.get("Authorization")).toBeUndefined();
    });

    it("omits the fields parameter when no fields are configured", async () => {
      const { http, calls } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 3 }] } },
          { status: 200, data: { value: [{ id: 3, fields: {} }] } }
        )
      );
      const service = new AzureDevOpsService(config, { token: null, http });

      await service.fetch("query");

      expect(calls[1].url).toBe(
        "https://dev.azure.com/acme/Logistics%20Ops/_apis/wit/workitems?ids=3&api-version=7.0"
      );
    });

    it("fetches at most maxItems references and warns about the rest", async () => {
      const { http, calls } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 1 }, { id: 2 }, { id: 3 }] } },
          { status: 200, data: { value: [{ id: 1, fields: {} }, { id: 2, fields: {} }] } }
        )
      );
      const service = new AzureDevOpsService(
        { ...config, maxItems: 2 },
        { token: null, http }
      );

      const result = await service.fetch("query");

      expect(result.ok).toBe(true);
      expect(calls[1].url).toContain("ids=1,2&");
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it("returns a status error for a non-success WIQL response", async () => {
      const { http, calls } = createHttp(() => ({
        status: 401,
        data: { message: "Unauthorized" },
      }));
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("status");
        expect(result.error.status).toBe(401);
        expect(result.error.message).toBe("WIQL query failed with status 401");
      }
      expect(calls).toHaveLength(1);
    });

    it("returns a status error when the batch call fails", async () => {
      const { http } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 1 }] } },
          { status: 500, data: {} }
        )
      );
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("status");
        expect(result.error.message).toBe("work item batch failed with status 500");
      }
    });

    it("returns a transport error when no response arrives", async () => {
      const http = axios.create({
        adapter: async (requestConfig) => {
          throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", requestConfig);
        },
      });
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("transport");
        expect(result.error.message).toBe("WIQL query failed: connect ECONNREFUSED");
      }
    });

    it("rejects a response that does not match the expected shape", async () => {
      const { http } = createHttp(() => ({
        status: 200,
        data: { workItems: [{ id: "twelve" }] },
      }));
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("invalid-response");
      }
    });

    it("defaults missing fields to an empty mapping", async () => {
      const { http } = createHttp(
        routeByMethod(
          { status: 200, data: { workItems: [{ id: 9 }] } },
          { status: 200, data: { value: [{ id: 9 }] } }
        )
      );
      const service = new AzureDevOpsService(config, { token: null, http });

      const result = await service.fetch("query");

      expect(result).toEqual({ ok: true, value: [{ id: 9, fields: {} }] });
    });
  });
});
