import {
  validateRequired,
  isValidServerUrl,
  getOptional,
  parseIntegerInRange,
} from "../utils/validation";

/**
 * Upper bound the work items batch endpoint accepts per call
 */
export const MAX_BATCH_SIZE = 200;

/**
 * Azure DevOps / TFS API configuration
 */
export interface AzureDevOpsConfig {
  /** Organization URL (https://dev.azure.com/org) or TFS collection URL */
  serverUrl: string;
  project: string;
  apiVersion: string;
  /** References beyond this count are dropped, never fetched in a second batch */
  maxItems: number;
  requestTimeoutMs: number;
  /** Work item link, `{id}` is replaced with the work item id */
  linkTemplate: string;
  /** Name the credential store looks the access token up by */
  credentialTarget: string;
}

/**
 * Retrieves and validates Azure DevOps configuration from environment variables
 */
export function getAzureDevOpsConfig(
  env: NodeJS.ProcessEnv = process.env
): AzureDevOpsConfig {
  const rawUrl = validateRequired("AZURE_DEVOPS_URL", env.AZURE_DEVOPS_URL);
  const project = validateRequired(
    "AZURE_DEVOPS_PROJECT",
    env.AZURE_DEVOPS_PROJECT
  );

  if (!isValidServerUrl(rawUrl)) {
    throw new Error(
      `Invalid AZURE_DEVOPS_URL format: ${rawUrl}\n` +
        `Expected format: https://dev.azure.com/your-organization`
    );
  }

  const serverUrl = rawUrl.replace(/\/+$/, "");

  const apiVersion = getOptional(env.AZURE_DEVOPS_API_VERSION, "7.0");

  const maxItems = parseIntegerInRange(
    "AZURE_DEVOPS_MAX_ITEMS",
    getOptional(env.AZURE_DEVOPS_MAX_ITEMS, String(MAX_BATCH_SIZE)),
    1,
    MAX_BATCH_SIZE
  );

  const requestTimeoutMs = parseIntegerInRange(
    "AZURE_DEVOPS_TIMEOUT_MS",
    getOptional(env.AZURE_DEVOPS_TIMEOUT_MS, "30000"),
    0,
    600000
  );

  const linkTemplate = getOptional(
    env.AZURE_DEVOPS_LINK_TEMPLATE,
    `${serverUrl}/${encodeURIComponent(project)}/_workitems/edit/{id}`
  );

  if (!linkTemplate.includes("{id}")) {
    throw new Error(
      `Invalid AZURE_DEVOPS_LINK_TEMPLATE: ${linkTemplate}\n` +
        `The template must contain the {id} placeholder`
    );
  }

  const credentialTarget = getOptional(env.CREDENTIAL_TARGET, "azure-devops");

  return {
    serverUrl,
    project,
    apiVersion,
    maxItems,
    requestTimeoutMs,
    linkTemplate,
    credentialTarget,
  };
}
