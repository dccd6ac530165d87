import {
  AzureDevOpsConfig,
  getAzureDevOpsConfig,
} from "./azure-devops.config";
import { ReportConfig, getReportConfig } from "./report.config";
import { MailConfig, getMailConfig } from "./mail.config";

/**
 * Complete application configuration
 */
export interface Config {
  azureDevOps: AzureDevOpsConfig;
  report: ReportConfig;
  mail: MailConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { AzureDevOpsConfig, ReportConfig, MailConfig };

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    azureDevOps: getAzureDevOpsConfig(env),
    report: getReportConfig(env),
    mail: getMailConfig(env),
  };
}

/**
 * Loads configuration, wrapping any problem in a single descriptive error
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return getConfig(env);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
