import type { Result } from "../types";
import { err, ok } from "../types";
import { CredentialError } from "../utils/errors";
import { isNonEmptyString } from "../utils/validation";

/**
 * Source of opaque access tokens, looked up by a target name
 */
export interface CredentialStore {
  getToken(target: string): Result<string, CredentialError>;
}

/**
 * Environment variable a target's token is read from,
 * e.g. "azure-devops" → AZURE_DEVOPS_TOKEN
 */
export function tokenVariableName(target: string): string {
  const normalized = target
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${normalized}_TOKEN`;
}

/**
 * Credential store backed by environment variables (and so by .env)
 */
export class CredentialService implements CredentialStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getToken(target: string): Result<string, CredentialError> {
    if (!isNonEmptyString(target)) {
      return err(new CredentialError(target, "Credential target name is empty"));
    }

    const variable = tokenVariableName(target);
    const token = this.env[variable];

    if (!token || !isNonEmptyString(token)) {
      return err(
        new CredentialError(
          target,
          `No credential found for "${target}" (set ${variable})`
        )
      );
    }

    return ok(token.trim());
  }
}
