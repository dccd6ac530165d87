/**
 * Error classes carried in Result values
 */

export type QueryErrorKind = "transport" | "status" | "invalid-response";

/**
 * Failure of one of the two work item REST calls
 */
export class QueryError extends Error {
  readonly kind: QueryErrorKind;
  readonly status?: number;

  constructor(
    kind: QueryErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "QueryError";
    this.kind = kind;
    this.status = options.status;
  }
}

/**
 * The credential store could not supply a token for a target
 */
export class CredentialError extends Error {
  constructor(readonly target: string, message: string) {
    super(message);
    this.name = "CredentialError";
  }
}

/**
 * Column display names and source fields do not line up
 */
export class ColumnSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ColumnSpecError";
  }
}

export class MailError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "MailError";
  }
}
