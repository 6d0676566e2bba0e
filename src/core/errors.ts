/*
Purpose: error types shared by the analysis core, its collaborators, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new MalformedInputError("...", "name"); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AnalysisError";
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// Per-record and recoverable: the record is skipped and reported.
export class MalformedInputError extends AnalysisError {
  public readonly field: string;

  constructor(message: string, field: string, cause?: unknown) {
    super(message, cause);
    this.name = "MalformedInputError";
    this.field = field;
  }
}

export type CatalogRuleTuple = {
  appId: string;
  matchPattern: string;
  priority: number;
};

export class CatalogInconsistencyError extends AnalysisError {
  public readonly duplicates: CatalogRuleTuple[];

  constructor(message: string, duplicates: CatalogRuleTuple[], cause?: unknown) {
    super(message, cause);
    this.name = "CatalogInconsistencyError";
    this.duplicates = duplicates;
  }
}

// Internal invariant breach. Never caught or retried.
export class ContractViolation extends AnalysisError {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolation";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  catalog: "CATALOG_ERROR",
  input: "INPUT_ERROR",
  history: "HISTORY_ERROR",
  report: "REPORT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
