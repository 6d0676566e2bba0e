/*
Purpose: turn any thrown value into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  AnalysisError,
  CatalogInconsistencyError,
  ConfigError,
  ContractViolation,
  MalformedInputError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return options.useColor === undefined ? isTty : options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = toUserFacingInput(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if ((options.mode ?? "short") !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });

  const source = error instanceof Error ? error : normalized.cause;
  if (source instanceof Error && source.name.trim()) {
    lines.push({ kind: "name", text: source.name.trim() });
  }

  if (normalized.cause !== undefined && normalized.cause !== null) {
    const cause = formatErrorMessage(normalized.cause).trim();
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }
  }

  const stack =
    error instanceof Error && error.stack
      ? error.stack
      : normalized.cause instanceof Error
        ? normalized.cause.stack
        : undefined;
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name.trim() || String(error);
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const value: { message?: unknown } = error;
    if (typeof value.message === "string" && value.message.trim()) {
      return value.message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function toUserFacingInput(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title.trim() || DEFAULT_ERROR_TITLE,
      message: error.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: error.hint?.trim() || undefined,
      next: error.next?.trim() || undefined,
      cause: error.cause,
    };
  }

  if (error instanceof AnalysisError) {
    return describeAnalysisError(error);
  }

  if (error instanceof Error) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: formatErrorMessage(error) || DEFAULT_ERROR_MESSAGE,
      cause: error.cause,
    };
  }

  const message = error === null || error === undefined ? "" : formatErrorMessage(error).trim();
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message || DEFAULT_ERROR_MESSAGE,
  };
}

function describeAnalysisError(error: AnalysisError): UserFacingErrorInput {
  if (error instanceof CatalogInconsistencyError) {
    return {
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog has conflicting rules.",
      message: error.message,
      hint: "Remove duplicate (app, pattern, priority) rules from the catalog.",
      cause: error.cause,
    };
  }

  if (error instanceof ConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: error.message,
      cause: error.cause,
    };
  }

  if (error instanceof MalformedInputError) {
    return {
      code: USER_FACING_ERROR_CODES.input,
      title: "Object record malformed.",
      message: error.message,
      cause: error.cause,
    };
  }

  const title = error instanceof ContractViolation ? "Internal consistency check failed." : DEFAULT_ERROR_TITLE;
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title,
    message: error.message,
    cause: error.cause,
  };
}
