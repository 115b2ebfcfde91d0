/*
Purpose: turn taxonomy errors into user-facing errors and print them.
Assumptions: suggestions starting with the binary name are commands; anything else is prose.
Usage: reportError(err, { verbose }) inside a command action, then set process.exitCode.
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import {
  ConfigError,
  DeployError,
  GuardError,
  PrerequisiteError,
  RemoteError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type DeployErrorKind,
  type UserFacingErrorCode,
} from "../core/errors.js";

const ERROR_TITLES: Record<DeployErrorKind, string> = {
  ConfigMissing: "Configuration incomplete",
  ConfigConflict: "Configuration conflict",
  PrerequisiteMissing: "Prerequisite missing",
  PrerequisiteNotReady: "Prerequisite not ready",
  AlreadyExists: "Resource already exists",
  InvalidSpec: "Request rejected",
  NotFound: "Resource not found",
  Conflict: "Resource busy or changed",
  PermissionDenied: "Permission denied",
  RemoteUnavailable: "Service unavailable",
  Timeout: "Operation timed out",
  Failed: "Operation failed",
  SpecConflict: "Existing resource differs",
  ConfirmationRequired: "Confirmation required",
  UserAborted: "Aborted",
};

const COMMAND_PREFIX = "agentctl ";

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError || !(error instanceof DeployError)) {
    return error;
  }

  const kind: DeployErrorKind = error.kind;
  const suggestion = error.suggestion;
  const isCommand = suggestion?.startsWith(COMMAND_PREFIX) ?? false;
  const hint = isCommand ? undefined : suggestion;
  let next = isCommand ? suggestion : undefined;
  if (!next && error instanceof ConfigError) {
    next = "agentctl config check";
  }

  return new UserFacingError({
    code: resolveCode(error),
    title: ERROR_TITLES[kind],
    message: error.message,
    hint,
    next,
    cause: error,
  });
}

function resolveCode(error: DeployError): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof PrerequisiteError) return USER_FACING_ERROR_CODES.prerequisite;
  if (error instanceof RemoteError) return USER_FACING_ERROR_CODES.remote;
  if (error instanceof GuardError) return USER_FACING_ERROR_CODES.guard;
  return USER_FACING_ERROR_CODES.unknown;
}

// =============================================================================
// PRINTING
// =============================================================================

const LINE_PREFIX: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  kind: "Kind: ",
  resource: "Resource: ",
  state: "State: ",
  keys: "Keys: ",
  status: "HTTP status: ",
  cause: "Cause: ",
};

const LINE_STYLES: Partial<Record<ErrorFormatLineKind, AnsiStyle[]>> = {
  title: ["bold", "red"],
  hint: ["yellow"],
  next: ["cyan"],
  stack: ["dim"],
};

export type ReportErrorOptions = {
  verbose?: boolean;
  useColor?: boolean;
  stream?: { write(chunk: string): unknown; isTTY?: boolean };
};

export function reportError(error: unknown, options: ReportErrorOptions = {}): void {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
  const lines = formatErrorLines(toUserFacingError(error), {
    mode: options.verbose ? "debug" : "short",
  });

  for (const line of lines) {
    const text = `${LINE_PREFIX[line.kind] ?? ""}${line.text}`;
    stream.write(`${format(text, LINE_STYLES[line.kind])}\n`);
  }
}
