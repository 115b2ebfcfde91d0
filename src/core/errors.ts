/*
Purpose: error taxonomy shared by configuration, resource clients, orchestration and CLI output.
Assumptions: every DeployError carries a taxonomy kind; UserFacingError instances are safe to display.
Usage: throw new ConfigError("ConfigMissing", "...", { keys }); throw new UserFacingError({ code, title, message }).
*/

import type { LifecycleState, ResourceKind } from "./resources.js";

// =============================================================================
// TAXONOMY
// =============================================================================

export const CONFIG_ERROR_KINDS = ["ConfigMissing", "ConfigConflict"] as const;
export const PREREQUISITE_ERROR_KINDS = ["PrerequisiteMissing", "PrerequisiteNotReady"] as const;
export const REMOTE_ERROR_KINDS = [
  "AlreadyExists",
  "InvalidSpec",
  "NotFound",
  "Conflict",
  "PermissionDenied",
  "RemoteUnavailable",
  "Timeout",
  "Failed",
] as const;
export const GUARD_ERROR_KINDS = ["SpecConflict", "ConfirmationRequired", "UserAborted"] as const;

export type ConfigErrorKind = (typeof CONFIG_ERROR_KINDS)[number];
export type PrerequisiteErrorKind = (typeof PREREQUISITE_ERROR_KINDS)[number];
export type RemoteErrorKind = (typeof REMOTE_ERROR_KINDS)[number];
export type GuardErrorKind = (typeof GUARD_ERROR_KINDS)[number];

export type DeployErrorKind =
  | ConfigErrorKind
  | PrerequisiteErrorKind
  | RemoteErrorKind
  | GuardErrorKind;

export type DeployErrorDetails = {
  resource?: ResourceKind;
  remoteId?: string;
  /** Command the user should run next. */
  suggestion?: string;
  cause?: unknown;
};

// =============================================================================
// CORE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class DeployError<K extends DeployErrorKind = DeployErrorKind> extends OrchestratorError {
  readonly kind: K;
  readonly resource?: ResourceKind;
  readonly remoteId?: string;
  readonly suggestion?: string;

  constructor(kind: K, message: string, details: DeployErrorDetails = {}) {
    super(message, details.cause);
    this.name = "DeployError";
    this.kind = kind;
    this.resource = details.resource;
    this.remoteId = details.remoteId;
    this.suggestion = details.suggestion;
  }
}

export class ConfigError extends DeployError<ConfigErrorKind> {
  readonly keys: string[];

  constructor(
    kind: ConfigErrorKind,
    message: string,
    details: DeployErrorDetails & { keys?: string[] } = {},
  ) {
    super(kind, message, details);
    this.name = "ConfigError";
    this.keys = details.keys ?? [];
  }
}

export class PrerequisiteError extends DeployError<PrerequisiteErrorKind> {
  readonly state?: LifecycleState;

  constructor(
    kind: PrerequisiteErrorKind,
    message: string,
    details: DeployErrorDetails & { state?: LifecycleState } = {},
  ) {
    super(kind, message, details);
    this.name = "PrerequisiteError";
    this.state = details.state;
  }
}

export class RemoteError extends DeployError<RemoteErrorKind> {
  readonly statusCode?: number;

  constructor(
    kind: RemoteErrorKind,
    message: string,
    details: DeployErrorDetails & { statusCode?: number } = {},
  ) {
    super(kind, message, details);
    this.name = "RemoteError";
    this.statusCode = details.statusCode;
  }
}

export class GuardError extends DeployError<GuardErrorKind> {
  constructor(kind: GuardErrorKind, message: string, details: DeployErrorDetails = {}) {
    super(kind, message, details);
    this.name = "GuardError";
  }
}

export function isDeployError<K extends DeployErrorKind>(
  error: unknown,
  kind: K,
): error is DeployError<K> {
  return error instanceof DeployError && error.kind === kind;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  prerequisite: "PREREQUISITE_ERROR",
  remote: "REMOTE_ERROR",
  guard: "GUARD_ERROR",
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

/** The DeployError behind `error`, looking through one user-facing wrapper. */
export function unwrapDeployError(error: unknown): DeployError | undefined {
  if (error instanceof DeployError) return error;
  if (error instanceof UserFacingError && error.cause instanceof DeployError) return error.cause;
  return undefined;
}
