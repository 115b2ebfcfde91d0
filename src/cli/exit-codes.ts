import { unwrapDeployError, type DeployErrorKind } from "../core/errors.js";

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  prerequisiteMissing: 2,
  prerequisiteNotReady: 3,
  config: 4,
  confirmation: 5,
  retryable: 75,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_BY_KIND: Partial<Record<DeployErrorKind, ExitCode>> = {
  PrerequisiteMissing: EXIT_CODES.prerequisiteMissing,
  PrerequisiteNotReady: EXIT_CODES.prerequisiteNotReady,
  ConfigMissing: EXIT_CODES.config,
  ConfigConflict: EXIT_CODES.config,
  ConfirmationRequired: EXIT_CODES.confirmation,
  UserAborted: EXIT_CODES.confirmation,
  RemoteUnavailable: EXIT_CODES.retryable,
  Timeout: EXIT_CODES.retryable,
};

export function exitCodeFor(error: unknown): ExitCode {
  const deployError = unwrapDeployError(error);
  if (!deployError) return EXIT_CODES.failure;
  return exitCodeForKind(deployError.kind);
}

export function exitCodeForKind(kind: DeployErrorKind): ExitCode {
  return EXIT_CODE_BY_KIND[kind] ?? EXIT_CODES.failure;
}

/** Exit code for several failures at once: one that failed for good outranks one worth retrying. */
export function exitCodeForKinds(kinds: readonly DeployErrorKind[]): ExitCode {
  const codes = kinds.map(exitCodeForKind);
  return codes.find((code) => code !== EXIT_CODES.retryable) ?? codes[0] ?? EXIT_CODES.success;
}
